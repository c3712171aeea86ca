/**
 * Progress record for one monitor run.
 *
 * Written only by the owning monitor; observers read snapshots or subscribe
 * to changes.
 */

export interface JobStatusSnapshot {
  message: string;
  percentComplete: number;
  error: boolean;
  completed: boolean;
  /** Notes recorded after the job reached its final state */
  notes: string[];
  updatedAt: string;
}

export type JobStatusListener = (snapshot: JobStatusSnapshot) => void;

export class JobStatus {
  private message: string;
  private percentComplete = 0;
  private error = false;
  private completed = false;
  private readonly notes: string[] = [];
  private updatedAt = new Date().toISOString();
  private readonly listeners = new Set<JobStatusListener>();

  constructor(initialMessage = "Waiting to begin job...") {
    this.message = initialMessage;
  }

  get isError(): boolean {
    return this.error;
  }

  /**
   * Report progress. Ignored once the job has completed or failed.
   */
  update(message: string, percentComplete?: number): void {
    if (this.completed) return;
    this.message = message;
    if (percentComplete !== undefined) {
      this.percentComplete = clampPercent(percentComplete);
    }
    this.touch();
  }

  completeSuccessfully(message: string): void {
    if (this.completed) return;
    this.message = message;
    this.percentComplete = 100;
    this.completed = true;
    this.touch();
  }

  /**
   * Mark the job failed. The first failure wins.
   */
  fail(message: string): void {
    if (this.completed) return;
    this.message = message;
    this.error = true;
    this.completed = true;
    this.touch();
  }

  /**
   * Attach a note without changing the job's outcome.
   */
  addNote(note: string): void {
    this.notes.push(note);
    this.touch();
  }

  snapshot(): JobStatusSnapshot {
    return {
      message: this.message,
      percentComplete: this.percentComplete,
      error: this.error,
      completed: this.completed,
      notes: [...this.notes],
      updatedAt: this.updatedAt,
    };
  }

  subscribe(listener: JobStatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private touch(): void {
    this.updatedAt = new Date().toISOString();
    const snapshot = this.snapshot();
    for (const listener of this.listeners) {
      listener(snapshot);
    }
  }
}

function clampPercent(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(100, Math.max(0, value));
}
