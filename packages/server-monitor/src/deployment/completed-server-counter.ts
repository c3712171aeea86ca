/**
 * Completed-server accumulator shared by every monitor of one deployment.
 *
 * Monitors only ever call increment(). All mutation happens synchronously on
 * the event loop, so concurrent monitors cannot interleave inside it.
 */

import { Logger } from "@nestjs/common";

/** What a monitor is allowed to do with its deployment's counter */
export interface CompletedServerSink {
  incrementCompletedServers(): number;
}

export class CompletedServerCounter implements CompletedServerSink {
  private readonly logger = new Logger(CompletedServerCounter.name);
  private completed = 0;

  constructor(
    private readonly deploymentId: string,
    private readonly expectedServers?: number,
  ) {}

  get count(): number {
    return this.completed;
  }

  incrementCompletedServers(): number {
    this.completed += 1;
    const of = this.expectedServers !== undefined ? `/${this.expectedServers}` : "";
    this.logger.log(`Deployment ${this.deploymentId}: ${this.completed}${of} servers completed`);
    return this.completed;
  }

  allServersCompleted(): boolean {
    return this.expectedServers !== undefined && this.completed >= this.expectedServers;
  }
}
