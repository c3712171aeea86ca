import { JobStatus } from "./job-status";

describe("JobStatus", () => {
  it("starts incomplete at zero percent", () => {
    const status = new JobStatus("Checking server status...");

    expect(status.snapshot()).toMatchObject({
      message: "Checking server status...",
      percentComplete: 0,
      error: false,
      completed: false,
      notes: [],
    });
  });

  it("records progress and clamps the percentage", () => {
    const status = new JobStatus();

    status.update("Building graph", 140);
    expect(status.snapshot()).toMatchObject({ message: "Building graph", percentComplete: 100 });

    status.update("Restarting", -5);
    expect(status.snapshot().percentComplete).toBe(0);
  });

  it("keeps the previous percentage when none is given", () => {
    const status = new JobStatus();
    status.update("Building graph", 40);

    status.update("Still building");

    expect(status.snapshot()).toMatchObject({ message: "Still building", percentComplete: 40 });
  });

  it("completes successfully at 100 percent", () => {
    const status = new JobStatus();

    status.completeSuccessfully("Done");

    expect(status.snapshot()).toMatchObject({
      message: "Done",
      percentComplete: 100,
      error: false,
      completed: true,
    });
  });

  it("keeps the first failure and ignores later updates", () => {
    const status = new JobStatus();

    status.fail("First failure");
    status.fail("Second failure");
    status.update("Progress", 50);
    status.completeSuccessfully("Done");

    expect(status.isError).toBe(true);
    expect(status.snapshot()).toMatchObject({ message: "First failure", error: true, completed: true });
  });

  it("adds notes without changing the outcome", () => {
    const status = new JobStatus();
    status.fail("Timed out");

    status.addNote("Instance is terminated!");

    expect(status.snapshot()).toMatchObject({
      message: "Timed out",
      error: true,
      notes: ["Instance is terminated!"],
    });
  });

  it("notifies subscribers until they unsubscribe", () => {
    const status = new JobStatus();
    const listener = jest.fn();
    const unsubscribe = status.subscribe(listener);

    status.update("Building graph", 10);
    unsubscribe();
    status.update("Building graph", 20);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0][0]).toMatchObject({ message: "Building graph", percentComplete: 10 });
  });

  it("hands out copies of the notes", () => {
    const status = new JobStatus();
    status.snapshot().notes.push("tampered");

    expect(status.snapshot().notes).toEqual([]);
  });
});
