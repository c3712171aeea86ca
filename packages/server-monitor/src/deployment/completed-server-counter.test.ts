import { CompletedServerCounter } from "./completed-server-counter";

describe("CompletedServerCounter", () => {
  it("counts each increment once", () => {
    const counter = new CompletedServerCounter("dep-1", 3);

    expect(counter.incrementCompletedServers()).toBe(1);
    expect(counter.incrementCompletedServers()).toBe(2);
    expect(counter.count).toBe(2);
    expect(counter.allServersCompleted()).toBe(false);
  });

  it("reports completion once every expected server finished", () => {
    const counter = new CompletedServerCounter("dep-1", 2);

    counter.incrementCompletedServers();
    counter.incrementCompletedServers();

    expect(counter.allServersCompleted()).toBe(true);
  });

  it("never reports completion without an expected total", () => {
    const counter = new CompletedServerCounter("dep-1");
    counter.incrementCompletedServers();

    expect(counter.allServersCompleted()).toBe(false);
  });

  it("loses no increments across concurrent callers", async () => {
    const counter = new CompletedServerCounter("dep-1", 50);

    await Promise.all(
      Array.from({ length: 50 }, async (_, i) => {
        await new Promise((resolve) => setImmediate(resolve));
        if (i % 2 === 0) await Promise.resolve();
        counter.incrementCompletedServers();
      }),
    );

    expect(counter.count).toBe(50);
    expect(counter.allServersCompleted()).toBe(true);
  });
});
