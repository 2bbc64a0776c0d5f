import { Scheduler } from "../../src/core/scheduler";
import { InMemoryJobStore } from "../../src/store/in-memory-job-store";
import { Job } from "../../src/types/job";
import { ScriptedExecutor, sleep, succeed, untilAborted, waitFor } from "../helpers";

describe("Graceful Shutdown", () => {
  test("waits for in-flight job to finish", async () => {
    const store = new InMemoryJobStore();
    let completed = false;
    let started = false;

    const scheduler = new Scheduler({
      store,
      pollIntervalMs: 10, // fast poll
      executor: new ScriptedExecutor([
        async () => {
          started = true;
          await sleep(100); // Simulate work
          completed = true;
          return succeed();
        },
      ]),
    });

    const job = await scheduler.schedule({ content: "long job" });
    await scheduler.start();

    await waitFor(() => started);

    await scheduler.stop({ graceful: true });

    expect(completed).toBe(true);
    expect((await store.findById(job.id))?.status).toBe("completed");
  });

  test("returns the job to the queue when the timeout is reached", async () => {
    const store = new InMemoryJobStore();
    let started = false;
    const interrupted: Job[] = [];

    const scheduler = new Scheduler({
      store,
      pollIntervalMs: 10,
      executor: new ScriptedExecutor([untilAborted(() => (started = true))]),
    });
    scheduler.on("job:interrupted", (job) => interrupted.push(job));

    const job = await scheduler.schedule({ content: "timeout job", maxRetries: 2 });
    await scheduler.start();
    await waitFor(() => started);

    await expect(
      scheduler.stop({ graceful: true, timeoutMs: 50 })
    ).resolves.not.toThrow();

    const check = await store.findById(job.id);
    expect(check?.status).toBe("queued");
    expect(check?.retryCount).toBe(0);
    expect(check?.executionLog).toHaveLength(1);
    expect(check?.executionLog[0]?.message).toMatch(
      /^Attempt 1\/2 interrupted by shutdown after \d+\.\ds$/
    );
    expect(interrupted.map((j) => j.id)).toEqual([job.id]);
  });

  test("a forced stop does not wait", async () => {
    const store = new InMemoryJobStore();
    let started = false;

    const scheduler = new Scheduler({
      store,
      pollIntervalMs: 10,
      executor: new ScriptedExecutor([untilAborted(() => (started = true))]),
    });

    const job = await scheduler.schedule({ content: "forced" });
    await scheduler.start();
    await waitFor(() => started);

    await scheduler.stop();

    expect((await store.findById(job.id))?.status).toBe("queued");
    expect(scheduler.isRunning()).toBe(false);
  });
});
