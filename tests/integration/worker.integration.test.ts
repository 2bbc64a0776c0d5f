import { Scheduler } from "../../src/core/scheduler";
import { InMemoryJobStore } from "../../src/store/in-memory-job-store";
import { JobNotFoundError } from "../../src/store/store-errors";
import { JobStatus } from "../../src/types/lifecycle";
import { Job } from "../../src/types/job";
import { createQueueState } from "../../src/types/state";
import {
  ScriptedExecutor,
  fail,
  sleep,
  succeed,
  untilAborted,
  waitFor,
} from "../helpers";

// a record the scan can see but no transition can find
class UnpickableStore extends InMemoryJobStore {
  async transition(job: Job, to: JobStatus): Promise<Job> {
    if (to === "executing") throw new JobNotFoundError(job.id);
    return super.transition(job, to);
  }
}

describe("Worker loop", () => {
  let scheduler: Scheduler | undefined;

  afterEach(async () => {
    await scheduler?.stop();
    scheduler = undefined;
  });

  test("drains the queue in priority order", async () => {
    const executor = new ScriptedExecutor([() => succeed()]);
    const completed: Job[] = [];
    scheduler = new Scheduler({ executor, pollIntervalMs: 10_000 });
    scheduler.on("job:success", (job) => completed.push(job));

    await scheduler.schedule({ content: "third", priority: 2 });
    await scheduler.schedule({ content: "first", priority: 0 });
    await scheduler.schedule({ content: "second", priority: 1 });
    await scheduler.start();

    await waitFor(() => completed.length === 3);

    expect(executor.calls.map((j) => j.content)).toEqual(["first", "second", "third"]);
  });

  test("a job added while idle is picked up without waiting for the poll", async () => {
    const executor = new ScriptedExecutor([() => succeed()]);
    const idle: number[] = [];
    scheduler = new Scheduler({ executor, pollIntervalMs: 60_000 });
    scheduler.on("worker:idle", ({ delayMs }) => idle.push(delayMs));

    await scheduler.start();
    await waitFor(() => idle.length > 0);
    expect(idle[0]).toBe(60_000);

    const job = await scheduler.schedule({ content: "late arrival" });

    await waitFor(() => executor.calls.length === 1);
    expect(executor.calls[0]?.id).toBe(job.id);
  });

  test("failed attempts are retried by the loop until they run out", async () => {
    const executor = new ScriptedExecutor([() => fail("flaky")]);
    const failed: Job[] = [];
    scheduler = new Scheduler({ executor, pollIntervalMs: 10_000 });
    scheduler.on("job:fail", ({ job }) => failed.push(job));

    const job = await scheduler.schedule({ content: "flaky", maxRetries: 3 });
    await scheduler.start();

    await waitFor(() => failed.length === 1);

    expect(executor.calls).toHaveLength(3);
    expect(failed[0]?.id).toBe(job.id);
    expect(failed[0]?.retryCount).toBe(3);
  });

  test("cancelling the running job moves on to the next", async () => {
    const store = new InMemoryJobStore();
    let started = false;
    const executor = new ScriptedExecutor([
      untilAborted(() => (started = true)),
      () => succeed(),
    ]);
    const completed: Job[] = [];
    scheduler = new Scheduler({ store, executor, pollIntervalMs: 10_000 });
    scheduler.on("job:success", (job) => completed.push(job));

    const slow = await scheduler.schedule({ content: "slow", priority: 0 });
    const quick = await scheduler.schedule({ content: "quick", priority: 1 });
    await scheduler.start();

    await waitFor(() => started);
    await scheduler.cancel(slow.id);
    await waitFor(() => completed.length === 1);

    expect(completed[0]?.id).toBe(quick.id);
    expect((await store.findById(slow.id))?.status).toBe("cancelled");
  });

  test("a job that stays queued but cannot be picked waits out the poll", async () => {
    const store = new UnpickableStore();
    const executor = new ScriptedExecutor([() => succeed()]);
    const local = new Scheduler({ store, executor, pollIntervalMs: 5_000 });

    const job = await local.schedule({ content: "stuck" });
    const result = await local.runNext();

    expect(result.outcome).toBe("cancelled");
    expect(result.delayMs).toBe(5_000);
    expect(executor.calls).toEqual([]);
    expect((await store.findById(job.id))?.status).toBe("queued");
  });

  test("timeouts longer than a timer span do not fire early", async () => {
    const executor = new ScriptedExecutor([
      async () => {
        await sleep(50);
        return succeed();
      },
    ]);
    const local = new Scheduler({ executor });

    await local.schedule({ content: "patient", timeoutSeconds: 3_000_000 });
    const result = await local.runNext();

    expect(result.outcome).toBe("completed");
  });

  test("a reset far in the future does not spin the loop", async () => {
    const store = new InMemoryJobStore();
    await store.saveState({
      ...createQueueState(),
      rateLimited: true,
      estimatedResetAt: new Date("2300-01-01T00:00:00.000Z"),
    });
    const idle: number[] = [];
    scheduler = new Scheduler({
      store,
      executor: new ScriptedExecutor([() => succeed()]),
    });
    scheduler.on("worker:idle", ({ delayMs }) => idle.push(delayMs));

    await scheduler.start();
    await sleep(100);

    expect(idle).toHaveLength(1);
  });
});
