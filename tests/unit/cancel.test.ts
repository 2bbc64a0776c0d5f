import { Scheduler } from "../../src/core/scheduler";
import { InMemoryJobStore } from "../../src/store/in-memory-job-store";
import {
  InvalidTransitionError,
  JobExecutingError,
  JobNotFoundError,
} from "../../src/store/store-errors";
import { CycleResult } from "../../src/worker/types";
import { ScriptedExecutor, succeed, untilAborted, waitFor } from "../helpers";

describe("Scheduler.cancel()", () => {
  test("cancels a queued job", async () => {
    const store = new InMemoryJobStore();
    const scheduler = new Scheduler({ store });

    const job = await scheduler.schedule({ content: "cancel me" });
    expect(job.status).toBe("queued");

    await scheduler.cancel(job.id);

    const check = await store.findById(job.id);
    expect(check?.status).toBe("cancelled");
    expect(check?.executionLog.map((e) => e.message)).toEqual(["Cancelled"]);
    expect((await scheduler.getStatus()).state.totalCancelled).toBe(1);
  });

  test("cancel() on an executing job owned elsewhere marks it cancelled", async () => {
    const store = new InMemoryJobStore();
    const scheduler = new Scheduler({ store });

    const job = await scheduler.schedule({ content: "test" });
    await store.transition(job, "executing");

    await scheduler.cancel(job.id);

    const check = await store.findById(job.id);
    expect(check?.status).toBe("cancelled");
  });

  test("aborts the in-flight run and drops its result", async () => {
    const store = new InMemoryJobStore();
    let started = false;
    const executor = new ScriptedExecutor([untilAborted(() => (started = true))]);
    const scheduler = new Scheduler({ store, executor });

    const job = await scheduler.schedule({ content: "long job" });
    const run = scheduler.runNext();

    await waitFor(() => started);
    await scheduler.cancel(job.id);

    const result: CycleResult = await run;
    expect(result.outcome).toBe("cancelled");

    const check = await store.findById(job.id);
    expect(check?.status).toBe("cancelled");
    expect(check?.retryCount).toBe(0);
    expect(check?.executionLog.map((e) => e.message)).toEqual(["Cancelled"]);
  });

  test("finished jobs cannot be cancelled", async () => {
    const store = new InMemoryJobStore();
    const scheduler = new Scheduler({
      store,
      executor: new ScriptedExecutor([() => succeed()]),
    });

    const job = await scheduler.schedule({ content: "quick" });
    await scheduler.runNext();

    await expect(scheduler.cancel(job.id)).rejects.toThrow(InvalidTransitionError);
  });

  test("unknown ids are reported", async () => {
    const scheduler = new Scheduler();

    await expect(scheduler.cancel("nope")).rejects.toThrow(JobNotFoundError);
  });
});

describe("Scheduler.delete()", () => {
  test("removes a job from any bucket", async () => {
    const scheduler = new Scheduler();
    const job = await scheduler.schedule({ content: "remove me" });
    const deleted: string[] = [];
    scheduler.on("job:deleted", (id) => deleted.push(id));

    expect(await scheduler.delete(job.id)).toBe(true);
    expect(await scheduler.getJob(job.id)).toBeNull();
    expect(deleted).toEqual([job.id]);
  });

  test("refuses executing jobs", async () => {
    const store = new InMemoryJobStore();
    const scheduler = new Scheduler({ store });
    const job = await scheduler.schedule({ content: "busy" });
    await store.transition(job, "executing");

    await expect(scheduler.delete(job.id)).rejects.toThrow(JobExecutingError);
  });

  test("unknown ids return false", async () => {
    const scheduler = new Scheduler();

    expect(await scheduler.delete("nope")).toBe(false);
  });
});
