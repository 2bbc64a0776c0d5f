import { InMemoryJobStore } from "../../src/store/in-memory-job-store";
import {
  InvalidTransitionError,
  JobNotFoundError,
  JobValidationError,
} from "../../src/store/store-errors";
import { createQueueState } from "../../src/types/state";
import { makeJob } from "../helpers";

describe("In Memory Job Store", () => {
  test("creates a job", async () => {
    const store = new InMemoryJobStore();

    const job = await store.create(makeJob());

    expect(job.id).toMatch(/^[0-9a-f]{8}$/);
    expect(job.status).toBe("queued");
    expect(await store.findById(job.id)).toEqual(job);
  });

  test("only queued jobs can be created", async () => {
    const store = new InMemoryJobStore();

    await expect(store.create(makeJob({ status: "completed" }))).rejects.toThrow(
      JobValidationError
    );
  });

  test("returned jobs are copies", async () => {
    const store = new InMemoryJobStore();
    const job = await store.create(makeJob({ contextFiles: ["a.md"] }));

    job.contextFiles.push("b.md");
    job.executionLog.push({ at: new Date(), message: "local only" });

    const stored = await store.findById(job.id);
    expect(stored?.contextFiles).toEqual(["a.md"]);
    expect(stored?.executionLog).toEqual([]);
  });

  test("follows the lifecycle table", async () => {
    const store = new InMemoryJobStore();
    const job = await store.create(makeJob());

    const executing = await store.transition(job, "executing");
    const done = await store.transition(executing, "completed");

    expect(done.status).toBe("completed");
    await expect(store.transition(done, "queued")).rejects.toThrow(
      InvalidTransitionError
    );
  });

  test("does not allow double pickup", async () => {
    const store = new InMemoryJobStore();
    const job = await store.create(makeJob());

    const [first, second] = await Promise.allSettled([
      store.transition(job, "executing"),
      store.transition({ ...job }, "executing"),
    ]);

    expect(first.status).toBe("fulfilled");
    expect(second.status).toBe("rejected");
  });

  test("transition of a deleted job", async () => {
    const store = new InMemoryJobStore();
    const job = await store.create(makeJob());
    await store.delete(job.id);

    await expect(store.transition(job, "executing")).rejects.toThrow(JobNotFoundError);
  });

  test("update keeps the status", async () => {
    const store = new InMemoryJobStore();
    const job = await store.create(makeJob());

    await store.update({ ...job, priority: 9 });
    expect((await store.findById(job.id))?.priority).toBe(9);

    await expect(store.update({ ...job, status: "failed" })).rejects.toThrow(
      InvalidTransitionError
    );
  });

  test("update waits for a pending transition and sees its status", async () => {
    const store = new InMemoryJobStore();
    const job = await store.create(makeJob());

    const [picked, updated] = await Promise.allSettled([
      store.transition(job, "executing"),
      store.update({ ...job, priority: 9 }),
    ]);

    expect(picked.status).toBe("fulfilled");
    expect(updated.status).toBe("rejected");
    if (updated.status === "rejected") {
      expect(updated.reason).toBeInstanceOf(InvalidTransitionError);
    }

    const stored = await store.findById(job.id);
    expect(stored?.status).toBe("executing");
    expect(stored?.priority).toBe(0);
  });

  test("pending covers queued and executing jobs", async () => {
    const store = new InMemoryJobStore();
    const a = await store.create(makeJob({ content: "a" }));
    const b = await store.create(makeJob({ content: "b" }));
    const c = await store.create(makeJob({ content: "c" }));
    await store.transition(b, "executing");
    await store.transition(c, "cancelled");

    const pending = await store.findPending();

    expect(pending.map((j) => j.id).sort()).toEqual([a.id, b.id].sort());
  });

  test("recovers executing jobs", async () => {
    const store = new InMemoryJobStore();
    const job = await store.create(makeJob());
    await store.transition(job, "executing");

    const recovered = await store.recoverInterrupted();

    expect(recovered.map((j) => j.id)).toEqual([job.id]);
    expect((await store.findById(job.id))?.status).toBe("queued");
  });

  test("state round trip", async () => {
    const store = new InMemoryJobStore();
    const state = { ...createQueueState(), totalAdded: 4, rateLimited: true };

    await store.saveState(state);

    expect(await store.loadState()).toEqual(state);
  });
});
