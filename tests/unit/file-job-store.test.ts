import { promises as fs } from "fs";
import path from "path";
import { FileJobStore } from "../../src/store/file-job-store";
import {
  InvalidTransitionError,
  StorageUnavailableError,
} from "../../src/store/store-errors";
import { QuarantinedRecord } from "../../src/types/events";
import { appendLog } from "../../src/types/job";
import { makeJob, makeTempDir } from "../helpers";

async function listDir(dir: string): Promise<string[]> {
  return (await fs.readdir(dir)).sort();
}

describe("FileJobStore", () => {
  let dir: string;
  let store: FileJobStore;

  beforeEach(async () => {
    dir = await makeTempDir();
    store = new FileJobStore({ directory: dir });
    await store.init();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test("init lays out the buckets", async () => {
    expect(await listDir(dir)).toEqual([
      ".tmp",
      "completed",
      "failed",
      "quarantine",
      "queue",
    ]);
  });

  test("creates a queued record under an 8 hex id", async () => {
    const job = await store.create(makeJob({ content: "Fix the login form" }));

    expect(job.id).toMatch(/^[0-9a-f]{8}$/);
    expect(await listDir(path.join(dir, "queue"))).toEqual([
      `${job.id}-fix-the-login-form.md`,
    ]);
    expect(await store.findById(job.id)).toEqual(job);
  });

  test("skips ids that are already taken", async () => {
    const ids = ["aaaa1111", "aaaa1111", "bbbb2222"];
    const seeded = new FileJobStore({
      directory: dir,
      generateId: () => ids.shift() ?? "cccc3333",
    });

    const first = await seeded.create(makeJob());
    const second = await seeded.create(makeJob());

    expect(first.id).toBe("aaaa1111");
    expect(second.id).toBe("bbbb2222");
  });

  test("executing jobs carry the in-flight marker", async () => {
    const job = await store.create(makeJob({ content: "Fix it" }));

    const running = await store.transition(job, "executing");

    expect(running.status).toBe("executing");
    expect(await listDir(path.join(dir, "queue"))).toEqual([
      `${job.id}-fix-it.executing.md`,
    ]);
    expect((await store.findById(job.id))?.status).toBe("executing");
  });

  test("completion moves the record and its new fields", async () => {
    const job = await store.create(makeJob({ content: "Fix it" }));
    const running = await store.transition(job, "executing");

    const at = new Date("2026-01-15T10:10:00.000Z");
    await store.transition(appendLog(running, "Attempt 1/3 succeeded", at), "completed");

    expect(await listDir(path.join(dir, "queue"))).toEqual([]);
    expect(await listDir(path.join(dir, "completed"))).toEqual([
      `${job.id}-fix-it.md`,
    ]);

    const text = await fs.readFile(
      path.join(dir, "completed", `${job.id}-fix-it.md`),
      "utf8"
    );
    expect(text).toContain("status: completed");
    expect(text).toContain("[2026-01-15T10:10:00.000Z] Attempt 1/3 succeeded");
  });

  test("cancelled records land in the failed bucket with a marker", async () => {
    const job = await store.create(makeJob({ content: "Fix it" }));

    await store.transition(job, "cancelled");

    expect(await listDir(path.join(dir, "failed"))).toEqual([
      `${job.id}-fix-it.cancelled.md`,
    ]);
    expect((await store.findById(job.id))?.status).toBe("cancelled");
  });

  test("rejects edges outside the lifecycle and leaves the file alone", async () => {
    const job = await store.create(makeJob({ content: "Fix it" }));

    await expect(store.transition(job, "completed")).rejects.toThrow(
      InvalidTransitionError
    );
    expect(await listDir(path.join(dir, "queue"))).toEqual([`${job.id}-fix-it.md`]);
  });

  test("update rewrites in place when the status matches", async () => {
    const job = await store.create(makeJob());

    await store.update({ ...job, priority: 7 });

    expect((await store.findById(job.id))?.priority).toBe(7);
    await expect(store.update({ ...job, status: "completed" })).rejects.toThrow(
      InvalidTransitionError
    );
  });

  test("recovers interrupted jobs without touching other fields", async () => {
    const job = await store.create(makeJob({ retryCount: 1 }));
    const running = await store.transition(
      { ...job, executionStartedAt: new Date("2026-01-15T10:05:00.000Z") },
      "executing"
    );

    const recovered = await store.recoverInterrupted();

    expect(recovered).toEqual([{ ...running, status: "queued" }]);
    expect(await store.findById(job.id)).toEqual({ ...running, status: "queued" });
  });

  test("quarantines unreadable records and keeps the rest", async () => {
    const good = await store.create(makeJob());
    await fs.writeFile(
      path.join(dir, "queue", "deadbeef-bad.md"),
      "---\npriority: [1, 2\n---\nbody\n"
    );

    const events: QuarantinedRecord[] = [];
    store.on("record:quarantined", (record) => events.push(record));

    const pending = await store.findPending();

    expect(pending.map((j) => j.id)).toEqual([good.id]);
    expect(events).toHaveLength(1);
    expect(events[0]?.file).toBe(path.join(dir, "queue", "deadbeef-bad.md"));

    const quarantined = await listDir(path.join(dir, "quarantine"));
    expect(quarantined).toHaveLength(1);
    expect(quarantined[0]).toMatch(/^\d+-deadbeef-bad\.md$/);
  });

  test("picks up hand-written prompt files", async () => {
    await fs.writeFile(path.join(dir, "queue", "handmade.md"), "Write docs\n");

    const pending = await store.findPending();

    expect(pending).toHaveLength(1);
    expect(pending[0]?.id).toBe("handmade");
    expect(pending[0]?.content).toBe("Write docs");
  });

  test("a header id that differs from the file name does not hide the job", async () => {
    await fs.writeFile(
      path.join(dir, "queue", "xyz-fix.md"),
      "---\nid: abc\n---\nFix the build\n"
    );

    const [job] = await store.findPending();
    expect(job?.id).toBe("xyz");
    if (!job) return;

    const running = await store.transition(job, "executing");

    expect(running.status).toBe("executing");
    expect(await listDir(path.join(dir, "queue"))).toEqual(["xyz-fix.executing.md"]);
  });

  test("quarantines the later of two prompts that share an id", async () => {
    await fs.writeFile(path.join(dir, "queue", "fix-bug.md"), "Fix the bug\n");
    await fs.writeFile(path.join(dir, "queue", "fix-tests.md"), "Fix the tests\n");

    const events: QuarantinedRecord[] = [];
    store.on("record:quarantined", (record) => events.push(record));

    const jobs = await store.findAll();

    expect(jobs.map((j) => [j.id, j.content])).toEqual([["fix", "Fix the bug"]]);
    expect(events).toHaveLength(1);
    expect(events[0]?.file).toBe(path.join(dir, "queue", "fix-tests.md"));
    expect(events[0]?.error.message).toBe(
      "Corrupt record fix-tests.md: duplicate id fix"
    );

    const quarantined = await listDir(path.join(dir, "quarantine"));
    expect(quarantined).toHaveLength(1);
    expect(quarantined[0]).toMatch(/^\d+-fix-tests\.md$/);
    expect(await listDir(path.join(dir, "queue"))).toEqual(["fix-bug.md"]);
  });

  test("delete removes the record", async () => {
    const job = await store.create(makeJob());

    expect(await store.delete(job.id)).toBe(true);
    expect(await store.delete(job.id)).toBe(false);
    expect(await store.findById(job.id)).toBeNull();
  });

  test("findAll reads finished buckets on request", async () => {
    const queued = await store.create(makeJob({ priority: 1 }));
    const done = await store.create(makeJob({ priority: 0 }));
    await store.transition(await store.transition(done, "executing"), "completed");

    expect((await store.findAll()).map((j) => j.id)).toEqual([queued.id]);
    expect(
      (await store.findAll({ includeFinished: true })).map((j) => j.id)
    ).toEqual([done.id, queued.id]);
    expect(
      (await store.findAll({ status: "completed" })).map((j) => j.id)
    ).toEqual([done.id]);
  });

  test("pathFor points at the current file", async () => {
    const job = await store.create(makeJob({ content: "Fix it" }));

    expect(await store.pathFor(job.id)).toBe(
      path.join(dir, "queue", `${job.id}-fix-it.md`)
    );
    expect(await store.pathFor("00000000")).toBeNull();
  });

  describe("queue state", () => {
    test("starts fresh when there is no state file", async () => {
      const state = await store.loadState();
      expect(state).toEqual({
        totalAdded: 0,
        totalCompleted: 0,
        totalFailed: 0,
        totalCancelled: 0,
        rateLimitedCount: 0,
        rateLimited: false,
      });
    });

    test("persists counters and throttle state", async () => {
      const state = {
        totalAdded: 3,
        totalCompleted: 1,
        totalFailed: 1,
        totalCancelled: 0,
        rateLimitedCount: 2,
        rateLimited: true,
        estimatedResetAt: new Date("2026-01-15T15:00:00.000Z"),
        rateLimitMessage: "Usage limit reached",
        lastProcessedAt: new Date("2026-01-15T10:00:00.000Z"),
      };

      await store.saveState(state);

      expect(await store.loadState()).toEqual(state);
      expect(await listDir(path.join(dir, ".tmp"))).toEqual([]);
    });

    test("a corrupt state file is set aside", async () => {
      await fs.writeFile(path.join(dir, "queue-state.json"), "{ not json");

      const state = await store.loadState();

      expect(state.totalAdded).toBe(0);
      const quarantined = await listDir(path.join(dir, "quarantine"));
      expect(quarantined[0]).toMatch(/^\d+-queue-state\.json$/);
    });
  });

  test("recovery clears temp leftovers; init leaves them to a live writer", async () => {
    await fs.writeFile(path.join(dir, ".tmp", "abc.md.1234.tmp"), "partial");

    await new FileJobStore({ directory: dir }).init();
    expect(await listDir(path.join(dir, ".tmp"))).toEqual(["abc.md.1234.tmp"]);

    await store.recoverInterrupted();
    expect(await listDir(path.join(dir, ".tmp"))).toEqual([]);
  });

  test("unusable directory is fatal", async () => {
    const file = path.join(dir, "not-a-dir");
    await fs.writeFile(file, "");

    const broken = new FileJobStore({ directory: path.join(file, "queue") });

    await expect(broken.init()).rejects.toThrow(StorageUnavailableError);
  });
});
