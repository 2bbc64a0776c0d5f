import { promises as fs, constants as fsConstants } from "fs";
import path from "path";
import { randomUUID } from "crypto";
import { StoreEmitter } from "../events";
import { Job } from "../types/job";
import { Bucket, JobStatus, bucketFor, canTransition } from "../types/lifecycle";
import { JobQuery } from "../types/query";
import { QueueState, createQueueState } from "../types/state";
import { JobStore, NewJob } from "./job-store";
import { Mutex } from "./mutex";
import { applyQuery, bucketsFor } from "./query";
import { isNotFound, writeFileAtomic } from "./atomic-file";
import {
  baseNameFor,
  fileNameFor,
  parseFileName,
  parseJob,
  serializeJob,
  statusFromLocation,
} from "./record-format";
import { parseState, serializeState } from "./state-format";
import {
  CorruptRecordError,
  InvalidTransitionError,
  JobNotFoundError,
  JobValidationError,
  StorageUnavailableError,
} from "./store-errors";

export interface FileJobStoreOptions {
  /**
   * Root of the queue. Buckets, temp files and the state file live below it.
   */
  directory: string;

  /**
   * Id source, mostly for tests. Defaults to 8 hex characters.
   */
  generateId?: () => string;
}

export const BUCKET_DIRECTORIES: Readonly<Record<Bucket, string>> = {
  pending: "queue",
  completed: "completed",
  failed: "failed",
};

const TEMP_DIRECTORY = ".tmp";
const QUARANTINE_DIRECTORY = "quarantine";
const STATE_FILE = "queue-state.json";
const BUCKET_ORDER: Bucket[] = ["pending", "completed", "failed"];

interface StoredRecord {
  id: string;
  bucket: Bucket;
  name: string;
  base: string;
  status: JobStatus;
}

/**
 * Job records as markdown files, one directory per lifecycle bucket.
 *
 * Every write goes through `.tmp/` and a rename, so enumeration never sees a
 * partial file. A status change rewrites the record where it stands and then
 * renames it into its new bucket; that rename is the commit.
 *
 * Assumes a single writing process per directory.
 */
export class FileJobStore extends StoreEmitter implements JobStore {
  readonly directory: string;
  private readonly tempDir: string;
  private readonly quarantineDir: string;
  private readonly stateFile: string;
  private readonly generateId: () => string;
  private readonly mutex = new Mutex();

  constructor(options: FileJobStoreOptions) {
    super();
    this.directory = path.resolve(options.directory);
    this.tempDir = path.join(this.directory, TEMP_DIRECTORY);
    this.quarantineDir = path.join(this.directory, QUARANTINE_DIRECTORY);
    this.stateFile = path.join(this.directory, STATE_FILE);
    this.generateId =
      options.generateId ?? (() => randomUUID().replace(/-/g, "").slice(0, 8));
  }

  bucketDir(bucket: Bucket): string {
    return path.join(this.directory, BUCKET_DIRECTORIES[bucket]);
  }

  async init(): Promise<void> {
    const dirs = [
      this.directory,
      this.tempDir,
      this.quarantineDir,
      ...BUCKET_ORDER.map((b) => this.bucketDir(b)),
    ];

    try {
      for (const dir of dirs) {
        await fs.mkdir(dir, { recursive: true });
        await fs.access(dir, fsConstants.R_OK | fsConstants.W_OK);
      }
    } catch (err) {
      throw new StorageUnavailableError(this.directory, err);
    }
  }

  async create(job: NewJob): Promise<Job> {
    if (job.status !== "queued") {
      throw new JobValidationError(`New jobs must be queued, got ${job.status}`);
    }

    return this.mutex.runExclusive(async () => {
      const id = await this.freshId();
      const stored: Job = { ...job, id };
      const target = path.join(
        this.bucketDir("pending"),
        fileNameFor(baseNameFor(stored), "queued")
      );

      await writeFileAtomic(this.tempDir, target, serializeJob(stored));
      return stored;
    });
  }

  async findById(jobId: string): Promise<Job | null> {
    const record = await this.locate(jobId);
    if (!record) return null;
    return this.read(record);
  }

  async findAll(query: JobQuery = {}): Promise<Job[]> {
    const buckets = bucketsFor(query);
    const records = (await this.listRecords()).filter((r) =>
      buckets.includes(r.bucket)
    );
    return applyQuery(await this.readRecords(records), query);
  }

  async findPending(): Promise<Job[]> {
    return this.readRecords(await this.listBucket("pending"));
  }

  async transition(job: Job, to: JobStatus): Promise<Job> {
    return this.mutex.runExclusive(async () => {
      const record = await this.locate(job.id);
      if (!record) throw new JobNotFoundError(job.id);
      return this.commit(record, job, to);
    });
  }

  async update(job: Job): Promise<Job> {
    return this.mutex.runExclusive(async () => {
      const record = await this.locate(job.id);
      if (!record) throw new JobNotFoundError(job.id);
      if (record.status !== job.status) {
        throw new InvalidTransitionError(job.id, record.status, job.status);
      }

      const stored: Job = { ...job, status: record.status };
      await writeFileAtomic(this.tempDir, this.pathOf(record), serializeJob(stored));
      return stored;
    });
  }

  async delete(jobId: string): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      const record = await this.locate(jobId);
      if (!record) return false;

      try {
        await fs.unlink(this.pathOf(record));
      } catch (err) {
        if (isNotFound(err)) return false;
        throw err;
      }
      return true;
    });
  }

  async recoverInterrupted(): Promise<Job[]> {
    return this.mutex.runExclusive(async () => {
      // leftovers of writes interrupted by a crash
      for (const name of await fs.readdir(this.tempDir)) {
        await fs.rm(path.join(this.tempDir, name), { force: true });
      }

      const recovered: Job[] = [];

      for (const record of await this.listBucket("pending")) {
        if (record.status !== "executing") continue;

        const job = await this.readOrQuarantine(record);
        if (!job) continue;

        recovered.push(await this.commit(record, job, "queued"));
      }

      return recovered;
    });
  }

  async loadState(): Promise<QueueState> {
    let text: string;
    try {
      text = await fs.readFile(this.stateFile, "utf8");
    } catch (err) {
      if (isNotFound(err)) return createQueueState();
      throw err;
    }

    try {
      return parseState(text, STATE_FILE);
    } catch (err) {
      if (!(err instanceof CorruptRecordError)) throw err;
      await this.quarantine(this.stateFile, err);
      return createQueueState();
    }
  }

  async saveState(state: QueueState): Promise<void> {
    await writeFileAtomic(this.tempDir, this.stateFile, serializeState(state));
  }

  /**
   * Absolute path of the file currently holding the job
   */
  async pathFor(jobId: string): Promise<string | null> {
    const record = await this.locate(jobId);
    return record ? this.pathOf(record) : null;
  }

  private async commit(
    record: StoredRecord,
    job: Job,
    to: JobStatus
  ): Promise<Job> {
    if (!canTransition(record.status, to)) {
      throw new InvalidTransitionError(job.id, record.status, to);
    }

    const next: Job = { ...job, status: to };
    const source = this.pathOf(record);
    const target = path.join(
      this.bucketDir(bucketFor(to)),
      fileNameFor(record.base, to)
    );

    // stage the new fields in place, then move: the rename is the commit
    await writeFileAtomic(this.tempDir, source, serializeJob(next));
    await fs.rename(source, target);

    return next;
  }

  private async freshId(): Promise<string> {
    for (let attempt = 0; attempt < 20; attempt++) {
      const id = this.generateId();
      if (!(await this.locate(id)) && !(await this.isQuarantined(id))) {
        return id;
      }
    }
    throw new Error("Could not allocate a unique job id");
  }

  private async isQuarantined(jobId: string): Promise<boolean> {
    const names = await fs.readdir(this.quarantineDir).catch((err: unknown) => {
      if (isNotFound(err)) return [];
      throw err;
    });
    return names.some((name) => name.includes(`-${jobId}-`));
  }

  private async locate(jobId: string): Promise<StoredRecord | null> {
    const records = await this.listRecords();
    return records.find((r) => r.id === jobId) ?? null;
  }

  private async listBucket(bucket: Bucket): Promise<StoredRecord[]> {
    return (await this.listRecords()).filter((r) => r.bucket === bucket);
  }

  /**
   * Every record in bucket order. Ids come from file names, so two prompts
   * such as `fix-bug.md` and `fix-tests.md` would share one; the later file
   * is quarantined.
   */
  private async listRecords(): Promise<StoredRecord[]> {
    const records: StoredRecord[] = [];
    const seen = new Set<string>();

    for (const bucket of BUCKET_ORDER) {
      for (const record of await this.scanBucket(bucket)) {
        if (seen.has(record.id)) {
          await this.quarantine(
            this.pathOf(record),
            new CorruptRecordError(record.name, `duplicate id ${record.id}`)
          );
          continue;
        }
        seen.add(record.id);
        records.push(record);
      }
    }
    return records;
  }

  private async scanBucket(bucket: Bucket): Promise<StoredRecord[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.bucketDir(bucket));
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    const records: StoredRecord[] = [];
    for (const name of names.sort()) {
      const parsed = parseFileName(name);
      if (!parsed) continue;

      records.push({
        id: parsed.id,
        bucket,
        name,
        base: parsed.base,
        status: statusFromLocation(bucket, parsed.marker),
      });
    }
    return records;
  }

  private async readRecords(records: StoredRecord[]): Promise<Job[]> {
    const jobs: Job[] = [];
    for (const record of records) {
      const job = await this.readOrQuarantine(record);
      if (job) jobs.push(job);
    }
    return jobs;
  }

  private async readOrQuarantine(record: StoredRecord): Promise<Job | null> {
    try {
      return await this.read(record);
    } catch (err) {
      if (isNotFound(err)) return null; // moved while we were scanning
      if (!(err instanceof CorruptRecordError)) throw err;

      await this.quarantine(this.pathOf(record), err);
      return null;
    }
  }

  private async read(record: StoredRecord): Promise<Job> {
    const file = this.pathOf(record);
    const [text, stats] = await Promise.all([
      fs.readFile(file, "utf8"),
      fs.stat(file),
    ]);

    return parseJob(text, {
      fileName: record.name,
      status: record.status,
      modifiedAt: stats.mtime,
    });
  }

  private async quarantine(file: string, error: Error): Promise<void> {
    const quarantinedTo = path.join(
      this.quarantineDir,
      `${Date.now()}-${path.basename(file)}`
    );

    try {
      await fs.rename(file, quarantinedTo);
    } catch (err) {
      if (!isNotFound(err)) throw err;
      return;
    }

    this.emitSafe("record:quarantined", { file, quarantinedTo, error });
  }

  private pathOf(record: StoredRecord): string {
    return path.join(this.bucketDir(record.bucket), record.name);
  }
}
