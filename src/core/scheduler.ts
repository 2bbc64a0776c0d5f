import { SchedulerEmitter } from "../events";
import {
  InMemoryJobStore,
  InvalidTransitionError,
  JobExecutingError,
  JobNotFoundError,
  JobStore,
  JobValidationError,
} from "../store";
import { Mutex } from "../store/mutex";
import { SchedulerEventMap } from "../types/events";
import { JobExecutor, PostExecutionHook } from "../types/execution";
import { Job, PERMISSION_MODES, appendLog } from "../types/job";
import { JobStatus } from "../types/lifecycle";
import { JobQuery } from "../types/query";
import { ScheduleOptions } from "../types/schedule";
import { QueueState } from "../types/state";
import { Worker } from "../worker/worker";
import { CycleResult, StateAccess, WorkerOptions } from "../worker/types";
import { selectNext } from "../worker/selection";

export interface SchedulerOptions extends WorkerOptions {
  /**
   * Optional unique id for this scheduler instance
   */
  id?: string;

  /**
   * Defaults to an in-memory store
   */
  store?: JobStore;

  /**
   * Runs job prompts. Without one the scheduler only manages the queue.
   */
  executor?: JobExecutor;

  /**
   * Called after each successful run; failures are reported as warnings
   */
  postExecution?: PostExecutionHook;
}

export interface RetryOptions {
  deleteOriginal?: boolean;
}

export interface QueueStatus {
  state: QueueState;
  counts: Record<JobStatus, number>;
  nextJobId?: string;
}

export class Scheduler {
  private readonly emitter: SchedulerEmitter;
  private readonly store: JobStore;
  private readonly executor?: JobExecutor;
  private readonly postExecution?: PostExecutionHook;
  private readonly workerOptions: WorkerOptions;
  private readonly stateLock = new Mutex();
  private readonly now: () => Date;
  private worker?: Worker;
  private started = false;
  private initialized = false;
  private recovered = false;
  private readonly id: string;

  constructor(options: SchedulerOptions = {}) {
    this.id = options.id ?? `scheduler-${Math.random().toString(36).slice(2)}`;
    this.emitter = new SchedulerEmitter();
    this.store = options.store ?? new InMemoryJobStore();
    this.executor = options.executor;
    this.postExecution = options.postExecution;
    this.now = options.now ?? (() => new Date());

    this.workerOptions = {
      pollIntervalMs: options.pollIntervalMs,
      rateLimitBufferMs: options.rateLimitBufferMs,
      defaultTimeoutSeconds: options.defaultTimeoutSeconds,
      abortGraceMs: options.abortGraceMs,
      rateLimit: options.rateLimit,
      workerId: options.workerId ?? `${this.id}-worker`,
      now: this.now,
    };

    this.store.on("record:quarantined", (record) => {
      this.emitter.emitSafe("store:quarantined", record);
    });
  }

  /**
   * Subscribe to scheduler events
   */
  on<K extends keyof SchedulerEventMap & string>(
    event: K,
    listener: (payload: SchedulerEventMap[K]) => void
  ): this {
    this.emitter.on(event, listener);
    return this;
  }

  /**
   * Verify storage, recover interrupted jobs and start the worker loop
   */
  async start(): Promise<void> {
    if (this.started) return;

    await this.prepare();
    await this.recover();

    this.started = true;
    this.emitter.emitSafe("scheduler:start", undefined);

    if (this.executor) {
      this.worker = this.createWorker(this.executor);
      await this.worker.start();
    }
  }

  /**
   * Stop scheduler. See Worker.stop for the graceful contract.
   */
  async stop(options?: { graceful?: boolean; timeoutMs?: number }): Promise<void> {
    const wasStarted = this.started;
    if (!wasStarted && !this.worker) return;

    this.started = false;

    if (this.worker) {
      await this.worker.stop(options);
      this.worker = undefined;
    }

    if (wasStarted) this.emitter.emitSafe("scheduler:stop", undefined);
  }

  /**
   * Recover, then run a single selection-and-execution cycle
   */
  async runNext(): Promise<CycleResult> {
    if (this.started) {
      throw new Error("runNext() cannot be used while the scheduler is running");
    }
    if (!this.executor) {
      throw new Error("runNext() needs an executor");
    }

    if (this.worker) {
      throw new Error("runNext() is already in progress");
    }

    await this.prepare();
    await this.recover();

    // tracked so that stop() can interrupt the run
    const worker = this.createWorker(this.executor);
    this.worker = worker;
    try {
      return await worker.runCycle();
    } finally {
      if (this.worker === worker) this.worker = undefined;
    }
  }

  async schedule(options: ScheduleOptions): Promise<Job> {
    validateScheduleOptions(options);
    await this.prepare();

    const job = await this.store.create({
      content: options.content.trim(),
      priority: options.priority ?? 0,
      status: "queued",
      retryCount: 0,
      maxRetries: options.maxRetries ?? 3,
      workingDirectory: options.workingDirectory ?? ".",
      contextFiles: options.contextFiles ?? [],
      model: options.model,
      permissionMode: options.permissionMode,
      allowedTools: options.allowedTools,
      timeoutSeconds: options.timeoutSeconds,
      vcsBookmark: options.vcsBookmark,
      estimatedTokens: options.estimatedTokens,
      notBeforeTime: options.notBeforeTime,
      createdAt: this.now(),
      executionLog: [],
    });

    await this.stateAccess.mutate((s) => {
      s.totalAdded++;
    });

    this.emitter.emitSafe("job:created", job);
    this.worker?.wake();

    return job;
  }

  /**
   * Cancel a queued or executing job. An executing run is aborted after the
   * cancellation is committed; its result is discarded.
   */
  async cancel(jobId: string): Promise<Job> {
    await this.prepare();

    const job = await this.store.findById(jobId);
    if (!job) throw new JobNotFoundError(jobId);

    const cancelled = await this.store.transition(
      appendLog(job, "Cancelled", this.now()),
      "cancelled"
    );

    await this.stateAccess.mutate((s) => {
      s.totalCancelled++;
    });

    this.worker?.abortJob(jobId, "cancelled");
    this.emitter.emitSafe("job:cancel", cancelled);

    return cancelled;
  }

  /**
   * Remove a job record. Executing jobs must be cancelled first.
   */
  async delete(jobId: string): Promise<boolean> {
    await this.prepare();

    const job = await this.store.findById(jobId);
    if (!job) return false;
    if (job.status === "executing") throw new JobExecutingError(jobId);

    const deleted = await this.store.delete(jobId);
    if (deleted) this.emitter.emitSafe("job:deleted", jobId);
    return deleted;
  }

  /**
   * Queue a fresh copy of a failed or cancelled job
   */
  async retry(jobId: string, options: RetryOptions = {}): Promise<Job> {
    await this.prepare();

    const original = await this.store.findById(jobId);
    if (!original) throw new JobNotFoundError(jobId);
    if (original.status !== "failed" && original.status !== "cancelled") {
      throw new InvalidTransitionError(jobId, original.status, "queued");
    }

    const job = await this.store.create({
      content: original.content,
      priority: original.priority,
      status: "queued",
      retryCount: 0,
      maxRetries: original.maxRetries,
      workingDirectory: original.workingDirectory,
      contextFiles: original.contextFiles,
      model: original.model,
      permissionMode: original.permissionMode,
      allowedTools: original.allowedTools,
      timeoutSeconds: original.timeoutSeconds,
      vcsBookmark: original.vcsBookmark,
      estimatedTokens: original.estimatedTokens,
      createdAt: this.now(),
      retriedFrom: original.id,
      executionLog: [],
    });

    await this.stateAccess.mutate((s) => {
      s.totalAdded++;
    });
    this.emitter.emitSafe("job:created", job);

    if (options.deleteOriginal && (await this.store.delete(original.id))) {
      this.emitter.emitSafe("job:deleted", original.id);
    }

    this.worker?.wake();
    return job;
  }

  async getJob(jobId: string): Promise<Job | null> {
    await this.prepare();
    return this.store.findById(jobId);
  }

  async listJobs(query: JobQuery = {}): Promise<Job[]> {
    await this.prepare();
    return this.store.findAll(query);
  }

  /**
   * The job the next cycle would pick, if any
   */
  async getNextJob(): Promise<Job | null> {
    await this.prepare();
    return selectNext(await this.store.findPending(), this.now());
  }

  async getStatus(): Promise<QueueStatus> {
    await this.prepare();

    const jobs = await this.store.findAll({ includeFinished: true });
    const counts: Record<JobStatus, number> = {
      queued: 0,
      executing: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
    };
    for (const job of jobs) counts[job.status]++;

    const next = selectNext(
      jobs.filter((j) => j.status === "queued"),
      this.now()
    );

    return {
      state: await this.stateAccess.read(),
      counts,
      nextJobId: next?.id,
    };
  }

  /**
   * For testing / inspection
   */
  isRunning(): boolean {
    return this.started;
  }

  getId(): string {
    return this.id;
  }

  /**
   * Queue state is re-read on every access so that jobs added by another
   * process are counted
   */
  private readonly stateAccess: StateAccess = {
    read: () => this.store.loadState(),
    mutate: (apply) =>
      this.stateLock.runExclusive(async () => {
        const state = await this.store.loadState();
        apply(state);
        await this.store.saveState(state);
        return state;
      }),
  };

  private async prepare(): Promise<void> {
    if (this.initialized) return;

    await this.store.init();
    this.initialized = true;
  }

  /**
   * Anything left executing belongs to a process that died mid-run. Only the
   * processes that run jobs do this; `add` or `list` next to a live worker
   * must not touch its in-flight record.
   */
  private async recover(): Promise<void> {
    if (this.recovered) return;
    this.recovered = true;

    this.emitter.emitSafe("resume:start", undefined);

    const recovered = await this.store.recoverInterrupted();
    for (const job of recovered) {
      this.emitter.emitSafe("resume:jobRecovered", job);
    }

    this.emitter.emitSafe("resume:complete", recovered.length);
  }

  private createWorker(executor: JobExecutor): Worker {
    return new Worker(
      this.store,
      this.emitter,
      this.stateAccess,
      executor,
      this.postExecution,
      this.workerOptions
    );
  }
}

function validateScheduleOptions(options: ScheduleOptions): void {
  if (typeof options.content !== "string" || !options.content.trim()) {
    throw new JobValidationError("Job content must be a non-empty prompt");
  }

  const integers: Array<[string, number | undefined, number]> = [
    ["priority", options.priority, -Infinity],
    ["maxRetries", options.maxRetries, 1],
    ["timeoutSeconds", options.timeoutSeconds, 1],
    ["estimatedTokens", options.estimatedTokens, 0],
  ];

  for (const [name, value, min] of integers) {
    if (value === undefined) continue;
    if (!Number.isInteger(value) || value < min) {
      throw new JobValidationError(
        min === -Infinity
          ? `${name} must be an integer`
          : `${name} must be an integer >= ${min}`
      );
    }
  }

  if (
    options.permissionMode !== undefined &&
    !PERMISSION_MODES.includes(options.permissionMode)
  ) {
    throw new JobValidationError(
      `permissionMode must be one of ${PERMISSION_MODES.join(", ")}`
    );
  }

  if (
    options.notBeforeTime !== undefined &&
    (!(options.notBeforeTime instanceof Date) ||
      Number.isNaN(options.notBeforeTime.getTime()))
  ) {
    throw new JobValidationError("notBeforeTime must be a valid Date");
  }

  if (options.contextFiles?.some((f) => typeof f !== "string" || !f.trim())) {
    throw new JobValidationError("contextFiles must be non-empty paths");
  }
}
