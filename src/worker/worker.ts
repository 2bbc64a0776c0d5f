import { JobStore, InvalidTransitionError, JobNotFoundError } from "../store";
import { SchedulerEmitter, toError } from "../events";
import { Job, appendLog } from "../types/job";
import {
  ExecutionResult,
  JobExecutor,
  PostExecutionHook,
  RateLimitInfo,
} from "../types/execution";
import { JobStatus } from "../types/lifecycle";
import { QueueState } from "../types/state";
import {
  AbortReason,
  CycleResult,
  StateAccess,
  WorkerOptions,
} from "./types";
import { attemptLabel, decideAfterFailure } from "./retry";
import { RateLimitOptions, classify } from "./rate-limit";
import { estimateResetTime } from "./reset-time";
import { nextEligibleAt, selectNext } from "./selection";
import { MAX_TIMER_MS, setLongTimeout } from "./timers";

interface InFlight {
  jobId: string;
  controller: AbortController;
  reason?: AbortReason;
}

export class Worker {
  private running = false;
  private readonly pollInterval: number;
  private readonly rateLimitBuffer: number;
  private readonly defaultTimeoutSeconds: number;
  private readonly abortGrace: number;
  private readonly rateLimit: RateLimitOptions;
  private readonly workerId: string;
  private readonly now: () => Date;

  private loopPromise?: Promise<void>;
  private activeCycle?: Promise<CycleResult>;
  private inFlight?: InFlight;
  private wakeUp?: () => void;

  constructor(
    private readonly store: JobStore,
    private readonly emitter: SchedulerEmitter,
    private readonly state: StateAccess,
    private readonly executor: JobExecutor,
    private readonly postExecution: PostExecutionHook | undefined,
    options: WorkerOptions = {}
  ) {
    this.pollInterval = options.pollIntervalMs ?? 30_000;
    this.rateLimitBuffer = options.rateLimitBufferMs ?? 60_000;
    this.defaultTimeoutSeconds = options.defaultTimeoutSeconds ?? 3600;
    this.abortGrace = options.abortGraceMs ?? 5_000;
    this.rateLimit = options.rateLimit ?? {};
    this.workerId =
      options.workerId ?? `worker-${Math.random().toString(36).slice(2)}`;
    this.now = options.now ?? (() => new Date());
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;

    this.emitter.emitSafe("worker:start", this.workerId);

    this.loopPromise = this.loop().catch((err) => {
      this.emitter.emitSafe("worker:error", toError(err));
    });
  }

  /**
   * Stop selecting work. A graceful stop lets the in-flight run finish
   * within `timeoutMs`; after that, or right away when not graceful, the
   * run is aborted and its job goes back to the queue.
   */
  async stop(options?: {
    graceful?: boolean;
    timeoutMs?: number;
  }): Promise<void> {
    const wasRunning = this.running;
    this.running = false;
    this.wakeUp?.();

    if (wasRunning) this.emitter.emitSafe("worker:stop", this.workerId);

    const pending = this.loopPromise ?? this.activeCycle;
    if (!pending) return;

    if (options?.graceful) {
      const finished = await this.waitFor(pending, options.timeoutMs ?? 30_000);
      if (finished) return;
    }

    this.abort("shutdown");
    await this.waitFor(pending, this.abortGrace);
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Cut the current sleep short
   */
  wake(): void {
    this.wakeUp?.();
  }

  executingJobId(): string | undefined {
    return this.inFlight?.jobId;
  }

  /**
   * Abort the run of `jobId` if it is the one in flight
   */
  abortJob(jobId: string, reason: AbortReason): boolean {
    if (this.inFlight?.jobId !== jobId) return false;
    this.abort(reason);
    return true;
  }

  /**
   * One selection-and-execution pass
   */
  async runCycle(): Promise<CycleResult> {
    const cycle = this.cycle();
    this.activeCycle = cycle;
    try {
      return await cycle;
    } finally {
      if (this.activeCycle === cycle) this.activeCycle = undefined;
    }
  }

  private async loop(): Promise<void> {
    while (this.running) {
      let delayMs: number;

      try {
        const result = await this.runCycle();
        delayMs = result.delayMs;
      } catch (err) {
        this.emitter.emitSafe("worker:error", toError(err));
        delayMs = this.pollInterval;
      }

      if (!this.running) break;
      if (delayMs > 0) await this.sleep(delayMs);
    }
  }

  private async cycle(): Promise<CycleResult> {
    const now = this.now();
    const pending = await this.store.findPending();
    const job = selectNext(pending, now);

    if (!job) {
      const state = await this.state.read();
      const delayMs = this.idleDelay(state, pending, now);

      this.emitter.emitSafe("worker:idle", {
        delayMs,
        rateLimited: state.rateLimited,
        resetAt: state.estimatedResetAt,
      });
      return { outcome: "idle", delayMs };
    }

    return this.execute(job);
  }

  private idleDelay(state: QueueState, pending: Job[], now: Date): number {
    let delay = this.pollInterval;

    const resetAt = state.estimatedResetAt;
    if (state.rateLimited && resetAt && resetAt.getTime() > now.getTime()) {
      delay = resetAt.getTime() - now.getTime() + this.rateLimitBuffer;
    }

    const eligibleAt = nextEligibleAt(pending, now);
    if (eligibleAt) {
      delay = Math.min(delay, eligibleAt.getTime() - now.getTime());
    }

    return Math.max(delay, 0);
  }

  private async execute(job: Job): Promise<CycleResult> {
    const startedAt = this.now();

    let running: Job;
    try {
      running = await this.store.transition(
        { ...job, executionStartedAt: startedAt, notBeforeTime: undefined },
        "executing"
      );
    } catch (err) {
      // cancelled or deleted between the scan and the pick
      if (err instanceof JobNotFoundError || err instanceof InvalidTransitionError) {
        const current = await this.store.findById(job.id);

        // still queued: no transition can pick it, so wait for the next poll
        const delayMs = current?.status === "queued" ? this.pollInterval : 0;
        return { outcome: "cancelled", job: current ?? job, delayMs };
      }
      throw err;
    }

    this.emitter.emitSafe("job:start", running);

    // optimistic retry: any attempt lifts the global throttle flag
    const state = await this.state.read();
    if (state.rateLimited) {
      const previousReset = state.estimatedResetAt;
      await this.state.mutate((s) => {
        s.rateLimited = false;
        s.estimatedResetAt = undefined;
        s.rateLimitMessage = undefined;
      });
      this.emitter.emitSafe("rateLimit:cleared", previousReset);
    }

    const controller = new AbortController();
    const inFlight: InFlight = { jobId: running.id, controller };
    this.inFlight = inFlight;

    let result: ExecutionResult;
    try {
      result = await this.run(running, controller, inFlight);
    } finally {
      this.inFlight = undefined;
    }

    return this.settle(running, result, inFlight.reason);
  }

  private async run(
    job: Job,
    controller: AbortController,
    inFlight: InFlight
  ): Promise<ExecutionResult> {
    const timeoutSeconds = job.timeoutSeconds ?? this.defaultTimeoutSeconds;
    const started = Date.now();

    const execution = this.executor
      .execute(job, { signal: controller.signal, timeoutSeconds })
      .catch(
        (err): ExecutionResult => ({
          succeeded: false,
          output: "",
          errorMessage: toError(err).message,
          elapsedMs: Date.now() - started,
        })
      );

    let onAbort: (() => void) | undefined;

    const aborted = new Promise<ExecutionResult>((resolve) => {
      onAbort = () =>
        resolve({
          succeeded: false,
          output: "",
          errorMessage:
            inFlight.reason === "timeout"
              ? `Execution timed out after ${timeoutSeconds}s`
              : `Execution aborted (${inFlight.reason ?? "unknown"})`,
          elapsedMs: Date.now() - started,
        });
      controller.signal.addEventListener("abort", onAbort, { once: true });
    });

    const cancelTimeout = setLongTimeout(() => {
      inFlight.reason = inFlight.reason ?? "timeout";
      controller.abort();
    }, timeoutSeconds * 1000);

    try {
      return await Promise.race([execution, aborted]);
    } finally {
      cancelTimeout();
      if (onAbort) controller.signal.removeEventListener("abort", onAbort);
    }
  }

  private async settle(
    job: Job,
    result: ExecutionResult,
    reason: AbortReason | undefined
  ): Promise<CycleResult> {
    const now = this.now();

    // cancellation commits on its own; drop whatever the run produced
    const current = await this.store.findById(job.id);
    if (!current || current.status !== "executing") {
      return { outcome: "cancelled", job: current ?? job, delayMs: 0 };
    }

    const base: Job = { ...current, lastExecutedAt: now };
    const elapsed = `${(result.elapsedMs / 1000).toFixed(1)}s`;
    const attempt = attemptLabel(base);

    if (reason === "shutdown") {
      const next = appendLog(
        base,
        `Attempt ${attempt} interrupted by shutdown after ${elapsed}`,
        now
      );
      const committed = await this.commit(next, "queued");
      if (!committed) return { outcome: "cancelled", job: next, delayMs: 0 };

      this.emitter.emitSafe("job:interrupted", committed);
      return { outcome: "interrupted", job: committed, delayMs: 0 };
    }

    const throttle = this.detectThrottling(result, now);
    if (throttle?.estimatedResetAt) {
      const resetAt = throttle.estimatedResetAt;
      const next = appendLog(
        {
          ...base,
          notBeforeTime: new Date(resetAt.getTime() + this.rateLimitBuffer),
        },
        `Attempt ${attempt} rate limited after ${elapsed}, ` +
          `expected reset ${resetAt.toISOString()}: ${throttle.rawMessage}`,
        now
      );
      const committed = await this.commit(next, "queued");
      if (!committed) return { outcome: "cancelled", job: next, delayMs: 0 };

      await this.state.mutate((s) => {
        s.rateLimited = true;
        s.estimatedResetAt = resetAt;
        s.rateLimitMessage = throttle.rawMessage;
        s.rateLimitedCount++;
        s.lastProcessedAt = now;
      });

      this.emitter.emitSafe("job:rateLimited", { job: committed, info: throttle });
      return { outcome: "rate-limited", job: committed, delayMs: 0 };
    }

    if (result.succeeded) {
      const output = result.output.trim();
      const next = appendLog(
        base,
        `Attempt ${attempt} succeeded in ${elapsed}` +
          (output ? `\nOutput:\n${output}` : ""),
        now
      );
      const committed = await this.commit(next, "completed");
      if (!committed) return { outcome: "cancelled", job: next, delayMs: 0 };

      await this.state.mutate((s) => {
        s.totalCompleted++;
        s.lastProcessedAt = now;
      });

      this.emitter.emitSafe("job:success", committed);
      await this.afterSuccess(committed);
      return { outcome: "completed", job: committed, delayMs: 0 };
    }

    const errorMessage = result.errorMessage?.trim() || "agent exited with an error";
    const decision = decideAfterFailure(base);
    const next = appendLog(
      { ...base, retryCount: decision.retryCount },
      `Attempt ${attempt} failed after ${elapsed}: ${errorMessage}`,
      now
    );

    const committed = await this.commit(next, decision.status);
    if (!committed) return { outcome: "cancelled", job: next, delayMs: 0 };

    await this.state.mutate((s) => {
      if (decision.status === "failed") s.totalFailed++;
      s.lastProcessedAt = now;
    });

    const error = new Error(errorMessage);
    if (decision.status === "queued") {
      this.emitter.emitSafe("job:retry", { job: committed, error });
      return { outcome: "retrying", job: committed, delayMs: 0 };
    }

    this.emitter.emitSafe("job:fail", { job: committed, error });
    return { outcome: "failed", job: committed, delayMs: 0 };
  }

  /**
   * Failed runs are scanned in full. A run reported as successful counts
   * as throttled only when its entire output is one matching line.
   */
  private detectThrottling(
    result: ExecutionResult,
    now: Date
  ): RateLimitInfo | null {
    const text = [result.output, result.errorMessage ?? ""]
      .filter(Boolean)
      .join("\n");

    let info: RateLimitInfo | null = null;
    if (!result.succeeded) {
      info = classify(text, now, this.rateLimit);
    } else if (!result.output.trim().includes("\n")) {
      info = classify(result.output, now, this.rateLimit);
    }

    if (info?.detected) return info;

    if (result.rateLimited) {
      return {
        detected: true,
        rawMessage: text.trim().split("\n")[0] ?? "",
        detectedAt: now,
        estimatedResetAt: estimateResetTime(now, text, this.rateLimit),
      };
    }

    return null;
  }

  /**
   * Returns null when the job left the executing state under us
   */
  private async commit(job: Job, to: JobStatus): Promise<Job | null> {
    try {
      return await this.store.transition(job, to);
    } catch (err) {
      if (err instanceof JobNotFoundError || err instanceof InvalidTransitionError) {
        return null;
      }
      throw err;
    }
  }

  private async afterSuccess(job: Job): Promise<void> {
    if (!this.postExecution) return;

    try {
      await this.postExecution.afterSuccess(job);
    } catch (err) {
      this.emitter.emitSafe("postExecution:warning", { job, error: toError(err) });
    }
  }

  private abort(reason: AbortReason): void {
    const inFlight = this.inFlight;
    if (!inFlight || inFlight.controller.signal.aborted) return;

    inFlight.reason = reason;
    inFlight.controller.abort();
  }

  private async waitFor(promise: Promise<unknown>, ms: number): Promise<boolean> {
    let cancelTimeout: (() => void) | undefined;

    const timeout = new Promise<false>((resolve) => {
      cancelTimeout = setLongTimeout(() => resolve(false), ms);
    });

    try {
      return await Promise.race([
        promise.then(
          () => true,
          () => true
        ),
        timeout,
      ]);
    } finally {
      cancelTimeout?.();
    }
  }

  /**
   * Capped to one timer span; the loop works out the rest on its next pass
   */
  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | undefined;

      const done = () => {
        clearTimeout(timer);
        if (this.wakeUp === done) this.wakeUp = undefined;
        resolve();
      };

      timer = setTimeout(done, Math.min(ms, MAX_TIMER_MS));
      this.wakeUp = done;
    });
  }
}
