import { Job } from "../types/job";
import { QueueState } from "../types/state";
import { RateLimitOptions } from "./rate-limit";

export interface WorkerOptions {
  /**
   * Sleep between cycles when nothing is eligible (ms)
   */
  pollIntervalMs?: number;

  /**
   * Added to the estimated reset time before throttled work is retried (ms)
   */
  rateLimitBufferMs?: number;

  /**
   * Run timeout for jobs that carry none
   */
  defaultTimeoutSeconds?: number;

  /**
   * How long a forced stop waits for an aborted run to wind down (ms)
   */
  abortGraceMs?: number;

  rateLimit?: RateLimitOptions;

  /**
   * Worker id, reported in worker events
   */
  workerId?: string;

  /**
   * Clock, injectable for tests
   */
  now?: () => Date;
}

/**
 * Read-modify-write access to the queue state owned by the scheduler
 */
export interface StateAccess {
  read(): Promise<QueueState>;
  mutate(apply: (state: QueueState) => void): Promise<QueueState>;
}

export type CycleOutcome =
  | "completed"
  | "retrying"
  | "failed"
  | "rate-limited"
  | "interrupted"
  | "cancelled"
  | "idle";

export interface CycleResult {
  outcome: CycleOutcome;
  job?: Job;

  /**
   * Suggested pause before the next cycle (ms)
   */
  delayMs: number;
}

export type AbortReason = "timeout" | "cancelled" | "shutdown";
