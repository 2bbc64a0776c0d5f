import { Job } from "./job";

export interface RateLimitInfo {
  detected: boolean;
  rawMessage: string;
  detectedAt: Date;
  estimatedResetAt?: Date;
}

export interface ExecutionResult {
  succeeded: boolean;

  /**
   * Set by executors that recognise throttling themselves
   */
  rateLimited?: boolean;
  output: string;
  errorMessage?: string;
  elapsedMs: number;
}

export interface ExecutionContext {
  /**
   * Aborted on timeout, cancellation or forced shutdown
   */
  signal: AbortSignal;
  timeoutSeconds: number;
}

export interface JobExecutor {
  execute(job: Job, context: ExecutionContext): Promise<ExecutionResult>;
}

export interface PostExecutionHook {
  afterSuccess(job: Job): Promise<void>;
}
