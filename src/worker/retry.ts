import { Job } from "../types/job";

export interface FailureDecision {
  retryCount: number;
  status: "queued" | "failed";
}

/**
 * An ordinary failure uses up one attempt; the job is re-queued while
 * attempts remain. Throttling never goes through here.
 */
export function decideAfterFailure(
  job: Pick<Job, "retryCount" | "maxRetries">
): FailureDecision {
  const retryCount = job.retryCount + 1;

  return {
    retryCount,
    status: retryCount < job.maxRetries ? "queued" : "failed",
  };
}

export function attemptLabel(job: Pick<Job, "retryCount" | "maxRetries">): string {
  return `${job.retryCount + 1}/${job.maxRetries}`;
}
