export type JobStatus =
  | "queued" // waiting to be picked
  | "executing" // handed to the agent
  | "completed" // finished successfully
  | "failed" // failed permanently
  | "cancelled"; // cancelled by user

export const JOB_STATUSES: readonly JobStatus[] = [
  "queued",
  "executing",
  "completed",
  "failed",
  "cancelled",
];

/**
 * Every edge a job may take. Anything not listed here is rejected by the
 * stores before a file is touched.
 */
export const JOB_TRANSITIONS: Readonly<Record<JobStatus, readonly JobStatus[]>> =
  {
    queued: ["executing", "cancelled"],
    executing: ["completed", "queued", "failed", "cancelled"],
    completed: [],
    failed: [],
    cancelled: [],
  };

/**
 * Durable grouping a record physically lives in
 */
export type Bucket = "pending" | "completed" | "failed";

export function bucketFor(status: JobStatus): Bucket {
  switch (status) {
    case "queued":
    case "executing":
      return "pending";
    case "completed":
      return "completed";
    case "failed":
    case "cancelled":
      return "failed";
  }
}

export function isTerminal(status: JobStatus): boolean {
  return JOB_TRANSITIONS[status].length === 0;
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return JOB_TRANSITIONS[from].includes(to);
}

export function isJobStatus(value: unknown): value is JobStatus {
  return (
    typeof value === "string" &&
    (JOB_STATUSES as readonly string[]).includes(value)
  );
}
