import { Job } from "../types/job";
import { JobStatus } from "../types/lifecycle";
import { QueueStatus } from "../core/scheduler";

export function shortContent(content: string, max = 60): string {
  const text = content.replace(/\s+/g, " ").trim();
  return text.length <= max ? text : `${text.slice(0, max - 3)}...`;
}

export function formatSeconds(ms: number): string {
  const seconds = Math.round(ms / 1000);
  if (seconds < 60) return `${seconds}s`;

  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${minutes}m${String(seconds % 60).padStart(2, "0")}s`;

  return `${Math.floor(minutes / 60)}h${String(minutes % 60).padStart(2, "0")}m`;
}

/**
 * One row of `list`
 */
export function formatJobLine(job: Job): string {
  return [
    job.id,
    job.status.padEnd(9),
    `p${job.priority}`,
    `${job.retryCount}/${job.maxRetries}`,
    shortContent(job.content),
  ].join("  ");
}

export function formatJobDetails(job: Job): string[] {
  const lines = [
    `${job.id} [${job.status}] priority ${job.priority}, attempts ${job.retryCount}/${job.maxRetries}`,
    `  ${shortContent(job.content, 72)}`,
    `  working directory: ${job.workingDirectory}`,
    `  created: ${job.createdAt.toISOString()}`,
  ];

  if (job.contextFiles.length > 0) {
    lines.push(`  context files: ${job.contextFiles.join(", ")}`);
  }
  if (job.notBeforeTime) {
    lines.push(`  not before: ${job.notBeforeTime.toISOString()}`);
  }
  if (job.lastExecutedAt) {
    lines.push(`  last executed: ${job.lastExecutedAt.toISOString()}`);
  }
  if (job.retriedFrom) {
    lines.push(`  retried from: ${job.retriedFrom}`);
  }

  return lines;
}

const STATUS_ORDER: JobStatus[] = [
  "queued",
  "executing",
  "completed",
  "failed",
  "cancelled",
];

export function formatStatus(status: QueueStatus): string[] {
  const { state, counts } = status;

  const lines = [
    "Queue status",
    ...STATUS_ORDER.map((s) => `  ${s.padEnd(10)} ${counts[s]}`),
    `  added ${state.totalAdded}, completed ${state.totalCompleted}, ` +
      `failed ${state.totalFailed}, cancelled ${state.totalCancelled}`,
  ];

  if (state.rateLimited) {
    lines.push(
      `  rate limited until ${state.estimatedResetAt?.toISOString() ?? "unknown"}` +
        (state.rateLimitMessage ? `: ${state.rateLimitMessage}` : "")
    );
  }
  if (state.rateLimitedCount > 0) {
    lines.push(`  rate limit hits: ${state.rateLimitedCount}`);
  }
  if (state.lastProcessedAt) {
    lines.push(`  last processed: ${state.lastProcessedAt.toISOString()}`);
  }

  lines.push(`  next job: ${status.nextJobId ?? "none"}`);
  return lines;
}

export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
