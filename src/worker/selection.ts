import { Job } from "../types/job";

/**
 * Queue order: priority ascending, then creation time, then id so equal
 * timestamps still resolve the same way on every run.
 */
export function compareJobs(a: Job, b: Job): number {
  if (a.priority !== b.priority) return a.priority - b.priority;

  const created = a.createdAt.getTime() - b.createdAt.getTime();
  if (created !== 0) return created;

  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function isEligible(job: Job, now: Date): boolean {
  if (job.status !== "queued") return false;
  return !job.notBeforeTime || job.notBeforeTime.getTime() <= now.getTime();
}

export function selectNext(jobs: readonly Job[], now: Date): Job | null {
  let best: Job | null = null;

  for (const job of jobs) {
    if (!isEligible(job, now)) continue;
    if (!best || compareJobs(job, best) < 0) best = job;
  }

  return best;
}

/**
 * Earliest future not-before time among queued jobs, if any
 */
export function nextEligibleAt(jobs: readonly Job[], now: Date): Date | null {
  let earliest: Date | null = null;

  for (const job of jobs) {
    if (job.status !== "queued" || !job.notBeforeTime) continue;
    if (job.notBeforeTime.getTime() <= now.getTime()) continue;
    if (!earliest || job.notBeforeTime < earliest) earliest = job.notBeforeTime;
  }

  return earliest;
}
