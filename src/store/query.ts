import { Job } from "../types/job";
import { Bucket, JobStatus, bucketFor } from "../types/lifecycle";
import { JobQuery } from "../types/query";
import { compareJobs } from "../worker/selection";

export function bucketsFor(query: JobQuery): Bucket[] {
  if (query.status) {
    const statuses = Array.isArray(query.status) ? query.status : [query.status];
    return Array.from(new Set(statuses.map(bucketFor)));
  }

  return query.includeFinished
    ? ["pending", "completed", "failed"]
    : ["pending"];
}

export function applyQuery(jobs: Job[], query: JobQuery): Job[] {
  let result = jobs;

  if (query.status) {
    const statuses: JobStatus[] = Array.isArray(query.status)
      ? query.status
      : [query.status];
    result = result.filter((j) => statuses.includes(j.status));
  } else if (!query.includeFinished) {
    result = result.filter((j) => bucketFor(j.status) === "pending");
  }

  if (query.sort) {
    const { field, order } = query.sort;
    const sign = order === "asc" ? 1 : -1;
    result = [...result].sort((a, b) => {
      const diff =
        field === "priority"
          ? a.priority - b.priority
          : a.createdAt.getTime() - b.createdAt.getTime();
      return diff !== 0 ? sign * diff : sign * compareJobs(a, b);
    });
  } else {
    result = [...result].sort(compareJobs);
  }

  const start = query.skip ?? 0;
  const end = query.limit ? start + query.limit : undefined;

  return result.slice(start, end);
}
