import { toError } from "../events/typed-emitter";
import { JobStatus } from "../types/lifecycle";

export class JobNotFoundError extends Error {
  constructor(jobId?: string) {
    super(jobId ? `Job not found: ${jobId}` : "Job not found");
    this.name = "JobNotFoundError";
  }
}

export class InvalidTransitionError extends Error {
  constructor(
    readonly jobId: string,
    readonly from: JobStatus,
    readonly to: JobStatus
  ) {
    super(`Job ${jobId} cannot move from ${from} to ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export class JobValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JobValidationError";
  }
}

export class StorageUnavailableError extends Error {
  constructor(directory: string, cause?: unknown) {
    super(
      `Storage directory is not usable: ${directory}` +
        (cause === undefined ? "" : ` (${toError(cause).message})`)
    );
    this.name = "StorageUnavailableError";
  }
}

export class CorruptRecordError extends Error {
  constructor(readonly file: string, reason: string) {
    super(`Corrupt record ${file}: ${reason}`);
    this.name = "CorruptRecordError";
  }
}

export class JobExecutingError extends Error {
  constructor(readonly jobId: string) {
    super(`Job ${jobId} is executing`);
    this.name = "JobExecutingError";
  }
}
