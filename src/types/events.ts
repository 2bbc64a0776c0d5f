import { Job } from "./job";
import { RateLimitInfo } from "./execution";

export interface QuarantinedRecord {
  file: string;
  quarantinedTo?: string;
  error: Error;
}

export type SchedulerEventMap = {
  // lifecycle
  "scheduler:start": void;
  "scheduler:stop": void;
  "scheduler:error": Error;

  // job lifecycle
  "job:created": Job;
  "job:start": Job;
  "job:success": Job;
  "job:fail": { job: Job; error: Error };
  "job:retry": { job: Job; error: Error };
  "job:rateLimited": { job: Job; info: RateLimitInfo };
  "job:interrupted": Job;
  "job:cancel": Job;
  "job:deleted": string;

  // recovery
  "resume:start": void;
  "resume:jobRecovered": Job;
  "resume:complete": number;

  // storage
  "store:quarantined": QuarantinedRecord;

  // post-execution collaborator
  "postExecution:warning": { job: Job; error: Error };

  // worker
  "worker:start": string;
  "worker:stop": string;
  "worker:error": Error;
  "worker:idle": { delayMs: number; rateLimited: boolean; resetAt?: Date };
  "rateLimit:cleared": Date | undefined;
};

export type StoreEventMap = {
  "record:quarantined": QuarantinedRecord;
};
