export { Scheduler } from "./core/scheduler";
export type { SchedulerOptions, RetryOptions, QueueStatus } from "./core/scheduler";
export { FileJobStore, InMemoryJobStore, BUCKET_DIRECTORIES } from "./store";
export type { JobStore, NewJob, FileJobStoreOptions } from "./store";
export * from "./store/store-errors";

export { AgentCommandExecutor, buildAgentArgs, buildPrompt } from "./executor";
export type { CommandRunner, CommandResult } from "./executor";
export { JujutsuPostExecution, describeJob } from "./vcs/jujutsu";
export { ConfigError, CONFIG_SCHEMA, loadConfig, workerOptionsFrom } from "./config/config";
export type { QueueConfig } from "./config/config";

export { classify, DEFAULT_RATE_LIMIT_PATTERNS } from "./worker/rate-limit";
export { estimateResetTime, DEFAULT_RESET_SCHEDULE } from "./worker/reset-time";
export type { CycleResult, CycleOutcome, WorkerOptions } from "./worker/types";

export * from "./types/job";
export * from "./types/lifecycle";
export type * from "./types/execution";
export type * from "./types/events";
export type * from "./types/schedule";
export type * from "./types/query";
export * from "./types/state";
