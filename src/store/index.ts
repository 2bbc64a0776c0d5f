export type { JobStore, NewJob } from "./job-store";
export type { FileJobStoreOptions } from "./file-job-store";
export { FileJobStore, BUCKET_DIRECTORIES } from "./file-job-store";
export { InMemoryJobStore } from "./in-memory-job-store";
export * from "./store-errors";
