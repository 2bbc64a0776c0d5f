import { Job } from "../types/job";
import { JobStatus } from "../types/lifecycle";
import { JobQuery } from "../types/query";
import { QueueState } from "../types/state";
import { StoreEventMap } from "../types/events";

export type NewJob = Omit<Job, "id">;

export interface JobStore {
  /**
   * Prepare storage. Throws StorageUnavailableError when it cannot be used.
   */
  init(): Promise<void>;

  /**
   * Insert a new queued job under a fresh id
   */
  create(job: NewJob): Promise<Job>;

  findById(jobId: string): Promise<Job | null>;

  findAll(query?: JobQuery): Promise<Job[]>;

  /**
   * Every queued or executing job, in no particular order
   */
  findPending(): Promise<Job[]>;

  /**
   * Commit a status change. The stored record takes the fields of `job`
   * and moves to the bucket of `to` in one atomic step.
   * Throws InvalidTransitionError for edges outside the lifecycle table.
   */
  transition(job: Job, to: JobStatus): Promise<Job>;

  /**
   * Rewrite a record in place. The status must match the stored one.
   */
  update(job: Job): Promise<Job>;

  /**
   * Hard delete from whichever bucket holds the job
   */
  delete(jobId: string): Promise<boolean>;

  /**
   * Reset every executing job to queued, leaving other fields untouched
   */
  recoverInterrupted(): Promise<Job[]>;

  loadState(): Promise<QueueState>;

  saveState(state: QueueState): Promise<void>;

  on<K extends keyof StoreEventMap & string>(
    event: K,
    listener: (payload: StoreEventMap[K]) => void
  ): this;
}
