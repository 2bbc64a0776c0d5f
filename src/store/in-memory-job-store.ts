import { StoreEmitter } from "../events";
import { Job } from "../types/job";
import { JobStatus, canTransition } from "../types/lifecycle";
import { JobQuery } from "../types/query";
import { QueueState, createQueueState } from "../types/state";
import { JobStore, NewJob } from "./job-store";
import { Mutex } from "./mutex";
import { applyQuery } from "./query";
import {
  InvalidTransitionError,
  JobNotFoundError,
  JobValidationError,
} from "./store-errors";

function cloneJob(job: Job): Job {
  return {
    ...job,
    contextFiles: [...job.contextFiles],
    allowedTools: job.allowedTools ? [...job.allowedTools] : undefined,
    executionLog: job.executionLog.map((entry) => ({ ...entry })),
  };
}

/**
 * Same contract as FileJobStore without touching the disk
 */
export class InMemoryJobStore extends StoreEmitter implements JobStore {
  private jobs = new Map<string, Job>();
  private state: QueueState = createQueueState();
  private mutex = new Mutex();
  private sequence = 0;

  private generateId(): string {
    this.sequence++;
    const salt = Math.floor(Math.random() * 0x10000);
    return `${this.sequence.toString(16).padStart(4, "0")}${salt
      .toString(16)
      .padStart(4, "0")}`;
  }

  async init(): Promise<void> {}

  async create(job: NewJob): Promise<Job> {
    if (job.status !== "queued") {
      throw new JobValidationError(`New jobs must be queued, got ${job.status}`);
    }

    const stored: Job = cloneJob({ ...job, id: this.generateId() });
    this.jobs.set(stored.id, stored);
    return cloneJob(stored);
  }

  async findById(jobId: string): Promise<Job | null> {
    const job = this.jobs.get(jobId);
    return job ? cloneJob(job) : null;
  }

  async findAll(query: JobQuery = {}): Promise<Job[]> {
    return applyQuery(Array.from(this.jobs.values()), query).map(cloneJob);
  }

  async findPending(): Promise<Job[]> {
    return Array.from(this.jobs.values())
      .filter((j) => j.status === "queued" || j.status === "executing")
      .map(cloneJob);
  }

  async transition(job: Job, to: JobStatus): Promise<Job> {
    const release = await this.mutex.acquire();
    try {
      const current = this.jobs.get(job.id);
      if (!current) throw new JobNotFoundError(job.id);
      if (!canTransition(current.status, to)) {
        throw new InvalidTransitionError(job.id, current.status, to);
      }

      const next = cloneJob({ ...job, status: to });
      this.jobs.set(job.id, next);
      return cloneJob(next);
    } finally {
      release();
    }
  }

  async update(job: Job): Promise<Job> {
    return this.mutex.runExclusive(async () => {
      const current = this.jobs.get(job.id);
      if (!current) throw new JobNotFoundError(job.id);
      if (current.status !== job.status) {
        throw new InvalidTransitionError(job.id, current.status, job.status);
      }

      this.jobs.set(job.id, cloneJob(job));
      return cloneJob(job);
    });
  }

  async delete(jobId: string): Promise<boolean> {
    return this.mutex.runExclusive(async () => this.jobs.delete(jobId));
  }

  async recoverInterrupted(): Promise<Job[]> {
    return this.mutex.runExclusive(async () => {
      const recovered: Job[] = [];

      for (const job of this.jobs.values()) {
        if (job.status === "executing") {
          job.status = "queued";
          recovered.push(cloneJob(job));
        }
      }

      return recovered;
    });
  }

  async loadState(): Promise<QueueState> {
    return { ...this.state };
  }

  async saveState(state: QueueState): Promise<void> {
    this.state = { ...state };
  }
}
