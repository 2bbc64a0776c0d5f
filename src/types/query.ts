import { JobStatus } from "./lifecycle";

export interface JobQuery {
  status?: JobStatus | JobStatus[];

  /**
   * Include the completed and failed buckets.
   * Ignored when `status` names a terminal status.
   */
  includeFinished?: boolean;
  limit?: number;
  skip?: number;
  sort?: {
    field: "priority" | "createdAt";
    order: "asc" | "desc";
  };
}
