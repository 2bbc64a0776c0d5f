export interface QueueState {
  // counters
  totalAdded: number;
  totalCompleted: number;
  totalFailed: number;
  totalCancelled: number;
  rateLimitedCount: number;

  // throttling; estimatedResetAt is only meaningful while rateLimited
  rateLimited: boolean;
  estimatedResetAt?: Date;
  rateLimitMessage?: string;

  lastProcessedAt?: Date;
}

export function createQueueState(): QueueState {
  return {
    totalAdded: 0,
    totalCompleted: 0,
    totalFailed: 0,
    totalCancelled: 0,
    rateLimitedCount: 0,
    rateLimited: false,
  };
}
