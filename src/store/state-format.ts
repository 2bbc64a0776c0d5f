import { QueueState, createQueueState } from "../types/state";
import { CorruptRecordError } from "./store-errors";

interface StoredQueueState {
  total_added: number;
  total_completed: number;
  total_failed: number;
  total_cancelled: number;
  rate_limited_count: number;
  rate_limited: boolean;
  estimated_reset_at: string | null;
  rate_limit_message: string | null;
  last_processed_at: string | null;
}

export function serializeState(state: QueueState): string {
  const stored: StoredQueueState = {
    total_added: state.totalAdded,
    total_completed: state.totalCompleted,
    total_failed: state.totalFailed,
    total_cancelled: state.totalCancelled,
    rate_limited_count: state.rateLimitedCount,
    rate_limited: state.rateLimited,
    estimated_reset_at: state.estimatedResetAt?.toISOString() ?? null,
    rate_limit_message: state.rateLimitMessage ?? null,
    last_processed_at: state.lastProcessedAt?.toISOString() ?? null,
  };

  return JSON.stringify(stored, null, 2) + "\n";
}

export function parseState(text: string, file: string): QueueState {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new CorruptRecordError(
      file,
      err instanceof Error ? err.message : String(err)
    );
  }

  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
    throw new CorruptRecordError(file, "queue state is not an object");
  }

  const fields = new Map<string, unknown>(Object.entries(raw));
  const state = createQueueState();

  const count = (key: string): number => {
    const value = fields.get(key);
    if (value === undefined || value === null) return 0;
    if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
      throw new CorruptRecordError(file, `${key} must be a non-negative integer`);
    }
    return value;
  };

  const timestamp = (key: string): Date | undefined => {
    const value = fields.get(key);
    if (value === undefined || value === null) return undefined;
    const date = typeof value === "string" ? new Date(value) : null;
    if (!date || Number.isNaN(date.getTime())) {
      throw new CorruptRecordError(file, `${key} must be a timestamp`);
    }
    return date;
  };

  state.totalAdded = count("total_added");
  state.totalCompleted = count("total_completed");
  state.totalFailed = count("total_failed");
  state.totalCancelled = count("total_cancelled");
  state.rateLimitedCount = count("rate_limited_count");

  const rateLimited = fields.get("rate_limited");
  if (rateLimited !== undefined && typeof rateLimited !== "boolean") {
    throw new CorruptRecordError(file, "rate_limited must be a boolean");
  }
  state.rateLimited = rateLimited === true;

  const message = fields.get("rate_limit_message");
  if (typeof message === "string") state.rateLimitMessage = message;

  // reset time is only meaningful while throttled
  if (state.rateLimited) {
    state.estimatedResetAt = timestamp("estimated_reset_at");
  }
  state.lastProcessedAt = timestamp("last_processed_at");

  return state;
}
