import { parseExpression } from "cron-parser";

/**
 * Quota windows reopen at 05:00, 10:00, 15:00 and 20:00
 */
export const DEFAULT_RESET_SCHEDULE = "0 5,10,15,20 * * *";

export interface ResetTimeOptions {
  /**
   * Cron expression of the fallback anchor times
   */
  resetSchedule?: string;

  /**
   * IANA zone the anchors are read in. Defaults to the system zone.
   */
  timezone?: string;
}

/**
 * Best guess of when a throttled agent will serve requests again.
 * A reset time stated in the message wins when it lies after `now`;
 * otherwise the next anchor strictly after `now`.
 */
export function estimateResetTime(
  now: Date,
  message: string,
  options: ResetTimeOptions = {}
): Date {
  const explicit = parseExplicitResetTime(message, now);
  if (explicit) return explicit;

  return nextAnchor(now, options);
}

export function nextAnchor(now: Date, options: ResetTimeOptions = {}): Date {
  const interval = parseExpression(
    options.resetSchedule ?? DEFAULT_RESET_SCHEDULE,
    {
      currentDate: now,
      ...(options.timezone ? { tz: options.timezone } : {}),
    }
  );

  return interval.next().toDate();
}

const EPOCH_SUFFIX = /\|\s*(\d{10})\b/;
const ISO_TIMESTAMP =
  /\b(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)/;
const CLOCK_TIME =
  /\bresets?\s+(?:at\s+)?(\d{1,2})(?::(\d{2}))?\s*(am|pm)?\b/i;

export function parseExplicitResetTime(
  message: string,
  now: Date
): Date | null {
  const candidates = [
    fromEpochSuffix(message),
    fromIsoTimestamp(message),
    fromClockTime(message, now),
  ];

  for (const candidate of candidates) {
    if (candidate && candidate.getTime() > now.getTime()) return candidate;
  }

  return null;
}

function fromEpochSuffix(message: string): Date | null {
  const match = EPOCH_SUFFIX.exec(message);
  if (!match) return null;
  return new Date(Number(match[1]) * 1000);
}

function fromIsoTimestamp(message: string): Date | null {
  const match = ISO_TIMESTAMP.exec(message);
  if (!match) return null;

  const date = new Date(match[1]);
  return Number.isNaN(date.getTime()) ? null : date;
}

function fromClockTime(message: string, now: Date): Date | null {
  const match = CLOCK_TIME.exec(message);
  if (!match) return null;

  let hour = Number(match[1]);
  const minute = match[2] ? Number(match[2]) : 0;
  const meridiem = match[3]?.toLowerCase();

  if (meridiem) {
    if (hour < 1 || hour > 12) return null;
    hour = (hour % 12) + (meridiem === "pm" ? 12 : 0);
  }
  if (hour > 23 || minute > 59) return null;

  const candidate = new Date(now.getTime());
  candidate.setHours(hour, minute, 0, 0);
  if (candidate.getTime() <= now.getTime()) {
    candidate.setDate(candidate.getDate() + 1);
  }
  return candidate;
}
