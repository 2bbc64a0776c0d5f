import matter from "gray-matter";
import { Job, LogEntry, PERMISSION_MODES, PermissionMode } from "../types/job";
import { Bucket, JobStatus, isJobStatus } from "../types/lifecycle";
import { CorruptRecordError } from "./store-errors";

export const LOG_HEADING = "## Execution Log";
export const RECORD_EXTENSION = ".md";

type Marker = "executing" | "cancelled";

export interface RecordFileName {
  base: string;
  id: string;
  marker?: Marker;
}

export function slugify(content: string, maxLength = 50): string {
  const slug = content
    .replace(/[^A-Za-z0-9_-]+/g, "-")
    .replace(/-{2,}/g, "-")
    .replace(/^-+/, "")
    .slice(0, maxLength)
    .replace(/-+$/, "")
    .toLowerCase();

  return slug || "job";
}

export function baseNameFor(job: Pick<Job, "id" | "content">): string {
  return `${job.id}-${slugify(job.content)}`;
}

export function fileNameFor(base: string, status: JobStatus): string {
  switch (status) {
    case "executing":
      return `${base}.executing${RECORD_EXTENSION}`;
    case "cancelled":
      return `${base}.cancelled${RECORD_EXTENSION}`;
    default:
      return `${base}${RECORD_EXTENSION}`;
  }
}

export function parseFileName(name: string): RecordFileName | null {
  if (!name.endsWith(RECORD_EXTENSION) || name.startsWith(".")) return null;

  let stem = name.slice(0, -RECORD_EXTENSION.length);
  let marker: Marker | undefined;

  for (const candidate of ["executing", "cancelled"] as const) {
    if (stem.endsWith(`.${candidate}`)) {
      marker = candidate;
      stem = stem.slice(0, -(candidate.length + 1));
      break;
    }
  }

  if (!stem) return null;

  const dash = stem.indexOf("-");
  const id = dash === -1 ? stem : stem.slice(0, dash);
  if (!id) return null;

  return { base: stem, id, marker };
}

/**
 * Bucket plus marker decide the status; the header only mirrors it
 */
export function statusFromLocation(
  bucket: Bucket,
  marker: Marker | undefined
): JobStatus {
  switch (bucket) {
    case "pending":
      return marker === "executing" ? "executing" : "queued";
    case "completed":
      return "completed";
    case "failed":
      return marker === "cancelled" ? "cancelled" : "failed";
  }
}

export function serializeJob(job: Job): string {
  const header: Record<string, unknown> = {
    id: job.id,
    status: job.status,
    priority: job.priority,
    created_at: job.createdAt.toISOString(),
    max_retries: job.maxRetries,
    retry_count: job.retryCount,
    working_directory: job.workingDirectory,
    context_files: job.contextFiles,
  };

  const optional: Record<string, unknown> = {
    model: job.model,
    permission_mode: job.permissionMode,
    allowed_tools: job.allowedTools,
    timeout_seconds: job.timeoutSeconds,
    vcs_bookmark: job.vcsBookmark,
    estimated_tokens: job.estimatedTokens,
    not_before: job.notBeforeTime?.toISOString(),
    execution_started_at: job.executionStartedAt?.toISOString(),
    last_executed_at: job.lastExecutedAt?.toISOString(),
    retried_from: job.retriedFrom,
  };

  for (const [key, value] of Object.entries(optional)) {
    if (value !== undefined) header[key] = value;
  }

  const body = ["", job.content, "", LOG_HEADING, ""]
    .concat(job.executionLog.map(formatLogEntry))
    .join("\n");

  return matter.stringify(body, header);
}

export function formatLogEntry(entry: LogEntry): string {
  const [first, ...rest] = entry.message.split("\n");
  return [`[${entry.at.toISOString()}] ${first}`]
    .concat(rest.map((line) => `  ${line}`))
    .join("\n");
}

export interface ParseContext {
  /**
   * Used in error messages and as the id source for hand-written files
   */
  fileName: string;
  status: JobStatus;

  /**
   * Creation time for records that carry none
   */
  modifiedAt: Date;
}

export function parseJob(text: string, context: ParseContext): Job {
  const file = context.fileName;

  let parsed: matter.GrayMatterFile<string>;
  try {
    // options bypass the module-level cache keyed by file content
    parsed = matter(text, {});
  } catch (err) {
    throw new CorruptRecordError(
      file,
      err instanceof Error ? err.message : String(err)
    );
  }

  const data: unknown = parsed.data;
  if (!isRecord(data)) {
    throw new CorruptRecordError(file, "front matter is not a mapping");
  }

  const { content, executionLog } = splitBody(parsed.content, file);
  // lookups go by file name, so a header id that disagrees is ignored
  const headerId = readOptionalString(data, "id", file);
  const id = parseFileName(file)?.id ?? headerId;
  if (!id) throw new CorruptRecordError(file, "missing id");

  const headerStatus = data.status;
  if (headerStatus !== undefined && !isJobStatus(headerStatus)) {
    throw new CorruptRecordError(file, `unknown status ${String(headerStatus)}`);
  }

  return {
    id,
    content,
    priority: readInteger(data, "priority", file, 0),
    status: context.status,
    retryCount: readInteger(data, "retry_count", file, 0),
    maxRetries: readInteger(data, "max_retries", file, 3),
    workingDirectory: readOptionalString(data, "working_directory", file) ?? ".",
    contextFiles: readStringList(data, "context_files", file) ?? [],
    model: readOptionalString(data, "model", file),
    permissionMode: readPermissionMode(data, file),
    allowedTools: readStringList(data, "allowed_tools", file),
    timeoutSeconds: readOptionalInteger(data, "timeout_seconds", file),
    vcsBookmark: readOptionalString(data, "vcs_bookmark", file),
    estimatedTokens: readOptionalInteger(data, "estimated_tokens", file),
    notBeforeTime: readOptionalDate(data, "not_before", file),
    createdAt:
      readOptionalDate(data, "created_at", file) ?? new Date(context.modifiedAt),
    executionStartedAt: readOptionalDate(data, "execution_started_at", file),
    lastExecutedAt: readOptionalDate(data, "last_executed_at", file),
    retriedFrom: readOptionalString(data, "retried_from", file),
    executionLog,
  };
}

function splitBody(
  body: string,
  file: string
): { content: string; executionLog: LogEntry[] } {
  const headingAt = body.lastIndexOf(`\n${LOG_HEADING}\n`);
  const startsWithHeading = body.startsWith(`${LOG_HEADING}\n`);

  if (headingAt === -1 && !startsWithHeading) {
    return { content: body.trim(), executionLog: [] };
  }

  const contentEnd = headingAt === -1 ? 0 : headingAt;
  const logStart =
    headingAt === -1 ? LOG_HEADING.length + 1 : headingAt + LOG_HEADING.length + 2;

  return {
    content: body.slice(0, contentEnd).trim(),
    executionLog: parseLog(body.slice(logStart), file),
  };
}

const ENTRY_PATTERN = /^\[([^\]]+)\] ?(.*)$/;

function parseLog(section: string, file: string): LogEntry[] {
  const entries: Array<{ at: Date; lines: string[] }> = [];

  for (const line of section.split("\n")) {
    const match = ENTRY_PATTERN.exec(line);
    if (match) {
      const at = new Date(match[1]);
      if (Number.isNaN(at.getTime())) {
        throw new CorruptRecordError(file, `bad log timestamp ${match[1]}`);
      }
      entries.push({ at, lines: [match[2]] });
      continue;
    }

    const current = entries[entries.length - 1];
    if (!current) continue;

    current.lines.push(line.startsWith("  ") ? line.slice(2) : line.trimStart());
  }

  return entries.map(({ at, lines }) => ({
    at,
    message: lines.join("\n").trimEnd(),
  }));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function readOptionalString(
  data: Record<string, unknown>,
  key: string,
  file: string
): string | undefined {
  const value = data[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === "number") return String(value);
  if (typeof value !== "string") {
    throw new CorruptRecordError(file, `${key} must be a string`);
  }
  return value;
}

function readOptionalInteger(
  data: Record<string, unknown>,
  key: string,
  file: string
): number | undefined {
  const value = data[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new CorruptRecordError(file, `${key} must be an integer`);
  }
  return value;
}

function readInteger(
  data: Record<string, unknown>,
  key: string,
  file: string,
  fallback: number
): number {
  return readOptionalInteger(data, key, file) ?? fallback;
}

function readStringList(
  data: Record<string, unknown>,
  key: string,
  file: string
): string[] | undefined {
  const value = data[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((v) => typeof v === "string")) {
    throw new CorruptRecordError(file, `${key} must be a list of strings`);
  }
  return [...value];
}

function readOptionalDate(
  data: Record<string, unknown>,
  key: string,
  file: string
): Date | undefined {
  const value = data[key];
  if (value === undefined || value === null) return undefined;

  const date =
    value instanceof Date
      ? new Date(value.getTime())
      : typeof value === "string"
        ? new Date(value)
        : null;

  if (!date || Number.isNaN(date.getTime())) {
    throw new CorruptRecordError(file, `${key} must be a timestamp`);
  }
  return date;
}

function readPermissionMode(
  data: Record<string, unknown>,
  file: string
): PermissionMode | undefined {
  const value = readOptionalString(data, "permission_mode", file);
  if (value === undefined) return undefined;

  const mode = PERMISSION_MODES.find((m) => m === value);
  if (!mode) {
    throw new CorruptRecordError(file, `unknown permission_mode ${value}`);
  }
  return mode;
}
