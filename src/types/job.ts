import { JobStatus } from "./lifecycle";

export const PERMISSION_MODES = [
  "acceptEdits",
  "bypassPermissions",
  "default",
  "delegate",
  "dontAsk",
  "plan",
] as const;

export type PermissionMode = (typeof PERMISSION_MODES)[number];

export interface LogEntry {
  at: Date;
  message: string;
}

export interface Job {
  id: string;
  content: string;

  /**
   * Lower values are served first
   */
  priority: number;
  status: JobStatus;

  // attempts
  retryCount: number;
  maxRetries: number;

  // execution parameters, carried opaquely to the executor
  workingDirectory: string;
  contextFiles: string[];
  model?: string;
  permissionMode?: PermissionMode;
  allowedTools?: string[];
  timeoutSeconds?: number;
  vcsBookmark?: string;
  estimatedTokens?: number;

  // scheduling
  notBeforeTime?: Date;

  // timestamps
  createdAt: Date;
  executionStartedAt?: Date;
  lastExecutedAt?: Date;

  retriedFrom?: string;

  executionLog: LogEntry[];
}

export function appendLog(job: Job, message: string, at: Date): Job {
  return {
    ...job,
    executionLog: [...job.executionLog, { at, message: message.trimEnd() }],
  };
}
