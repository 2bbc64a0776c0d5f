import { PermissionMode } from "./job";

export interface ScheduleOptions {
  content: string;

  /**
   * Lower values = higher priority.
   * Default: 0
   */
  priority?: number;

  /**
   * Number of attempts allowed for ordinary failures (at least 1).
   * Default: 3
   */
  maxRetries?: number;

  /**
   * Directory the agent runs in.
   * Defaults to the current process directory.
   */
  workingDirectory?: string;
  contextFiles?: string[];
  model?: string;
  permissionMode?: PermissionMode;
  allowedTools?: string[];

  /**
   * Overrides the scheduler's default run timeout
   */
  timeoutSeconds?: number;

  /**
   * Bookmark moved to the resulting change after a successful run
   */
  vcsBookmark?: string;
  estimatedTokens?: number;

  /**
   * Earliest time the job may be picked
   */
  notBeforeTime?: Date;
}
