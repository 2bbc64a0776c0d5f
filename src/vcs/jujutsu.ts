import { promises as fs } from "fs";
import path from "path";
import { Job } from "../types/job";
import { PostExecutionHook } from "../types/execution";
import { CommandRunner, runCommand } from "../executor/command-runner";
import { isNotFound } from "../store/atomic-file";

const JJ_TIMEOUT_MS = 10_000;

export interface JujutsuOptions {
  /**
   * Default: "jj"
   */
  command?: string;
  baseDirectory?: string;
  runner?: CommandRunner;
}

export class JujutsuError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JujutsuError";
  }
}

/**
 * `[id] description`, cut at 80 characters on a word boundary when one
 * falls late enough
 */
export function describeJob(job: Pick<Job, "id" | "content">, max = 80): string {
  const text = job.content.replace(/\s+/g, " ").trim();
  if (text.length <= max) return `[${job.id}] ${text}`;

  let short = text.slice(0, max);
  const lastSpace = short.lastIndexOf(" ");
  if (lastSpace > 60) short = short.slice(0, lastSpace);

  return `[${job.id}] ${short}...`;
}

/**
 * Nearest directory at or above `start` holding a `.jj` directory
 */
export async function findRepositoryRoot(start: string): Promise<string | null> {
  let current = path.resolve(start);

  for (;;) {
    const stats = await fs
      .stat(path.join(current, ".jj"))
      .catch((err: unknown) => {
        if (isNotFound(err)) return null;
        throw err;
      });
    if (stats?.isDirectory()) return current;

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

/**
 * Records a successful run in a Jujutsu repository: describes the working
 * copy change and moves the job's bookmark onto it.
 */
export class JujutsuPostExecution implements PostExecutionHook {
  private readonly command: string;
  private readonly baseDirectory: string;
  private readonly runner: CommandRunner;
  private available?: boolean;

  constructor(options: JujutsuOptions = {}) {
    this.command = options.command ?? "jj";
    this.baseDirectory = options.baseDirectory ?? process.cwd();
    this.runner = options.runner ?? runCommand;
  }

  async afterSuccess(job: Job): Promise<void> {
    const cwd = path.resolve(this.baseDirectory, job.workingDirectory);

    if (!(await this.isAvailable())) return;
    if (!(await findRepositoryRoot(cwd))) return;

    await this.jj(cwd, ["describe", "-m", describeJob(job)]);

    if (job.vcsBookmark) {
      const exists = await this.bookmarkExists(cwd, job.vcsBookmark);
      await this.jj(cwd, [
        "bookmark",
        exists ? "set" : "create",
        job.vcsBookmark,
        "-r",
        "@",
      ]);
    }
  }

  private async isAvailable(): Promise<boolean> {
    if (this.available === undefined) {
      const result = await this.runner(this.command, ["--version"], {
        timeoutMs: JJ_TIMEOUT_MS,
      });
      this.available = !result.failed && result.exitCode === 0;
    }
    return this.available;
  }

  private async bookmarkExists(cwd: string, name: string): Promise<boolean> {
    const stdout = await this.jj(cwd, ["bookmark", "list", "--all"]);

    return stdout.split("\n").some((line) => {
      const existing = line.split(":")[0]?.trim();
      return existing === name;
    });
  }

  private async jj(cwd: string, args: string[]): Promise<string> {
    const result = await this.runner(this.command, args, {
      cwd,
      timeoutMs: JJ_TIMEOUT_MS,
    });

    if (result.failed || result.exitCode !== 0) {
      const detail =
        result.stderr.trim() || result.message || `exit code ${result.exitCode}`;
      throw new JujutsuError(`jj ${args[0]} failed: ${detail}`);
    }

    return result.stdout;
  }
}
