import { promises as fs } from "fs";
import path from "path";
import { Job } from "../types/job";
import { ExecutionContext, ExecutionResult, JobExecutor } from "../types/execution";
import { CommandResult, CommandRunner, runCommand } from "./command-runner";

export interface AgentCommandExecutorOptions {
  /**
   * Agent CLI binary. Default: "claude"
   */
  command?: string;

  /**
   * Base for relative working directories. Default: process.cwd()
   */
  baseDirectory?: string;
  runner?: CommandRunner;
}

export interface AvailabilityCheck {
  available: boolean;
  message: string;
}

/**
 * Context files become `@path` references ahead of the prompt
 */
export function buildPrompt(job: Pick<Job, "content" | "contextFiles">): string {
  if (job.contextFiles.length === 0) return job.content;

  const refs = job.contextFiles.map((file) => `@${file}`);
  return [...refs, "", job.content].join("\n");
}

export function buildAgentArgs(job: Job): string[] {
  const args = ["--print"];

  if (job.model) args.push("--model", job.model);
  if (job.permissionMode) args.push("--permission-mode", job.permissionMode);
  if (job.allowedTools && job.allowedTools.length > 0) {
    args.push("--allowed-tools", job.allowedTools.join(","));
  }

  args.push(buildPrompt(job));
  return args;
}

export function toExecutionResult(
  result: CommandResult,
  elapsedMs: number
): ExecutionResult {
  if (!result.failed && result.exitCode === 0) {
    return { succeeded: true, output: result.stdout, elapsedMs };
  }

  const stderr = result.stderr.trim();
  const errorMessage =
    stderr ||
    (result.exitCode !== undefined
      ? `Agent exited with code ${result.exitCode}`
      : result.message ?? "Agent failed to run");

  return { succeeded: false, output: result.stdout, errorMessage, elapsedMs };
}

/**
 * Runs each job through the agent CLI in non-interactive mode
 */
export class AgentCommandExecutor implements JobExecutor {
  readonly command: string;
  private readonly baseDirectory: string;
  private readonly runner: CommandRunner;

  constructor(options: AgentCommandExecutorOptions = {}) {
    this.command = options.command ?? "claude";
    this.baseDirectory = options.baseDirectory ?? process.cwd();
    this.runner = options.runner ?? runCommand;
  }

  async execute(job: Job, context: ExecutionContext): Promise<ExecutionResult> {
    const started = Date.now();
    const cwd = path.resolve(this.baseDirectory, job.workingDirectory);

    await fs.mkdir(cwd, { recursive: true });

    const result = await this.runner(this.command, buildAgentArgs(job), {
      cwd,
      signal: context.signal,
      timeoutMs: context.timeoutSeconds * 1000,
    });

    if (result.timedOut) {
      return {
        succeeded: false,
        output: result.stdout,
        errorMessage: `Execution timed out after ${context.timeoutSeconds}s`,
        elapsedMs: Date.now() - started,
      };
    }

    return toExecutionResult(result, Date.now() - started);
  }

  async checkAvailable(): Promise<AvailabilityCheck> {
    const result = await this.runner(this.command, ["--version"], {
      timeoutMs: 10_000,
    });

    if (!result.failed && result.exitCode === 0) {
      return {
        available: true,
        message: `${this.command} ${result.stdout.trim()}`.trim(),
      };
    }

    if (result.exitCode === undefined) {
      return {
        available: false,
        message: `${this.command} not found: ${result.message ?? "could not start"}`,
      };
    }

    return {
      available: false,
      message: `${this.command} --version failed: ${
        result.stderr.trim() || `exit code ${result.exitCode}`
      }`,
    };
  }
}
