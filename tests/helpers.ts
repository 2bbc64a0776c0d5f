import { promises as fs } from "fs";
import os from "os";
import path from "path";
import {
  ExecutionContext,
  ExecutionResult,
  JobExecutor,
} from "../src/types/execution";
import { Job } from "../src/types/job";

export const sleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

export async function waitFor(
  predicate: () => boolean,
  timeoutMs = 2000
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error("condition not met in time");
    await sleep(5);
  }
}

export function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "agent-queue-"));
}

export function succeed(output = "done"): ExecutionResult {
  return { succeeded: true, output, elapsedMs: 5 };
}

export function fail(errorMessage: string, output = ""): ExecutionResult {
  return { succeeded: false, output, errorMessage, elapsedMs: 5 };
}

export type Step = (
  job: Job,
  context: ExecutionContext
) => ExecutionResult | Promise<ExecutionResult>;

/**
 * Plays `steps` in order; the last one repeats
 */
export class ScriptedExecutor implements JobExecutor {
  readonly calls: Job[] = [];

  constructor(private readonly steps: Step[]) {}

  async execute(job: Job, context: ExecutionContext): Promise<ExecutionResult> {
    this.calls.push(job);
    const step = this.steps[Math.min(this.calls.length, this.steps.length) - 1];
    if (!step) throw new Error("no scripted step");
    return step(job, context);
  }
}

/**
 * Resolves only when the run is aborted
 */
export function untilAborted(
  onStart?: () => void
): Step {
  return (_job, context) =>
    new Promise<ExecutionResult>((resolve) => {
      onStart?.();
      context.signal.addEventListener("abort", () => {
        resolve(fail("aborted"));
      });
    });
}

export class FakeClock {
  constructor(public current: Date) {}

  readonly now = (): Date => new Date(this.current.getTime());

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export function makeJob(overrides: Partial<Job> = {}): Omit<Job, "id"> {
  return {
    content: "Write the changelog",
    priority: 0,
    status: "queued",
    retryCount: 0,
    maxRetries: 3,
    workingDirectory: ".",
    contextFiles: [],
    createdAt: new Date("2026-01-15T10:00:00.000Z"),
    executionLog: [],
    ...overrides,
  };
}
