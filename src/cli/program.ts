import path from "path";
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { Scheduler } from "../core/scheduler";
import { QueueConfig, loadConfig, workerOptionsFrom } from "../config/config";
import { AgentCommandExecutor, AvailabilityCheck } from "../executor/agent-executor";
import { FileJobStore, JobNotFoundError } from "../store";
import { JobExecutor, PostExecutionHook } from "../types/execution";
import { PERMISSION_MODES, PermissionMode } from "../types/job";
import { JOB_STATUSES, JobStatus } from "../types/lifecycle";
import { JujutsuPostExecution } from "../vcs/jujutsu";
import { toError } from "../events";
import { CliOutput, attachReporter, consoleOutput } from "./reporter";
import { formatJobDetails, formatJobLine, formatStatus, toJson } from "./format";

export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export interface AgentExecutor extends JobExecutor {
  checkAvailable(): Promise<AvailabilityCheck>;
}

/**
 * Registers a shutdown handler; returns a function that removes it
 */
export type SignalSource = (handler: () => void) => () => void;

export interface CliDependencies {
  out?: CliOutput;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  createExecutor?: (config: QueueConfig) => AgentExecutor;
  createPostExecution?: (config: QueueConfig) => PostExecutionHook;
  onShutdownSignal?: SignalSource;
}

interface GlobalOptions {
  storageDir?: string;
  agentCommand?: string;
  pollInterval?: number;
  timeout?: number;
  verbose?: boolean;
}

interface AddOptions {
  priority: number;
  workingDir: string;
  contextFiles?: string[];
  maxRetries: number;
  estimatedTokens?: number;
  permissionMode?: string;
  allowedTools?: string[];
  promptTimeout?: number;
  model?: string;
  bookmark?: string;
}

interface ListOptions {
  status?: string;
  all?: boolean;
  json?: boolean;
}

export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliError";
  }
}

export const processSignals: SignalSource = (handler) => {
  process.once("SIGINT", handler);
  process.once("SIGTERM", handler);
  return () => {
    process.removeListener("SIGINT", handler);
    process.removeListener("SIGTERM", handler);
  };
};

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

function parsePositive(value: string): number {
  const parsed = parseInteger(value);
  if (parsed < 1) throw new InvalidArgumentError("Must be at least 1.");
  return parsed;
}

function toPermissionMode(value: string | undefined): PermissionMode | undefined {
  if (value === undefined) return undefined;
  const mode = PERMISSION_MODES.find((m) => m === value);
  if (!mode) throw new CliError(`Unknown permission mode: ${value}`);
  return mode;
}

function toStatus(value: string | undefined): JobStatus | undefined {
  if (value === undefined) return undefined;
  const status = JOB_STATUSES.find((s) => s === value);
  if (!status) throw new CliError(`Unknown status: ${value}`);
  return status;
}

interface Session {
  config: QueueConfig;
  store: FileJobStore;
  scheduler: Scheduler;
  executor: AgentExecutor;
}

/**
 * Build the command tree. `exit.code` collects the exit status of the
 * command that ran.
 */
export function createProgram(
  deps: CliDependencies = {},
  exit: { code: number } = { code: 0 }
): Command {
  const out = deps.out ?? consoleOutput;
  const cwd = deps.cwd ?? process.cwd();
  const onShutdownSignal = deps.onShutdownSignal ?? processSignals;
  const createExecutor =
    deps.createExecutor ??
    ((config: QueueConfig) =>
      new AgentCommandExecutor({ command: config.agentCommand, baseDirectory: cwd }));
  const createPostExecution =
    deps.createPostExecution ??
    (() => new JujutsuPostExecution({ baseDirectory: cwd }));

  const program = new Command();

  program
    .name("agent-queue")
    .description("Queue prompts for a coding agent and run them one at a time")
    .option("--storage-dir <dir>", "queue directory (default ~/.agent-queue)")
    .option("--agent-command <command>", "agent CLI binary (default claude)")
    .option("--poll-interval <seconds>", "idle poll interval", parsePositive)
    .option("--timeout <seconds>", "default run timeout", parsePositive)
    .option("-v, --verbose", "also report idle sleeps")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => out.log(str.trimEnd()),
      writeErr: (str) => out.error(str.trimEnd()),
    });

  const openSession = async (): Promise<Session> => {
    const globals = program.opts<GlobalOptions>();
    const config = await loadConfig({
      env: deps.env,
      overrides: {
        storageDir: globals.storageDir && path.resolve(cwd, globals.storageDir),
        agentCommand: globals.agentCommand,
        pollIntervalSeconds: globals.pollInterval,
        timeoutSeconds: globals.timeout,
      },
    });

    const store = new FileJobStore({ directory: config.storageDir });
    const executor = createExecutor(config);
    const scheduler = new Scheduler({
      store,
      executor,
      postExecution: config.vcs.enabled ? createPostExecution(config) : undefined,
      ...workerOptionsFrom(config),
    });

    attachReporter(scheduler, out, { verbose: globals.verbose });
    return { config, store, scheduler, executor };
  };

  const requireAgent = async (executor: AgentExecutor): Promise<void> => {
    const check = await executor.checkAvailable();
    if (!check.available) throw new CliError(check.message);
  };

  program
    .command("add")
    .description("queue a prompt")
    .argument("<prompt...>", "prompt text")
    .option("-p, --priority <n>", "lower runs first", parseInteger, 0)
    .option("-d, --working-dir <dir>", "directory the agent runs in", ".")
    .option("-f, --context-files <files...>", "files referenced in the prompt")
    .option("-r, --max-retries <n>", "attempts allowed", parsePositive, 3)
    .option("-t, --estimated-tokens <n>", "token estimate", parseInteger)
    .addOption(
      new Option("--permission-mode <mode>", "agent permission mode").choices(
        PERMISSION_MODES
      )
    )
    .option("--allowed-tools <tools...>", "tools the agent may use")
    .option("--prompt-timeout <seconds>", "run timeout for this job", parsePositive)
    .option("-m, --model <model>", "agent model")
    .option("-b, --bookmark <name>", "Jujutsu bookmark to move after success")
    .action(async (prompt: string[], options: AddOptions) => {
      const { scheduler, store } = await openSession();

      const job = await scheduler.schedule({
        content: prompt.join(" "),
        priority: options.priority,
        workingDirectory: path.resolve(cwd, options.workingDir),
        contextFiles: options.contextFiles,
        maxRetries: options.maxRetries,
        estimatedTokens: options.estimatedTokens,
        permissionMode: toPermissionMode(options.permissionMode),
        allowedTools: options.allowedTools,
        timeoutSeconds: options.promptTimeout,
        model: options.model,
        vcsBookmark: options.bookmark,
      });

      out.log(`Added ${job.id} (priority ${job.priority})`);
      const file = await store.pathFor(job.id);
      if (file) out.log(file);
    });

  program
    .command("start")
    .description("process the queue until interrupted")
    .action(async () => {
      const { scheduler, executor, config } = await openSession();
      await requireAgent(executor);

      await scheduler.start();
      out.log(`Processing ${config.storageDir} (Ctrl+C to stop)`);

      await new Promise<void>((resolve) => {
        onShutdownSignal(resolve);
      });

      out.log("Stopping, waiting for the current run...");
      await scheduler.stop({ graceful: true });
    });

  program
    .command("next")
    .description("run the next eligible job and exit")
    .action(async () => {
      const { scheduler, executor } = await openSession();
      await requireAgent(executor);

      const release = onShutdownSignal(() => {
        scheduler.stop({ graceful: false }).catch((err) => {
          out.error(`Error while stopping: ${toError(err).message}`);
        });
      });

      try {
        const result = await scheduler.runNext();
        if (result.outcome === "idle") out.log("No eligible jobs");
        if (result.outcome === "interrupted") exit.code = EXIT_INTERRUPTED;
      } finally {
        release();
      }
    });

  program
    .command("status")
    .description("queue counters and rate-limit state")
    .option("--json", "machine-readable output")
    .action(async (options: { json?: boolean }) => {
      const { scheduler } = await openSession();
      const status = await scheduler.getStatus();

      if (options.json) {
        out.log(toJson(status));
        return;
      }
      for (const line of formatStatus(status)) out.log(line);
    });

  program
    .command("list")
    .description("list jobs in queue order")
    .addOption(
      new Option("--status <status>", "only this status").choices(JOB_STATUSES)
    )
    .option("--all", "include finished jobs")
    .option("--detailed", "show execution parameters")
    .option("--json", "machine-readable output")
    .action(async (options: ListOptions & { detailed?: boolean }) => {
      const { scheduler } = await openSession();
      const jobs = await scheduler.listJobs({
        status: toStatus(options.status),
        includeFinished: options.all,
      });

      if (options.json) {
        out.log(toJson(jobs));
        return;
      }
      if (jobs.length === 0) {
        out.log("No jobs");
        return;
      }
      for (const job of jobs) {
        const lines = options.detailed ? formatJobDetails(job) : [formatJobLine(job)];
        for (const line of lines) out.log(line);
      }
    });

  program
    .command("cancel")
    .description("cancel a queued or executing job")
    .argument("<id>")
    .action(async (id: string) => {
      const { scheduler } = await openSession();
      await scheduler.cancel(id);
    });

  program
    .command("delete")
    .description("remove job records")
    .argument("<ids...>")
    .action(async (ids: string[]) => {
      const { scheduler } = await openSession();

      for (const id of ids) {
        if (await scheduler.delete(id)) {
          out.log(`Deleted ${id}`);
        } else {
          out.error(`Job not found: ${id}`);
          exit.code = EXIT_FAILURE;
        }
      }
    });

  program
    .command("retry")
    .description("queue a fresh copy of a failed or cancelled job")
    .argument("<id>")
    .option("--delete", "remove the original record")
    .action(async (id: string, options: { delete?: boolean }) => {
      const { scheduler } = await openSession();
      const job = await scheduler.retry(id, { deleteOriginal: options.delete });
      out.log(`Queued ${job.id} as a retry of ${id}`);
    });

  program
    .command("path")
    .description("print the record file of a job")
    .argument("<id>")
    .action(async (id: string) => {
      const { store } = await openSession();
      await store.init();

      const file = await store.pathFor(id);
      if (!file) throw new JobNotFoundError(id);
      out.log(file);
    });

  program
    .command("test")
    .description("check that the agent CLI can be started")
    .action(async () => {
      const { executor } = await openSession();
      const check = await executor.checkAvailable();

      if (check.available) {
        out.log(`Agent available: ${check.message}`);
      } else {
        out.error(`Agent not available: ${check.message}`);
        exit.code = EXIT_FAILURE;
      }
    });

  return program;
}

/**
 * Parse and run one command line; resolves to the process exit code
 */
export async function run(
  argv: readonly string[],
  deps: CliDependencies = {}
): Promise<number> {
  const out = deps.out ?? consoleOutput;
  const exit = { code: 0 };
  const program = createProgram(deps, exit);

  try {
    await program.parseAsync([...argv]);
    return exit.code;
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;

    out.error(`Error: ${toError(err).message}`);
    return EXIT_FAILURE;
  }
}
