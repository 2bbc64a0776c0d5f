import execa from "execa";

export interface CommandOptions {
  cwd?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface CommandResult {
  /**
   * Undefined when the process never started or was killed
   */
  exitCode?: number;
  stdout: string;
  stderr: string;
  failed: boolean;
  timedOut: boolean;
  canceled: boolean;

  /**
   * Short description of a failure to start or finish
   */
  message?: string;
}

/**
 * Seam between collaborators and child processes; tests pass a scripted one
 */
export type CommandRunner = (
  file: string,
  args: readonly string[],
  options?: CommandOptions
) => Promise<CommandResult>;

export const runCommand: CommandRunner = async (file, args, options = {}) => {
  const subprocess = execa(file, [...args], {
    cwd: options.cwd,
    timeout: options.timeoutMs,
    stdin: "ignore",
    reject: false,
    all: false,
  });

  const signal = options.signal;
  const onAbort = () => subprocess.cancel();
  if (signal?.aborted) onAbort();
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const result = await subprocess;
    return {
      exitCode: typeof result.exitCode === "number" ? result.exitCode : undefined,
      stdout: result.stdout,
      stderr: result.stderr,
      failed: result.failed,
      timedOut: result.timedOut,
      canceled: result.isCanceled,
      message: result.failed ? failureMessage(result) : undefined,
    };
  } finally {
    signal?.removeEventListener("abort", onAbort);
  }
};

function failureMessage(result: execa.ExecaReturnValue): string {
  if ("shortMessage" in result && typeof result.shortMessage === "string") {
    return result.shortMessage;
  }
  return `Command failed with exit code ${result.exitCode}`;
}
