import { Scheduler } from "../core/scheduler";
import { formatSeconds, shortContent } from "./format";

export interface CliOutput {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const consoleOutput: CliOutput = {
  log: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

/**
 * Print scheduler events. Idle sleeps are only shown when verbose.
 */
export function attachReporter(
  scheduler: Scheduler,
  out: CliOutput,
  options: { verbose?: boolean } = {}
): void {
  scheduler
    .on("resume:jobRecovered", (job) => {
      out.log(`Recovered interrupted job ${job.id}, back in the queue`);
    })
    .on("job:start", (job) => {
      out.log(
        `Executing ${job.id} (attempt ${job.retryCount + 1}/${job.maxRetries}): ` +
          shortContent(job.content)
      );
    })
    .on("job:success", (job) => {
      out.log(`Completed ${job.id}`);
    })
    .on("job:retry", ({ job, error }) => {
      out.log(
        `Failed ${job.id} (${job.retryCount}/${job.maxRetries}), will retry: ${error.message}`
      );
    })
    .on("job:fail", ({ job, error }) => {
      out.warn(`Failed ${job.id} after ${job.retryCount} attempts: ${error.message}`);
    })
    .on("job:rateLimited", ({ job, info }) => {
      const reset = info.estimatedResetAt?.toLocaleString() ?? "unknown";
      out.log(`Rate limited while running ${job.id}; expected reset ${reset}`);
    })
    .on("job:interrupted", (job) => {
      out.log(`Interrupted ${job.id}, returned to the queue`);
    })
    .on("job:cancel", (job) => {
      out.log(`Cancelled ${job.id}`);
    })
    .on("store:quarantined", ({ file, quarantinedTo, error }) => {
      out.warn(
        `Moved unreadable record ${file}` +
          (quarantinedTo ? ` to ${quarantinedTo}` : "") +
          `: ${error.message}`
      );
    })
    .on("postExecution:warning", ({ job, error }) => {
      out.warn(`Post-execution step failed for ${job.id}: ${error.message}`);
    })
    .on("scheduler:error", (error) => {
      out.error(`Listener error: ${error.message}`);
    })
    .on("worker:error", (error) => {
      out.error(`Worker error: ${error.message}`);
    });

  if (!options.verbose) return;

  scheduler
    .on("worker:idle", ({ delayMs, rateLimited, resetAt }) => {
      if (rateLimited && resetAt) {
        out.log(
          `Rate limited until ${resetAt.toLocaleString()}, sleeping ${formatSeconds(delayMs)}`
        );
      } else {
        out.log(`Nothing to run, next check in ${formatSeconds(delayMs)}`);
      }
    })
    .on("rateLimit:cleared", () => {
      out.log("Retrying after rate limit");
    });
}
