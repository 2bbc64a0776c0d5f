export {
  AgentCommandExecutor,
  buildAgentArgs,
  buildPrompt,
  toExecutionResult,
} from "./agent-executor";
export type {
  AgentCommandExecutorOptions,
  AvailabilityCheck,
} from "./agent-executor";
export { runCommand } from "./command-runner";
export type { CommandOptions, CommandResult, CommandRunner } from "./command-runner";
