import { promises as fs } from "fs";
import os from "os";
import path from "path";
import yaml from "js-yaml";
import { parseExpression } from "cron-parser";
import { isNotFound } from "../store/atomic-file";
import { DEFAULT_RATE_LIMIT_PATTERNS } from "../worker/rate-limit";
import { DEFAULT_RESET_SCHEDULE } from "../worker/reset-time";
import { WorkerOptions } from "../worker/types";

export const CONFIG_FILE = "config.yaml";

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly key?: string
  ) {
    super(key ? `${key}: ${message}` : message);
    this.name = "ConfigError";
  }
}

type ConfigType = "string" | "optional-string" | "number" | "boolean" | "string-list";
type ConfigValue = string | number | boolean | string[] | undefined;

export interface ConfigSchemaEntry {
  type: ConfigType;
  default: ConfigValue;
  description: string;
  min?: number;
}

/**
 * Every key the queue understands, dotted for nested YAML sections
 */
export const CONFIG_SCHEMA: Record<string, ConfigSchemaEntry> = {
  storageDir: {
    type: "string",
    default: "~/.agent-queue",
    description: "Queue directory (env AGENT_QUEUE_DIR)",
  },
  agentCommand: {
    type: "string",
    default: "claude",
    description: "Agent CLI binary (env AGENT_QUEUE_COMMAND)",
  },
  pollIntervalSeconds: {
    type: "number",
    default: 30,
    min: 1,
    description: "Sleep between cycles when nothing is eligible",
  },
  timeoutSeconds: {
    type: "number",
    default: 3600,
    min: 1,
    description: "Run timeout for jobs without their own",
  },
  "rateLimit.bufferSeconds": {
    type: "number",
    default: 60,
    min: 0,
    description: "Margin added to an estimated reset time",
  },
  "rateLimit.resetSchedule": {
    type: "string",
    default: DEFAULT_RESET_SCHEDULE,
    description: "Cron expression of quota reset anchors",
  },
  "rateLimit.timezone": {
    type: "optional-string",
    default: undefined,
    description: "IANA zone for reset anchors (system zone when unset)",
  },
  "rateLimit.patterns": {
    type: "string-list",
    default: [],
    description: "Extra phrases that mark a throttled run",
  },
  "rateLimit.replaceDefaultPatterns": {
    type: "boolean",
    default: false,
    description: "Use rateLimit.patterns instead of the built-in phrases",
  },
  "vcs.enabled": {
    type: "boolean",
    default: true,
    description: "Describe and bookmark Jujutsu changes after successful runs",
  },
};

export interface QueueConfig {
  storageDir: string;
  agentCommand: string;
  pollIntervalSeconds: number;
  timeoutSeconds: number;
  rateLimit: {
    bufferSeconds: number;
    resetSchedule: string;
    timezone?: string;
    patterns: string[];
    replaceDefaultPatterns: boolean;
  };
  vcs: {
    enabled: boolean;
  };
}

export interface ConfigOverrides {
  storageDir?: string;
  agentCommand?: string;
  pollIntervalSeconds?: number;
  timeoutSeconds?: number;
}

export interface LoadConfigOptions {
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

export function expandHome(p: string, homeDir: string = os.homedir()): string {
  if (p === "~") return homeDir;
  if (p.startsWith("~/")) return path.join(homeDir, p.slice(2));
  return p;
}

/**
 * defaults < config.yaml < environment < overrides
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<QueueConfig> {
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};
  const homeDir = options.homeDir ?? os.homedir();

  const values = new Map<string, ConfigValue>();
  for (const [key, entry] of Object.entries(CONFIG_SCHEMA)) {
    values.set(key, entry.default);
  }

  // the file lives inside the storage directory, so that one key comes first
  const storageDir = path.resolve(
    expandHome(
      overrides.storageDir ?? env.AGENT_QUEUE_DIR ?? readString(values, "storageDir"),
      homeDir
    )
  );

  const fileValues = await readConfigFile(path.join(storageDir, CONFIG_FILE));
  if (fileValues.has("storageDir")) {
    throw new ConfigError("cannot be set inside the storage directory", "storageDir");
  }
  for (const [key, value] of fileValues) values.set(key, value);

  if (env.AGENT_QUEUE_COMMAND) values.set("agentCommand", env.AGENT_QUEUE_COMMAND);

  for (const [key, value] of Object.entries(overrides)) {
    if (key === "storageDir" || value === undefined) continue;
    values.set(key, coerce(key, value));
  }

  const config: QueueConfig = {
    storageDir,
    agentCommand: readString(values, "agentCommand"),
    pollIntervalSeconds: readNumber(values, "pollIntervalSeconds"),
    timeoutSeconds: readNumber(values, "timeoutSeconds"),
    rateLimit: {
      bufferSeconds: readNumber(values, "rateLimit.bufferSeconds"),
      resetSchedule: readString(values, "rateLimit.resetSchedule"),
      timezone: readOptionalString(values, "rateLimit.timezone"),
      patterns: readList(values, "rateLimit.patterns"),
      replaceDefaultPatterns: readBoolean(values, "rateLimit.replaceDefaultPatterns"),
    },
    vcs: {
      enabled: readBoolean(values, "vcs.enabled"),
    },
  };

  validateRateLimit(config.rateLimit);
  return config;
}

/**
 * Worker settings derived from a loaded configuration
 */
export function workerOptionsFrom(config: QueueConfig): WorkerOptions {
  const { rateLimit } = config;
  const patterns = rateLimit.replaceDefaultPatterns
    ? rateLimit.patterns
    : [...DEFAULT_RATE_LIMIT_PATTERNS, ...rateLimit.patterns];

  return {
    pollIntervalMs: config.pollIntervalSeconds * 1000,
    rateLimitBufferMs: rateLimit.bufferSeconds * 1000,
    defaultTimeoutSeconds: config.timeoutSeconds,
    rateLimit: {
      patterns,
      resetSchedule: rateLimit.resetSchedule,
      timezone: rateLimit.timezone,
    },
  };
}

async function readConfigFile(file: string): Promise<Map<string, ConfigValue>> {
  let text: string;
  try {
    text = await fs.readFile(file, "utf8");
  } catch (err) {
    if (isNotFound(err)) return new Map();
    throw err;
  }

  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (err) {
    throw new ConfigError(
      `${CONFIG_FILE} is not valid YAML: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const values = new Map<string, ConfigValue>();
  if (raw === undefined || raw === null) return values;
  if (!isPlainObject(raw)) {
    throw new ConfigError(`${CONFIG_FILE} must contain a mapping`);
  }

  for (const [key, value] of flatten(raw)) {
    values.set(key, coerce(key, value));
  }
  return values;
}

function flatten(
  obj: Record<string, unknown>,
  prefix = ""
): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  for (const [name, value] of Object.entries(obj)) {
    const key = prefix ? `${prefix}.${name}` : name;
    if (isPlainObject(value) && !(key in CONFIG_SCHEMA)) {
      entries.push(...flatten(value, key));
    } else {
      entries.push([key, value]);
    }
  }

  return entries;
}

function coerce(key: string, value: unknown): ConfigValue {
  const entry = CONFIG_SCHEMA[key];
  if (!entry) {
    throw new ConfigError(
      `unknown key (known keys: ${Object.keys(CONFIG_SCHEMA).join(", ")})`,
      key
    );
  }

  switch (entry.type) {
    case "string":
      if (typeof value !== "string" || !value.trim()) {
        throw new ConfigError("must be a non-empty string", key);
      }
      return value;

    case "optional-string":
      if (value === null || value === undefined) return undefined;
      if (typeof value !== "string") throw new ConfigError("must be a string", key);
      return value;

    case "number":
      if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new ConfigError("must be a number", key);
      }
      if (entry.min !== undefined && value < entry.min) {
        throw new ConfigError(`must be at least ${entry.min}`, key);
      }
      return value;

    case "boolean":
      if (typeof value !== "boolean") throw new ConfigError("must be true or false", key);
      return value;

    case "string-list":
      if (!Array.isArray(value) || !value.every((v) => typeof v === "string")) {
        throw new ConfigError("must be a list of strings", key);
      }
      return [...value];
  }
}

function validateRateLimit(rateLimit: QueueConfig["rateLimit"]): void {
  if (rateLimit.timezone !== undefined) {
    try {
      new Intl.DateTimeFormat("en-US", { timeZone: rateLimit.timezone });
    } catch {
      throw new ConfigError(
        `unknown time zone ${rateLimit.timezone}`,
        "rateLimit.timezone"
      );
    }
  }

  try {
    parseExpression(rateLimit.resetSchedule);
  } catch (err) {
    throw new ConfigError(
      `invalid cron expression: ${err instanceof Error ? err.message : String(err)}`,
      "rateLimit.resetSchedule"
    );
  }

  if (rateLimit.replaceDefaultPatterns && rateLimit.patterns.length === 0) {
    throw new ConfigError(
      "must list at least one phrase when replaceDefaultPatterns is set",
      "rateLimit.patterns"
    );
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function readString(values: Map<string, ConfigValue>, key: string): string {
  const value = values.get(key);
  if (typeof value !== "string") throw new ConfigError("must be a string", key);
  return value;
}

function readOptionalString(
  values: Map<string, ConfigValue>,
  key: string
): string | undefined {
  const value = values.get(key);
  return typeof value === "string" ? value : undefined;
}

function readNumber(values: Map<string, ConfigValue>, key: string): number {
  const value = values.get(key);
  if (typeof value !== "number") throw new ConfigError("must be a number", key);
  return value;
}

function readBoolean(values: Map<string, ConfigValue>, key: string): boolean {
  const value = values.get(key);
  if (typeof value !== "boolean") throw new ConfigError("must be true or false", key);
  return value;
}

function readList(values: Map<string, ConfigValue>, key: string): string[] {
  const value = values.get(key);
  return Array.isArray(value) ? [...value] : [];
}
