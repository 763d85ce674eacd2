/**
 * Configuration system for taskstack.
 *
 * Loads and validates taskstack.yaml from the project directory. Every field
 * has a default, so a project without a config file gets the classic stack:
 * Redis and RabbitMQ, a gevent Celery worker and a Flower dashboard.
 */
import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import {
  BROKER_IDS,
  type BrokerId,
  type DuplicatePolicy,
  type LogMode,
} from "../shared/types.js";

const STATE_DIRNAME = ".taskstack";
const CONFIG_FILENAME = "taskstack.yaml";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ProcessConfig {
  /** Executable to spawn. */
  command: string;
  /** Arguments; "{app}" and "{port}" are substituted. */
  args: string[];
  /** Log file for combined stdout/stderr, relative to the project directory. */
  logFile: string;
  logMode: LogMode;
  duplicates: DuplicatePolicy;
}

export interface MonitorConfig extends ProcessConfig {
  /** Dashboard HTTP port. */
  port: number;
}

export interface RabbitmqConfig {
  /** Enable the rabbitmq_management plugin on first install. */
  management: boolean;
  /** Administrator to create on first install; replaces guest. */
  user: string | null;
  password: string | null;
}

export interface StackConfig {
  /** Task application name handed to the worker and the monitor. */
  app: string;
  /** Dependency manifest, relative to the project directory. */
  manifest: string;
  installer: {
    /** Package manager used for the manifest. */
    command: string;
  };
  /** Prefix package-manager and service-manager commands with sudo. */
  sudo: boolean;
  /** Brokers to bootstrap, in order. */
  brokers: BrokerId[];
  worker: ProcessConfig;
  monitor: MonitorConfig;
  rabbitmq: RabbitmqConfig;
}

export class ConfigError extends Error {
  readonly source: string;

  constructor(source: string, message: string) {
    super(`Invalid configuration in ${source}: ${message}`);
    this.name = "ConfigError";
    this.source = source;
  }
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: StackConfig = {
  app: "tasks",
  manifest: "requirements.txt",
  installer: { command: "pip" },
  sudo: true,
  brokers: ["redis", "rabbitmq"],
  worker: {
    command: "celery",
    args: ["-A", "{app}", "worker", "-l", "info", "-P", "gevent"],
    logFile: "celery.log",
    logMode: "truncate",
    duplicates: "replace",
  },
  monitor: {
    command: "celery",
    args: ["-A", "{app}", "flower", "--port={port}"],
    port: 5555,
    logFile: "flower.log",
    logMode: "truncate",
    duplicates: "replace",
  },
  rabbitmq: {
    management: true,
    user: null,
    password: null,
  },
};

/** A deep copy of the defaults, safe to mutate. */
export function defaultConfig(): StackConfig {
  return structuredClone(DEFAULT_CONFIG);
}

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export function resolveStateDir(projectDir: string, env: NodeJS.ProcessEnv = process.env): string {
  const override = env.TASKSTACK_STATE_DIR?.trim();
  if (override) {
    return path.resolve(projectDir, override);
  }
  return path.join(projectDir, STATE_DIRNAME);
}

export function resolveConfigPath(projectDir: string, override?: string): string {
  return override ? path.resolve(projectDir, override) : path.join(projectDir, CONFIG_FILENAME);
}

export function resolveLogDir(stateDir: string): string {
  return path.join(stateDir, "logs");
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/**
 * Load the stack configuration.
 *
 * A missing file yields the defaults. Environment overrides are applied
 * after the file, then the result is validated as a whole.
 */
export function loadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): StackConfig {
  let config = defaultConfig();

  if (fs.existsSync(configPath)) {
    const raw = fs.readFileSync(configPath, "utf-8");
    let parsed: unknown;
    try {
      parsed = parseYaml(raw);
    } catch (error: unknown) {
      const msg = error instanceof Error ? error.message : String(error);
      throw new ConfigError(configPath, `not valid YAML (${msg})`);
    }
    // An empty file parses to null
    if (parsed !== null && parsed !== undefined) {
      config = mergeConfig(config, parsed, configPath);
    }
  }

  return applyEnvOverrides(config, env, configPath);
}

/** Apply TASKSTACK_* environment overrides on top of a config. */
export function applyEnvOverrides(
  config: StackConfig,
  env: NodeJS.ProcessEnv,
  source = "environment",
): StackConfig {
  const next = structuredClone(config);

  const app = env.TASKSTACK_APP?.trim();
  if (app) next.app = app;

  if (env.TASKSTACK_NO_SUDO === "1" || env.TASKSTACK_NO_SUDO === "true") {
    next.sudo = false;
  }

  const user = env.TASKSTACK_RABBITMQ_USER?.trim();
  if (user) next.rabbitmq.user = user;

  const password = env.TASKSTACK_RABBITMQ_PASSWORD;
  if (password) next.rabbitmq.password = password;

  validateCredentials(next.rabbitmq, source);
  return next;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

type RawObject = Record<string, unknown>;

function isObject(value: unknown): value is RawObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isBrokerId(value: unknown): value is BrokerId {
  return BROKER_IDS.some((id) => id === value);
}

function isLogMode(value: unknown): value is LogMode {
  return value === "truncate" || value === "append";
}

function isDuplicatePolicy(value: unknown): value is DuplicatePolicy {
  return value === "replace" || value === "allow";
}

function readString(raw: RawObject, key: string, fallback: string, ctx: string, source: string): string {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigError(source, `"${ctx}${key}" must be a non-empty string`);
  }
  return value;
}

function readBoolean(raw: RawObject, key: string, fallback: boolean, ctx: string, source: string): boolean {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== "boolean") {
    throw new ConfigError(source, `"${ctx}${key}" must be true or false`);
  }
  return value;
}

function readNullableString(
  raw: RawObject,
  key: string,
  fallback: string | null,
  ctx: string,
  source: string,
): string | null {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (value === null) return null;
  if (typeof value !== "string" || value === "") {
    throw new ConfigError(source, `"${ctx}${key}" must be a non-empty string or null`);
  }
  return value;
}

function readStringList(raw: RawObject, key: string, fallback: string[], ctx: string, source: string): string[] {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (!Array.isArray(value)) {
    throw new ConfigError(source, `"${ctx}${key}" must be a list`);
  }
  return value.map((item, i) => {
    if (typeof item === "number") return String(item);
    if (typeof item !== "string") {
      throw new ConfigError(source, `"${ctx}${key}[${i}]" must be a string`);
    }
    return item;
  });
}

function readSection(raw: RawObject, key: string, source: string): RawObject {
  const value = raw[key];
  if (value === undefined) return {};
  if (!isObject(value)) {
    throw new ConfigError(source, `"${key}" must be a mapping`);
  }
  return value;
}

function readProcess(raw: RawObject, fallback: ProcessConfig, ctx: string, source: string): ProcessConfig {
  const logMode = raw.logMode ?? fallback.logMode;
  if (!isLogMode(logMode)) {
    throw new ConfigError(source, `"${ctx}logMode" must be "truncate" or "append"`);
  }
  const duplicates = raw.duplicates ?? fallback.duplicates;
  if (!isDuplicatePolicy(duplicates)) {
    throw new ConfigError(source, `"${ctx}duplicates" must be "replace" or "allow"`);
  }
  return {
    command: readString(raw, "command", fallback.command, ctx, source),
    args: readStringList(raw, "args", fallback.args, ctx, source),
    logFile: readString(raw, "logFile", fallback.logFile, ctx, source),
    logMode,
    duplicates,
  };
}

function readPort(raw: RawObject, fallback: number, ctx: string, source: string): number {
  const value = raw.port;
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1 || value > 65_535) {
    throw new ConfigError(source, `"${ctx}port" must be an integer between 1 and 65535`);
  }
  return value;
}

function readBrokers(raw: RawObject, fallback: BrokerId[], source: string): BrokerId[] {
  const value = raw.brokers;
  if (value === undefined) return fallback;
  if (!Array.isArray(value)) {
    throw new ConfigError(source, `"brokers" must be a list`);
  }
  const brokers: BrokerId[] = [];
  for (const item of value) {
    if (!isBrokerId(item)) {
      throw new ConfigError(
        source,
        `unknown broker "${String(item)}" (expected one of: ${BROKER_IDS.join(", ")})`,
      );
    }
    if (!brokers.includes(item)) brokers.push(item);
  }
  return brokers;
}

function validateCredentials(rabbitmq: RabbitmqConfig, source: string): void {
  if ((rabbitmq.user === null) !== (rabbitmq.password === null)) {
    throw new ConfigError(source, `"rabbitmq.user" and "rabbitmq.password" must be set together`);
  }
}

/** Validate a parsed YAML document and merge it over a base config. */
export function mergeConfig(base: StackConfig, parsed: unknown, source: string): StackConfig {
  if (!isObject(parsed)) {
    throw new ConfigError(source, "top level must be a mapping");
  }

  const installer = readSection(parsed, "installer", source);
  const worker = readSection(parsed, "worker", source);
  const monitor = readSection(parsed, "monitor", source);
  const rabbitmq = readSection(parsed, "rabbitmq", source);

  const merged: StackConfig = {
    app: readString(parsed, "app", base.app, "", source),
    manifest: readString(parsed, "manifest", base.manifest, "", source),
    installer: {
      command: readString(installer, "command", base.installer.command, "installer.", source),
    },
    sudo: readBoolean(parsed, "sudo", base.sudo, "", source),
    brokers: readBrokers(parsed, base.brokers, source),
    worker: readProcess(worker, base.worker, "worker.", source),
    monitor: {
      ...readProcess(monitor, base.monitor, "monitor.", source),
      port: readPort(monitor, base.monitor.port, "monitor.", source),
    },
    rabbitmq: {
      management: readBoolean(rabbitmq, "management", base.rabbitmq.management, "rabbitmq.", source),
      user: readNullableString(rabbitmq, "user", base.rabbitmq.user, "rabbitmq.", source),
      password: readNullableString(rabbitmq, "password", base.rabbitmq.password, "rabbitmq.", source),
    },
  };

  validateCredentials(merged.rabbitmq, source);
  return merged;
}

// ---------------------------------------------------------------------------
// Argument templates
// ---------------------------------------------------------------------------

/** Substitute {name} placeholders; unknown placeholders are left as they are. */
export function expandArgs(args: string[], vars: Record<string, string | number>): string[] {
  return args.map((arg) =>
    arg.replace(/\{([a-zA-Z]+)\}/g, (match, name: string) => {
      const value = vars[name];
      return value === undefined ? match : String(value);
    }),
  );
}
