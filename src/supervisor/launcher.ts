/**
 * Worker and monitor launcher.
 *
 * Spawns a long-lived process detached from taskstack, redirects its
 * combined output to a log file and records its pid in the registry.
 *
 * Duplicate handling is per process:
 *   - "replace": a live process recorded under the same name, and any extra
 *     "<name>#<pid>" instances, are stopped first (SIGTERM, then SIGKILL after
 *     a grace period), leaving exactly one.
 *   - "allow": the live process is left running and re-filed as
 *     "<name>#<pid>"; a second instance starts next to it. This is the
 *     legacy monitor behaviour, where the second dashboard fails to bind.
 *
 * A recorded pid is only ever signalled while it still runs the recorded
 * command line; otherwise the record is stale and is dropped untouched.
 */
import path from "node:path";
import { expandArgs, type StackConfig } from "../config/index.js";
import { createSilentLogger, type Logger } from "../shared/logger.js";
import { pollUntil, type PollOptions } from "../shared/poll.js";
import type { BootstrapPhase, DuplicatePolicy, LogMode, ProcessRecord } from "../shared/types.js";
import { ProcessSpawnError, isTrackedProcess, type ProcessControl } from "./process-control.js";
import type { ProcessRegistry } from "./registry.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LaunchSpec {
  /** Registry key. */
  name: string;
  command: string;
  args: string[];
  /** Working directory; relative log files resolve against it. */
  cwd: string;
  logFile: string;
  logMode: LogMode;
  duplicates: DuplicatePolicy;
  env?: NodeJS.ProcessEnv;
}

export interface SupervisorDeps {
  registry: ProcessRegistry;
  control: ProcessControl;
  logger?: Logger;
  /** How long to wait for a signalled process to exit. */
  stopPoll?: PollOptions;
}

export interface LaunchResult {
  name: string;
  pid: number;
  /** Pid of the process stopped to make room, if any. */
  replacedPid: number | null;
  /** Pid of a live process left running next to the new one ("allow"). */
  keptPid: number | null;
  logFile: string;
}

export interface StopResult {
  name: string;
  pid: number;
  /** False when the process had already exited or the pid was reused. */
  wasAlive: boolean;
  /** Set when the process survived SIGKILL; its record is kept. */
  error: ProcessStopError | null;
}

export class ProcessStopError extends Error {
  readonly pid: number;

  constructor(record: ProcessRecord) {
    super(`${record.name} (pid ${record.pid}) did not exit after SIGKILL`);
    this.name = "ProcessStopError";
    this.pid = record.pid;
  }
}

const DEFAULT_STOP_POLL: PollOptions = {
  attempts: 20,
  intervalMs: 250,
  backoffMultiplier: 1,
};

// ---------------------------------------------------------------------------
// Stopping
// ---------------------------------------------------------------------------

/**
 * Stop exactly the recorded pid: SIGTERM, wait, then SIGKILL.
 *
 * @returns whether the recorded process was still running when we got to it.
 */
async function stopRecord(record: ProcessRecord, deps: SupervisorDeps): Promise<boolean> {
  const { control } = deps;
  const logger = deps.logger ?? createSilentLogger();
  const poll = deps.stopPoll ?? DEFAULT_STOP_POLL;

  if (!isTrackedProcess(control, record) || !control.terminate(record.pid, "SIGTERM")) {
    return false;
  }
  logger.info(`Sent SIGTERM to ${record.name} (pid ${record.pid}).`);

  if (await pollUntil(() => !control.isAlive(record.pid), poll)) {
    return true;
  }

  logger.warn(`${record.name} (pid ${record.pid}) ignored SIGTERM, sending SIGKILL.`);
  control.terminate(record.pid, "SIGKILL");
  if (await pollUntil(() => !control.isAlive(record.pid), poll)) {
    return true;
  }

  throw new ProcessStopError(record);
}

function belongsTo(record: ProcessRecord, name: string): boolean {
  return record.name === name || record.name.startsWith(`${name}#`);
}

/**
 * Stop tracked processes and drop their records.
 *
 * A process that cannot be stopped keeps its record and is reported through
 * StopResult.error; the remaining processes are still stopped.
 *
 * @param names - Registry names to stop. "monitor" also matches the extra
 *   "monitor#<pid>" instances left by the "allow" policy. Omit to stop all.
 */
export async function stopProcesses(
  names: string[] | undefined,
  deps: SupervisorDeps,
): Promise<StopResult[]> {
  const matches = (record: ProcessRecord): boolean =>
    names === undefined || names.some((n) => belongsTo(record, n));

  const results: StopResult[] = [];
  for (const record of deps.registry.list().filter(matches)) {
    try {
      const wasAlive = await stopRecord(record, deps);
      deps.registry.remove(record.name);
      results.push({ name: record.name, pid: record.pid, wasAlive, error: null });
    } catch (error: unknown) {
      if (!(error instanceof ProcessStopError)) throw error;
      (deps.logger ?? createSilentLogger()).error(error.message);
      results.push({ name: record.name, pid: record.pid, wasAlive: true, error });
    }
  }
  return results;
}

// ---------------------------------------------------------------------------
// Launching
// ---------------------------------------------------------------------------

/**
 * Launch one supervised process according to its duplicate policy.
 *
 * @throws ProcessSpawnError when the process cannot be started.
 */
export async function launchProcess(
  spec: LaunchSpec,
  deps: SupervisorDeps,
  phase: BootstrapPhase,
): Promise<LaunchResult> {
  const { registry, control } = deps;
  const logger = (deps.logger ?? createSilentLogger()).child({ service: spec.name });
  const logFile = path.resolve(spec.cwd, spec.logFile);

  let replacedPid: number | null = null;
  let keptPid: number | null = null;

  for (const record of registry.list().filter((r) => belongsTo(r, spec.name))) {
    if (!isTrackedProcess(control, record)) {
      logger.debug(`Dropping stale record ${record.name} (pid ${record.pid} is gone or runs something else).`);
      registry.remove(record.name);
    }
  }

  if (spec.duplicates === "replace") {
    for (const extra of registry.list().filter((r) => r.name.startsWith(`${spec.name}#`))) {
      logger.info(`Stopping extra ${spec.name} instance (pid ${extra.pid})...`);
      await stopRecord(extra, deps);
      registry.remove(extra.name);
    }
  }

  const previous = registry.get(spec.name);
  if (previous) {
    if (spec.duplicates === "replace") {
      logger.info(`Stopping previous ${spec.name} (pid ${previous.pid})...`);
      await stopRecord(previous, deps);
      registry.remove(spec.name);
      replacedPid = previous.pid;
    } else {
      logger.warn(
        `Previous ${spec.name} (pid ${previous.pid}) is still running; starting another one next to it.`,
      );
      registry.remove(spec.name);
      registry.put({ ...previous, name: `${spec.name}#${previous.pid}` });
      keptPid = previous.pid;
    }
  }

  logger.info(`Starting ${spec.name}: ${[spec.command, ...spec.args].join(" ")}`);
  let pid: number;
  try {
    pid = control.spawnDetached({
      command: spec.command,
      args: spec.args,
      cwd: spec.cwd,
      logFile,
      logMode: spec.logMode,
      env: spec.env,
    });
  } catch (error: unknown) {
    if (error instanceof ProcessSpawnError) throw error;
    const msg = error instanceof Error ? error.message : String(error);
    throw new ProcessSpawnError(phase, spec.command, msg);
  }

  registry.put({
    name: spec.name,
    pid,
    command: spec.command,
    args: spec.args,
    logFile,
    startedAt: new Date().toISOString(),
  });
  logger.info(`${spec.name} started (pid ${pid}), logging to ${logFile}.`);

  return { name: spec.name, pid, replacedPid, keptPid, logFile };
}

// ---------------------------------------------------------------------------
// Stack processes
// ---------------------------------------------------------------------------

export function workerSpec(config: StackConfig, projectDir: string): LaunchSpec {
  const { worker } = config;
  return {
    name: "worker",
    command: worker.command,
    args: expandArgs(worker.args, { app: config.app }),
    cwd: projectDir,
    logFile: worker.logFile,
    logMode: worker.logMode,
    duplicates: worker.duplicates,
  };
}

export function monitorSpec(config: StackConfig, projectDir: string): LaunchSpec {
  const { monitor } = config;
  return {
    name: "monitor",
    command: monitor.command,
    args: expandArgs(monitor.args, { app: config.app, port: monitor.port }),
    cwd: projectDir,
    logFile: monitor.logFile,
    logMode: monitor.logMode,
    duplicates: monitor.duplicates,
  };
}

/** Start the task worker, replacing a previous one by default. */
export function launchWorker(
  config: StackConfig,
  projectDir: string,
  deps: SupervisorDeps,
): Promise<LaunchResult> {
  return launchProcess(workerSpec(config, projectDir), deps, "worker");
}

/** Start the monitoring dashboard. */
export function launchMonitor(
  config: StackConfig,
  projectDir: string,
  deps: SupervisorDeps,
): Promise<LaunchResult> {
  return launchProcess(monitorSpec(config, projectDir), deps, "monitor");
}
