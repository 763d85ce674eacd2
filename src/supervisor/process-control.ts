/**
 * Process control: spawning detached children and signalling them by pid.
 *
 * Kept behind an interface so the launcher can be tested without spawning
 * anything.
 */
import { execFileSync, spawn } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import { BootstrapError } from "../shared/errors.js";
import type { BootstrapPhase, LogMode, ProcessRecord } from "../shared/types.js";

export interface SpawnRequest {
  command: string;
  args: string[];
  /** Working directory of the child. */
  cwd: string;
  /** Absolute path receiving both stdout and stderr. */
  logFile: string;
  logMode: LogMode;
  env?: NodeJS.ProcessEnv;
}

export interface ProcessControl {
  /** Spawn a child detached from this process and return its pid. */
  spawnDetached(request: SpawnRequest): number;
  /** Whether a process with this pid exists. */
  isAlive(pid: number): boolean;
  /** Argument vector of a live process, or null when it cannot be read. */
  commandLine(pid: number): string[] | null;
  /** Send a signal. Returns false when the process is already gone. */
  terminate(pid: number, signal: NodeJS.Signals): boolean;
}

export class ProcessSpawnError extends BootstrapError {
  readonly command: string;

  constructor(phase: BootstrapPhase, command: string, reason: string) {
    super(phase, `Failed to spawn ${command}: ${reason}`);
    this.name = "ProcessSpawnError";
    this.command = command;
  }
}

/**
 * Whether an argument vector belongs to the process a record describes.
 *
 * The recorded args must be the tail of argv, and the recorded command must
 * appear (by basename) before them. An interpreter in front, as with a
 * script's shebang line, still matches.
 */
export function commandMatches(argv: string[], command: string, args: string[]): boolean {
  const head = argv.length - args.length;
  if (head < 1) return false;
  if (!args.every((arg, i) => argv[head + i] === arg)) return false;
  const name = path.basename(command);
  return argv.slice(0, head).some((part) => path.basename(part) === name);
}

/**
 * Whether the recorded pid is still the process taskstack started.
 *
 * A pid that is gone, or that now runs something else, is not ours and must
 * never be signalled.
 */
export function isTrackedProcess(
  control: ProcessControl,
  record: Pick<ProcessRecord, "pid" | "command" | "args">,
): boolean {
  if (!control.isAlive(record.pid)) return false;
  const argv = control.commandLine(record.pid);
  return argv !== null && commandMatches(argv, record.command, record.args);
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

/**
 * ProcessControl on top of node:child_process and process.kill.
 *
 * The child gets its own process group (detached), an ignored stdin and the
 * log file on both stdout and stderr, then is unref'd so taskstack can exit
 * while it keeps running.
 */
export class NodeProcessControl implements ProcessControl {
  spawnDetached(request: SpawnRequest): number {
    fs.mkdirSync(path.dirname(request.logFile), { recursive: true });
    const fd = fs.openSync(request.logFile, request.logMode === "append" ? "a" : "w");

    try {
      const child = spawn(request.command, request.args, {
        cwd: request.cwd,
        env: request.env ?? process.env,
        detached: true,
        stdio: ["ignore", fd, fd],
      });

      // spawn() reports ENOENT asynchronously; without a pid there is no child.
      child.on("error", () => undefined);
      if (child.pid === undefined) {
        throw new Error(`${request.command} could not be started (not found or not executable)`);
      }

      child.unref();
      return child.pid;
    } finally {
      fs.closeSync(fd);
    }
  }

  isAlive(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch (error: unknown) {
      // EPERM: the process exists but belongs to someone else
      return hasCode(error, "EPERM");
    }
  }

  commandLine(pid: number): string[] | null {
    if (fs.existsSync("/proc/self/cmdline")) {
      try {
        const argv = fs.readFileSync(`/proc/${pid}/cmdline`, "utf-8").split("\0");
        if (argv.at(-1) === "") argv.pop();
        // A zombie has an empty command line
        return argv.length > 0 ? argv : null;
      } catch {
        return null;
      }
    }

    // No procfs: ps only gives the joined command line, split on whitespace.
    try {
      const line = execFileSync("ps", ["-o", "args=", "-p", String(pid)], {
        encoding: "utf-8",
        stdio: ["ignore", "pipe", "ignore"],
      }).trim();
      return line ? line.split(/\s+/) : null;
    } catch {
      return null;
    }
  }

  terminate(pid: number, signal: NodeJS.Signals): boolean {
    try {
      process.kill(pid, signal);
      return true;
    } catch (error: unknown) {
      if (hasCode(error, "ESRCH")) return false;
      throw error;
    }
  }
}
