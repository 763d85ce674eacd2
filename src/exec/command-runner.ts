/**
 * External command execution.
 *
 * Every package-manager, service-manager and process-lookup call goes through
 * a CommandRunner. A non-zero exit is reported as a failed CommandResult,
 * never thrown and never ignored: callers decide whether it is fatal.
 */
import { execFileSync, type ExecFileSyncOptions } from "node:child_process";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CommandResult {
  /** Whether the command exited with code 0. */
  success: boolean;
  /** Exit code (0 on success, the command's status, or -1 if it never ran). */
  exitCode: number;
  /** Captured stdout. */
  stdout: string;
  /** Captured stderr, or the spawn error message when the command never ran. */
  stderr: string;
  /** The command line as executed, for diagnostics. */
  command: string;
}

export interface RunOptions {
  /** Prefix the command with sudo (when the runner allows it). */
  sudo?: boolean;
  /** Override the runner's timeout for this call. */
  timeout?: number;
}

export interface CommandRunner {
  /** Run a command to completion. */
  run(file: string, args: string[], options?: RunOptions): CommandResult;
  /** Whether an executable is discoverable on the search path. */
  which(binary: string): boolean;
}

export interface ShellRunnerOptions {
  /** Whether `sudo: true` calls are actually prefixed with sudo. Defaults to true. */
  sudo?: boolean;
  /** Per-command timeout in milliseconds. Defaults to 0 (none): installs may take long. */
  timeout?: number;
  /** Working directory for every command. */
  cwd?: string;
  /** Called with every result, for debug logging. */
  onResult?: (result: CommandResult) => void;
}

// ---------------------------------------------------------------------------
// Shell runner
// ---------------------------------------------------------------------------

export function formatCommand(file: string, args: string[]): string {
  return [file, ...args].map((part) => (/[\s"'$]/.test(part) ? JSON.stringify(part) : part)).join(" ");
}

interface ExecFailure {
  stdout?: string | Buffer;
  stderr?: string | Buffer;
  status?: number | null;
  message?: string;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return typeof error === "object" && error !== null;
}

function asText(value: string | Buffer | undefined): string {
  if (value === undefined) return "";
  return typeof value === "string" ? value : value.toString("utf-8");
}

/**
 * Create a CommandRunner backed by execFileSync.
 *
 * Commands run synchronously to completion, matching the strictly
 * sequential bootstrap: nothing else happens while apt-get is running.
 */
export function createShellRunner(options: ShellRunnerOptions = {}): CommandRunner {
  const allowSudo = options.sudo ?? true;
  const defaultTimeout = options.timeout ?? 0;

  function run(file: string, args: string[], runOptions: RunOptions = {}): CommandResult {
    const useSudo = allowSudo && runOptions.sudo === true;
    const [cmd, cmdArgs] = useSudo ? ["sudo", [file, ...args]] : [file, args];
    const command = formatCommand(cmd, cmdArgs);

    const execOptions: ExecFileSyncOptions = {
      encoding: "utf-8",
      stdio: ["ignore", "pipe", "pipe"],
      timeout: runOptions.timeout ?? defaultTimeout,
      cwd: options.cwd,
    };

    let result: CommandResult;
    try {
      const stdout = execFileSync(cmd, cmdArgs, execOptions);
      result = { success: true, exitCode: 0, stdout: asText(stdout), stderr: "", command };
    } catch (error: unknown) {
      const failure: ExecFailure = isExecFailure(error) ? error : { message: String(error) };
      const stderr = asText(failure.stderr);
      result = {
        success: false,
        exitCode: typeof failure.status === "number" ? failure.status : -1,
        stdout: asText(failure.stdout),
        stderr: stderr || (failure.message ?? ""),
        command,
      };
    }

    options.onResult?.(result);
    return result;
  }

  return {
    run,
    which(binary: string): boolean {
      // The binary is a positional parameter, never interpolated into the script.
      return run("sh", ["-c", 'command -v "$1"', "sh", binary]).success;
    },
  };
}
