/**
 * CLI program definition for taskstack.
 *
 * Uses Commander to define the command structure. Running `taskstack` with
 * no arguments is the same as `taskstack up`.
 */
import path from "node:path";
import { Command } from "commander";
import { VERSION } from "../version.js";
import {
  loadConfig,
  resolveConfigPath,
  resolveLogDir,
  resolveStateDir,
  type StackConfig,
} from "../config/index.js";
import { createShellRunner, type CommandRunner } from "../exec/command-runner.js";
import { runBootstrap } from "../pipeline/bootstrap.js";
import { exitCodeFor, formatReport } from "../pipeline/report.js";
import { resolveDescriptors } from "../services/brokers.js";
import { SystemServiceManager, type ServiceManager } from "../services/service-manager.js";
import { createLogger, type Logger } from "../shared/logger.js";
import type { LogLevel } from "../shared/types.js";
import { stopProcesses, type SupervisorDeps } from "../supervisor/launcher.js";
import { NodeProcessControl } from "../supervisor/process-control.js";
import { ProcessRegistry } from "../supervisor/registry.js";
import { collectStatus, formatStatus } from "../supervisor/status.js";

export type CliOptions = {
  projectDir?: string;
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
  skipInstall?: boolean;
  skipBrokers?: boolean;
};

/** Everything a command needs, resolved once from the CLI options. */
export interface CliContext {
  projectDir: string;
  config: StackConfig;
  logger: Logger;
  runner: CommandRunner;
  services: ServiceManager;
  supervisor: SupervisorDeps;
}

function resolveLevel(opts: CliOptions): LogLevel {
  if (opts.verbose) return "debug";
  if (opts.quiet) return "warn";
  return "info";
}

/**
 * Resolve the project directory, load configuration and wire the real
 * command runner, service manager and process control.
 */
export function createContext(opts: CliOptions, env: NodeJS.ProcessEnv = process.env): CliContext {
  const projectDir = path.resolve(opts.projectDir ?? process.cwd());
  const stateDir = resolveStateDir(projectDir, env);
  const config = loadConfig(resolveConfigPath(projectDir, opts.config), env);

  const logger = createLogger({}, { level: resolveLevel(opts), logDir: resolveLogDir(stateDir) });
  const commandLog = logger.child({ phase: "exec" });
  const runner = createShellRunner({
    sudo: config.sudo,
    cwd: projectDir,
    onResult: (result) => {
      const line = `${result.command} -> exit ${result.exitCode}`;
      if (result.success) commandLog.debug(line);
      else commandLog.debug(`${line}: ${result.stderr.trim()}`);
    },
  });

  return {
    projectDir,
    config,
    logger,
    runner,
    services: new SystemServiceManager(runner),
    supervisor: {
      registry: new ProcessRegistry(stateDir),
      control: new NodeProcessControl(),
    },
  };
}

export async function handleUp(ctx: CliContext, opts: CliOptions): Promise<number> {
  ctx.logger.info(`Bootstrapping "${ctx.config.app}" in ${ctx.projectDir}`);
  const report = await runBootstrap(
    ctx.config,
    {
      projectDir: ctx.projectDir,
      skipInstall: opts.skipInstall,
      skipBrokers: opts.skipBrokers,
    },
    {
      runner: ctx.runner,
      services: ctx.services,
      supervisor: ctx.supervisor,
      logger: ctx.logger,
    },
  );
  console.log(formatReport(report));
  return exitCodeFor(report);
}

export function handleStatus(ctx: CliContext): number {
  const status = collectStatus(
    ctx.supervisor.registry,
    ctx.supervisor.control,
    ctx.services,
    resolveDescriptors(ctx.config.brokers),
  );
  console.log(formatStatus(status));
  return status.processes.every((p) => p.alive) && status.brokers.every((b) => b.state === "running")
    ? 0
    : 1;
}

export async function handleStop(ctx: CliContext, names: string[]): Promise<number> {
  const results = await stopProcesses(names.length > 0 ? names : undefined, {
    ...ctx.supervisor,
    logger: ctx.logger,
  });
  if (results.length === 0) {
    console.log("[taskstack] No tracked processes to stop.");
    return 0;
  }
  for (const result of results) {
    if (result.error) {
      console.error(`[taskstack] Could not stop ${result.name}: ${result.error.message}`);
    } else if (result.wasAlive) {
      console.log(`[taskstack] Stopped ${result.name} (pid ${result.pid}).`);
    } else {
      console.log(`[taskstack] ${result.name} (pid ${result.pid}) had already exited.`);
    }
  }
  return results.some((r) => r.error) ? 1 : 0;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("taskstack")
    .description("Provision brokers and launch the task worker and monitoring dashboard")
    .version(VERSION)
    .option("--project-dir <path>", "project directory (default: current directory)")
    .option("-c, --config <path>", "configuration file (default: taskstack.yaml)")
    .option("--skip-install", "do not install manifest dependencies")
    .option("--skip-brokers", "do not install or start brokers")
    .option("-v, --verbose", "log every external command")
    .option("-q, --quiet", "only log warnings and errors")
    .action(async (opts: CliOptions) => {
      process.exitCode = await handleUp(createContext(opts), opts);
    });

  program
    .command("up")
    .description("install dependencies, bootstrap brokers, launch worker and monitor")
    .action(async (_opts: unknown, cmd: Command) => {
      const opts = cmd.optsWithGlobals<CliOptions>();
      process.exitCode = await handleUp(createContext(opts), opts);
    });

  program
    .command("status")
    .description("show broker states and tracked processes")
    .action((_opts: unknown, cmd: Command) => {
      process.exitCode = handleStatus(createContext(cmd.optsWithGlobals<CliOptions>()));
    });

  program
    .command("stop")
    .description("stop tracked processes (all, or the named ones)")
    .argument("[names...]", "process names, e.g. worker monitor")
    .action(async (names: string[], _opts: unknown, cmd: Command) => {
      process.exitCode = await handleStop(createContext(cmd.optsWithGlobals<CliOptions>()), names);
    });

  return program;
}
