/**
 * Bootstrap pipeline.
 *
 * Runs the four phases in order: install → brokers → worker → monitor.
 *
 * Propagation policy:
 *   - install and brokers are load-bearing: a failure there skips everything after.
 *   - a worker failure fails the report, but the monitor is still attempted.
 *   - a monitor failure is only a warning.
 */
import path from "node:path";
import type { StackConfig } from "../config/index.js";
import type { CommandRunner } from "../exec/command-runner.js";
import { installDependencies } from "../installer/dependency-installer.js";
import { auditManagementCredentials, hasBlockingFinding } from "../security/audit.js";
import { bootstrapBrokers, type BrokerResult } from "../services/bootstrapper.js";
import { resolveDescriptors } from "../services/brokers.js";
import type { ServiceManager } from "../services/service-manager.js";
import { errorMessage } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import type { PollOptions } from "../shared/poll.js";
import type { BootstrapPhase, BootstrapReport, PhaseResult } from "../shared/types.js";
import { launchMonitor, launchWorker, type LaunchResult, type SupervisorDeps } from "../supervisor/launcher.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface BootstrapDeps {
  runner: CommandRunner;
  services: ServiceManager;
  supervisor: SupervisorDeps;
  logger: Logger;
  /** How long to wait for a started broker to show up as running. */
  brokerPoll?: PollOptions;
}

export interface BootstrapOptions {
  /** Directory holding the manifest and receiving the process logs. */
  projectDir: string;
  skipInstall?: boolean;
  skipBrokers?: boolean;
}

// ---------------------------------------------------------------------------
// Phase detail helpers
// ---------------------------------------------------------------------------

function describeBroker(result: BrokerResult): string {
  if (result.error) return result.error.message;
  const state =
    result.from === "running"
      ? `${result.id} already running`
      : result.from === "absent"
        ? `${result.id} installed and started`
        : `${result.id} started`;
  return result.reconciled.length > 0 ? `${state} (${result.reconciled.join(", ")})` : state;
}

function describeLaunch(result: LaunchResult): string {
  const parts = [`pid ${result.pid}`];
  if (result.replacedPid !== null) parts.push(`replaced pid ${result.replacedPid}`);
  if (result.keptPid !== null) parts.push(`pid ${result.keptPid} still running`);
  return `${parts.join(", ")} -> ${result.logFile}`;
}

function skipped(phase: BootstrapPhase, detail: string): PhaseResult {
  return { phase, status: "skipped", detail };
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export async function runBootstrap(
  config: StackConfig,
  options: BootstrapOptions,
  deps: BootstrapDeps,
): Promise<BootstrapReport> {
  const phases: PhaseResult[] = [];
  let fatal: BootstrapPhase | null = null;

  const record = (result: PhaseResult): void => {
    phases.push(result);
    const log = deps.logger.child({ phase: result.phase });
    if (result.status === "failed") log.error(result.detail);
    else if (result.status === "warning") log.warn(result.detail);
    else log.debug(`${result.status}: ${result.detail}`);
  };

  // --- install ---
  if (options.skipInstall) {
    record(skipped("install", "skipped by request"));
  } else {
    const logger = deps.logger.child({ phase: "install" });
    try {
      const manifestPath = path.resolve(options.projectDir, config.manifest);
      const result = installDependencies(manifestPath, deps.runner, {
        installer: config.installer.command,
        logger,
      });
      record({
        phase: "install",
        status: "ok",
        detail: result.skipped
          ? "manifest lists no dependencies"
          : `${result.packages.length} dependencies installed`,
      });
    } catch (error: unknown) {
      record({ phase: "install", status: "failed", detail: errorMessage(error) });
      fatal = "install";
    }
  }

  // --- brokers ---
  if (fatal) {
    record(skipped("brokers", `not run: ${fatal} failed`));
  } else if (options.skipBrokers) {
    record(skipped("brokers", "skipped by request"));
  } else {
    const logger = deps.logger.child({ phase: "brokers" });
    const services = resolveDescriptors(config.brokers);
    const findings = services.some((s) => s.id === "rabbitmq")
      ? auditManagementCredentials(config.rabbitmq)
      : [];

    if (hasBlockingFinding(findings)) {
      const messages = findings.filter((f) => f.severity === "error").map((f) => f.message);
      record({ phase: "brokers", status: "failed", detail: messages.join(" ") });
      fatal = "brokers";
    } else {
      try {
        const results = await bootstrapBrokers(services, deps.services, {
          rabbitmq: config.rabbitmq,
          logger,
          poll: deps.brokerPoll,
        });
        const detail = results.map(describeBroker).join("; ") || "no brokers configured";
        if (results.some((r) => r.error)) {
          record({ phase: "brokers", status: "failed", detail });
          fatal = "brokers";
        } else if (findings.length > 0) {
          record({
            phase: "brokers",
            status: "warning",
            detail: `${detail}; ${findings.map((f) => f.message).join(" ")}`,
          });
        } else {
          record({ phase: "brokers", status: "ok", detail });
        }
      } catch (error: unknown) {
        record({ phase: "brokers", status: "failed", detail: errorMessage(error) });
        fatal = "brokers";
      }
    }
  }

  // --- worker ---
  if (fatal) {
    record(skipped("worker", `not run: ${fatal} failed`));
  } else {
    try {
      const result = await launchWorker(config, options.projectDir, {
        ...deps.supervisor,
        logger: deps.logger.child({ phase: "worker" }),
      });
      record({ phase: "worker", status: "ok", detail: describeLaunch(result) });
    } catch (error: unknown) {
      record({ phase: "worker", status: "failed", detail: errorMessage(error) });
    }
  }

  // --- monitor ---
  if (fatal) {
    record(skipped("monitor", `not run: ${fatal} failed`));
  } else {
    try {
      const result = await launchMonitor(config, options.projectDir, {
        ...deps.supervisor,
        logger: deps.logger.child({ phase: "monitor" }),
      });
      record({
        phase: "monitor",
        status: result.keptPid === null ? "ok" : "warning",
        detail: describeLaunch(result),
      });
    } catch (error: unknown) {
      record({ phase: "monitor", status: "warning", detail: `monitor not started: ${errorMessage(error)}` });
    }
  }

  return { phases, ok: phases.every((p) => p.status !== "failed") };
}
