/**
 * Broker bootstrapper.
 *
 * Drives each broker through an explicit lifecycle:
 *
 *   absent ──install, start, enable, post-install──▶ running
 *   installed-stopped ──start, enable──▶ running
 *   running ──(nothing)──▶ running
 *
 * An installed broker with configured credentials then has its accounts
 * reconciled (administrator created when missing, guest deleted when present).
 *
 * Every command outcome is checked. The first failure stops the transition
 * and, through bootstrapBrokers(), the remaining brokers.
 */
import type { RabbitmqConfig } from "../config/index.js";
import type { CommandResult } from "../exec/command-runner.js";
import { redactSecrets } from "../security/redact.js";
import { BootstrapError } from "../shared/errors.js";
import { createSilentLogger, type Logger } from "../shared/logger.js";
import { pollUntil, type PollOptions } from "../shared/poll.js";
import type { BrokerId, ServiceState } from "../shared/types.js";
import {
  LIST_USERS,
  credentialCommands,
  managesCredentials,
  parseUserList,
  postInstallCommands,
  type ServiceDescriptor,
} from "./brokers.js";
import type { ServiceManager } from "./service-manager.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ServiceAction = "install" | "start" | "enable" | "post-install" | "credentials";

export interface ActionRecord {
  action: ServiceAction;
  /** Post-install label, or the service name. */
  label: string;
  result: CommandResult;
}

export interface BrokerResult {
  id: BrokerId;
  /** State observed before any action. */
  from: ServiceState;
  /** State after the transition (the observed state when it failed). */
  to: ServiceState;
  /** Commands run, in order. Empty when the broker was already running and had nothing to reconcile. */
  actions: ActionRecord[];
  /** Labels of account changes made on a broker that was already installed. */
  reconciled: string[];
  /** Set when the transition failed. */
  error?: ServiceStartError;
}

export interface BootstrapServiceOptions {
  /** RabbitMQ post-install settings. */
  rabbitmq: RabbitmqConfig;
  logger?: Logger;
  /** How long to wait for a started service to show up as running. */
  poll?: PollOptions;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class ServiceStartError extends BootstrapError {
  readonly service: BrokerId;
  readonly result: CommandResult | null;

  constructor(service: ServiceDescriptor, message: string, result: CommandResult | null = null) {
    super("brokers", `${service.displayName}: ${message}`);
    this.name = "ServiceStartError";
    this.service = service.id;
    this.result = result;
  }
}

// ---------------------------------------------------------------------------
// State probing
// ---------------------------------------------------------------------------

export function probeService(service: ServiceDescriptor, manager: ServiceManager): ServiceState {
  if (!manager.isInstalled(service)) return "absent";
  return manager.isRunning(service) ? "running" : "installed-stopped";
}

// ---------------------------------------------------------------------------
// Transitions
// ---------------------------------------------------------------------------

function describeFailure(result: CommandResult): string {
  const command = redactSecrets(result.command);
  const detail = redactSecrets(result.stderr.trim().split("\n")[0]?.trim() ?? "");
  return detail ? `${command} failed: ${detail}` : `${command} exited with ${result.exitCode}`;
}

/**
 * Bring one broker to the running state.
 *
 * A broker that was already installed also gets its accounts reconciled
 * with the configuration, since post-install commands never ran for it.
 * Never throws for command failures: they come back as BrokerResult.error.
 */
export async function bootstrapService(
  service: ServiceDescriptor,
  manager: ServiceManager,
  options: BootstrapServiceOptions,
): Promise<BrokerResult> {
  const logger = (options.logger ?? createSilentLogger()).child({ service: service.id });
  const from = probeService(service, manager);
  const actions: ActionRecord[] = [];
  const reconciled: string[] = [];

  const fail = (message: string, result: CommandResult | null): BrokerResult => {
    const error = new ServiceStartError(service, message, result);
    logger.error(error.message);
    return { id: service.id, from, to: probeService(service, manager), actions, reconciled, error };
  };

  const step = (action: ServiceAction, label: string, run: () => CommandResult): CommandResult => {
    logger.debug(`${action}: ${label}`);
    const result = run();
    actions.push({ action, label, result });
    return result;
  };

  if (from === "running") {
    logger.info(`${service.displayName} is already running.`);
  } else {
    if (from === "absent") {
      logger.info(`${service.displayName} is not installed. Installing ${service.packageName}...`);
      const installed = step("install", service.packageName, () => manager.install(service));
      if (!installed.success) return fail(describeFailure(installed), installed);
    } else {
      logger.info(`${service.displayName} is installed but not running. Starting it...`);
    }

    const started = step("start", service.serviceName, () => manager.start(service));
    if (!started.success) return fail(describeFailure(started), started);

    const enabled = step("enable", service.serviceName, () => manager.enable(service));
    if (!enabled.success) return fail(describeFailure(enabled), enabled);

    if (from === "absent") {
      for (const command of postInstallCommands(service, options.rabbitmq)) {
        const result = step("post-install", command.label, () => manager.runCommand(command));
        if (!result.success) return fail(describeFailure(result), result);
      }
    }

    const up = await pollUntil(() => manager.isRunning(service), {
      ...options.poll,
      onMiss: (attempt) => logger.debug(`not running yet (check ${attempt})`),
    });
    if (!up) {
      return fail(`service ${service.serviceName} was started but no process is running`, null);
    }

    logger.info(
      from === "absent"
        ? `${service.displayName} installed and started.`
        : `${service.displayName} started.`,
    );
  }

  if (from !== "absent" && managesCredentials(service, options.rabbitmq)) {
    const listed = step("credentials", LIST_USERS.label, () => manager.runCommand(LIST_USERS));
    if (!listed.success) return fail(describeFailure(listed), listed);

    for (const command of credentialCommands(service, options.rabbitmq, parseUserList(listed.stdout))) {
      const result = step("credentials", command.label, () => manager.runCommand(command));
      if (!result.success) return fail(describeFailure(result), result);
      reconciled.push(command.label);
    }
    if (reconciled.length > 0) {
      logger.info(`Accounts updated: ${reconciled.join(", ")}.`);
    }
  }

  return { id: service.id, from, to: "running", actions, reconciled };
}

/**
 * Bootstrap brokers in order, stopping at the first failure.
 *
 * Brokers after a failed one are not attempted and do not appear in the results.
 */
export async function bootstrapBrokers(
  services: ServiceDescriptor[],
  manager: ServiceManager,
  options: BootstrapServiceOptions,
): Promise<BrokerResult[]> {
  const results: BrokerResult[] = [];
  for (const service of services) {
    const result = await bootstrapService(service, manager, options);
    results.push(result);
    if (result.error) break;
  }
  return results;
}
