/**
 * Broker service descriptors.
 *
 * Each descriptor names everything the bootstrapper needs to find, install
 * and start one broker through the system package and service managers.
 */
import type { RabbitmqConfig } from "../config/index.js";
import type { BrokerId } from "../shared/types.js";

export interface ServiceDescriptor {
  id: BrokerId;
  displayName: string;
  /** Executable whose presence on the search path means "installed". */
  binary: string;
  /** Pattern handed to pgrep to decide "running". */
  processPattern: string;
  /** Match processPattern against the full command line (pgrep -f) instead of the name. */
  matchFullCommand: boolean;
  /** System package providing the broker. */
  packageName: string;
  /** System service unit. */
  serviceName: string;
  /** Ports the broker listens on once running. */
  defaultPorts: number[];
}

/** A command run once, right after a fresh install. */
export interface PostInstallCommand {
  file: string;
  args: string[];
  /** Short label for logs and results. */
  label: string;
}

export const REDIS: ServiceDescriptor = {
  id: "redis",
  displayName: "Redis",
  binary: "redis-server",
  processPattern: "redis-server",
  matchFullCommand: false,
  packageName: "redis-server",
  serviceName: "redis-server",
  defaultPorts: [6379],
};

// The broker runs inside an Erlang VM (beam.smp), so its process name never
// matches; the launcher script path shows up in the command line instead.
export const RABBITMQ: ServiceDescriptor = {
  id: "rabbitmq",
  displayName: "RabbitMQ",
  binary: "rabbitmq-server",
  processPattern: "rabbitmq-server",
  matchFullCommand: true,
  packageName: "rabbitmq-server",
  serviceName: "rabbitmq-server",
  defaultPorts: [5672, 15672],
};

const DESCRIPTORS: Record<BrokerId, ServiceDescriptor> = {
  redis: REDIS,
  rabbitmq: RABBITMQ,
};

export function getDescriptor(id: BrokerId): ServiceDescriptor {
  return DESCRIPTORS[id];
}

export function resolveDescriptors(ids: BrokerId[]): ServiceDescriptor[] {
  return ids.map(getDescriptor);
}

/**
 * Commands run after a fresh install of a broker.
 *
 * Only RabbitMQ has any: the management plugin, and, when credentials are
 * configured, an administrator that replaces the guest account.
 */
export function postInstallCommands(
  descriptor: ServiceDescriptor,
  rabbitmq: RabbitmqConfig,
): PostInstallCommand[] {
  if (descriptor.id !== "rabbitmq") return [];

  const commands: PostInstallCommand[] = [];
  if (rabbitmq.management) {
    commands.push({
      file: "rabbitmq-plugins",
      args: ["enable", "rabbitmq_management"],
      label: "enable management plugin",
    });
  }

  const { user, password } = rabbitmq;
  if (user !== null && password !== null) {
    commands.push(...administratorCommands(user, password), DELETE_GUEST);
  }
  return commands;
}

const DELETE_GUEST: PostInstallCommand = {
  file: "rabbitmqctl",
  args: ["delete_user", "guest"],
  label: "delete guest user",
};

function administratorCommands(user: string, password: string): PostInstallCommand[] {
  return [
    { file: "rabbitmqctl", args: ["add_user", user, password], label: `add user ${user}` },
    {
      file: "rabbitmqctl",
      args: ["set_user_tags", user, "administrator"],
      label: `tag ${user} as administrator`,
    },
    {
      file: "rabbitmqctl",
      args: ["set_permissions", "-p", "/", user, ".*", ".*", ".*"],
      label: `grant ${user} permissions on /`,
    },
  ];
}

/** Read-only listing of the broker's users, run before reconciling credentials. */
export const LIST_USERS: PostInstallCommand = {
  file: "rabbitmqctl",
  args: ["-q", "list_users"],
  label: "list users",
};

/**
 * User names from `rabbitmqctl -q list_users` output.
 *
 * Lines are `<name>\t[<tags>]`; the "Listing users" banner and the
 * `user\ttags` header of newer releases are skipped.
 */
export function parseUserList(stdout: string): string[] {
  return stdout
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("Listing users") && !/^user\s+tags$/.test(line))
    .flatMap((line) => line.split(/\s+/, 1));
}

/**
 * Commands that bring an existing broker's accounts in line with the
 * configuration: create the administrator when missing, then delete guest
 * when it is still there. Nothing when no credentials are configured.
 */
export function credentialCommands(
  descriptor: ServiceDescriptor,
  rabbitmq: RabbitmqConfig,
  existingUsers: string[],
): PostInstallCommand[] {
  const { user, password } = rabbitmq;
  if (descriptor.id !== "rabbitmq" || user === null || password === null) return [];

  const commands: PostInstallCommand[] = [];
  if (!existingUsers.includes(user)) {
    commands.push(...administratorCommands(user, password));
  }
  if (existingUsers.includes("guest")) {
    commands.push(DELETE_GUEST);
  }
  return commands;
}

/** Whether a broker has accounts to reconcile on every run. */
export function managesCredentials(descriptor: ServiceDescriptor, rabbitmq: RabbitmqConfig): boolean {
  return descriptor.id === "rabbitmq" && rabbitmq.user !== null && rabbitmq.password !== null;
}
