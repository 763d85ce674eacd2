/**
 * Service manager: the seam between the bootstrapper and the host's package
 * manager (apt-get) and service manager (systemctl).
 *
 * The bootstrapper only talks to the ServiceManager interface, so its state
 * machine is tested against an in-memory fake.
 */
import type { CommandResult, CommandRunner } from "../exec/command-runner.js";
import type { PostInstallCommand, ServiceDescriptor } from "./brokers.js";

export interface ServiceManager {
  /** Whether the broker's binary is on the search path. */
  isInstalled(service: ServiceDescriptor): boolean;
  /** Whether a process matching the broker is running. */
  isRunning(service: ServiceDescriptor): boolean;
  /** Refresh the package index and install the broker's package. */
  install(service: ServiceDescriptor): CommandResult;
  /** Start the broker's system service. */
  start(service: ServiceDescriptor): CommandResult;
  /** Enable the broker's system service at boot. */
  enable(service: ServiceDescriptor): CommandResult;
  /** Run one post-install command. */
  runCommand(command: PostInstallCommand): CommandResult;
}

/**
 * ServiceManager backed by apt-get, systemctl and pgrep.
 *
 * Mutating calls run through sudo when the runner allows it.
 */
export class SystemServiceManager implements ServiceManager {
  private readonly runner: CommandRunner;

  constructor(runner: CommandRunner) {
    this.runner = runner;
  }

  isInstalled(service: ServiceDescriptor): boolean {
    return this.runner.which(service.binary);
  }

  isRunning(service: ServiceDescriptor): boolean {
    const flag = service.matchFullCommand ? "-f" : "-x";
    return this.runner.run("pgrep", [flag, service.processPattern]).success;
  }

  install(service: ServiceDescriptor): CommandResult {
    const update = this.runner.run("apt-get", ["update"], { sudo: true });
    if (!update.success) return update;
    return this.runner.run("apt-get", ["install", "-y", service.packageName], { sudo: true });
  }

  start(service: ServiceDescriptor): CommandResult {
    return this.runner.run("systemctl", ["start", service.serviceName], { sudo: true });
  }

  enable(service: ServiceDescriptor): CommandResult {
    return this.runner.run("systemctl", ["enable", service.serviceName], { sudo: true });
  }

  runCommand(command: PostInstallCommand): CommandResult {
    return this.runner.run(command.file, command.args, { sudo: true });
  }
}
