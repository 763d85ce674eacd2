/**
 * Stack status: tracked processes and broker states.
 */
import { probeService } from "../services/bootstrapper.js";
import type { ServiceDescriptor } from "../services/brokers.js";
import type { ServiceManager } from "../services/service-manager.js";
import type { BrokerId, ProcessRecord, ServiceState } from "../shared/types.js";
import { isTrackedProcess, type ProcessControl } from "./process-control.js";
import type { ProcessRegistry } from "./registry.js";

export interface ProcessStatus extends ProcessRecord {
  /** The recorded pid still runs the recorded command line. */
  alive: boolean;
}

export interface BrokerStatus {
  id: BrokerId;
  displayName: string;
  state: ServiceState;
}

export interface StackStatus {
  processes: ProcessStatus[];
  brokers: BrokerStatus[];
}

export function collectStatus(
  registry: ProcessRegistry,
  control: ProcessControl,
  manager: ServiceManager,
  brokers: ServiceDescriptor[],
): StackStatus {
  return {
    processes: registry.list().map((record) => ({ ...record, alive: isTrackedProcess(control, record) })),
    brokers: brokers.map((service) => ({
      id: service.id,
      displayName: service.displayName,
      state: probeService(service, manager),
    })),
  };
}

export function formatStatus(status: StackStatus): string {
  const lines: string[] = ["Brokers:"];
  for (const broker of status.brokers) {
    lines.push(`  ${broker.displayName.padEnd(10)} ${broker.state}`);
  }
  if (status.brokers.length === 0) lines.push("  (none configured)");

  lines.push("Processes:");
  for (const proc of status.processes) {
    const state = proc.alive ? "running" : "exited";
    lines.push(`  ${proc.name.padEnd(10)} pid ${proc.pid} ${state} since ${proc.startedAt} -> ${proc.logFile}`);
  }
  if (status.processes.length === 0) lines.push("  (none tracked)");

  return lines.join("\n");
}
