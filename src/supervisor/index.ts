/**
 * Process supervision for taskstack.
 *
 * Handles detached worker/monitor lifecycle with explicit pid ownership.
 */
export { ProcessRegistry, RegistryError, registryFilePath } from "./registry.js";
export { NodeProcessControl, ProcessSpawnError, commandMatches, isTrackedProcess } from "./process-control.js";
export type { ProcessControl, SpawnRequest } from "./process-control.js";
export {
  launchProcess,
  launchWorker,
  launchMonitor,
  stopProcesses,
  workerSpec,
  monitorSpec,
  ProcessStopError,
} from "./launcher.js";
export type { LaunchResult, LaunchSpec, StopResult, SupervisorDeps } from "./launcher.js";
export { collectStatus, formatStatus } from "./status.js";
export type { BrokerStatus, ProcessStatus, StackStatus } from "./status.js";
