/**
 * Shared utilities for taskstack.
 */
export type {
  BootstrapPhase,
  BootstrapReport,
  BrokerId,
  DuplicatePolicy,
  LogEntry,
  LogLevel,
  LogMode,
  PhaseResult,
  PhaseStatus,
  ProcessRecord,
  ServiceState,
} from "./types.js";
export { BOOTSTRAP_PHASES, BROKER_IDS, SERVICE_STATES } from "./types.js";
export { Logger, createLogger, createSilentLogger } from "./logger.js";
export type { LoggerContext, LoggerOptions } from "./logger.js";
export { pollUntil, waitFor, sleep, PollTimeoutError } from "./poll.js";
export type { PollOptions } from "./poll.js";
export { BootstrapError, errorMessage } from "./errors.js";
