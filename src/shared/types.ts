/**
 * Shared TypeScript types for taskstack.
 *
 * Defines the core data structures used across the bootstrap phases:
 * phase names and results, service states, process records and log entries.
 */

// ---------------------------------------------------------------------------
// Bootstrap phases
// ---------------------------------------------------------------------------

export const BOOTSTRAP_PHASES = ["install", "brokers", "worker", "monitor"] as const;

export type BootstrapPhase = (typeof BOOTSTRAP_PHASES)[number];

export type PhaseStatus = "ok" | "skipped" | "warning" | "failed";

export interface PhaseResult {
  /** Phase that produced this result. */
  phase: BootstrapPhase;
  /** Outcome of the phase. */
  status: PhaseStatus;
  /** One-line human-readable summary. */
  detail: string;
}

export interface BootstrapReport {
  /** One result per phase, in execution order. */
  phases: PhaseResult[];
  /** True when no phase failed. Warnings do not affect this. */
  ok: boolean;
}

// ---------------------------------------------------------------------------
// Broker services
// ---------------------------------------------------------------------------

export const SERVICE_STATES = ["absent", "installed-stopped", "running"] as const;

export type ServiceState = (typeof SERVICE_STATES)[number];

export const BROKER_IDS = ["redis", "rabbitmq"] as const;

export type BrokerId = (typeof BROKER_IDS)[number];

// ---------------------------------------------------------------------------
// Supervised processes
// ---------------------------------------------------------------------------

export type LogMode = "truncate" | "append";

/** What to do with a tracked process of the same name that is still alive. */
export type DuplicatePolicy = "replace" | "allow";

export interface ProcessRecord {
  /** Registry key (e.g. "worker", "monitor"). */
  name: string;
  /** OS process id of the spawned process. */
  pid: number;
  /** Executable that was spawned. */
  command: string;
  /** Arguments passed to the executable. */
  args: string[];
  /** Absolute path of the combined stdout/stderr log. */
  logFile: string;
  /** ISO-8601 timestamp of the spawn. */
  startedAt: string;
}

// ---------------------------------------------------------------------------
// Log Entry
// ---------------------------------------------------------------------------

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

export interface LogEntry {
  /** ISO-8601 timestamp. */
  ts: string;
  /** Severity level. */
  level: LogLevel;
  /** Bootstrap phase that emitted the log. */
  phase: string;
  /** Broker or process the message is about, if any. */
  service: string;
  /** Human-readable message. */
  msg: string;
}
