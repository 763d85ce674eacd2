/**
 * Base error for failures attributable to one bootstrap phase.
 *
 * The pipeline converts these into PhaseResults; anything else reaching the
 * pipeline boundary is reported as an unexpected failure of the running phase.
 */
import type { BootstrapPhase } from "./types.js";

export class BootstrapError extends Error {
  readonly phase: BootstrapPhase;

  constructor(phase: BootstrapPhase, message: string) {
    super(message);
    this.name = "BootstrapError";
    this.phase = phase;
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
