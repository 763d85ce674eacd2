/**
 * Bootstrap report rendering.
 */
import { redactSecrets } from "../security/redact.js";
import type { BootstrapReport, PhaseStatus } from "../shared/types.js";

const STATUS_LABEL: Record<PhaseStatus, string> = {
  ok: "ok",
  skipped: "skipped",
  warning: "WARN",
  failed: "FAILED",
};

/** One line per phase, then an overall verdict. Details are redacted. */
export function formatReport(report: BootstrapReport): string {
  const lines = report.phases.map(
    (p) => `  ${p.phase.padEnd(8)} ${STATUS_LABEL[p.status].padEnd(7)} ${redactSecrets(p.detail)}`,
  );
  lines.push(report.ok ? "Stack is up." : "Stack bootstrap failed.");
  return lines.join("\n");
}

export function exitCodeFor(report: BootstrapReport): number {
  return report.ok ? 0 : 1;
}
