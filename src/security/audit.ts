/**
 * Security audit of the broker management surface.
 *
 * The RabbitMQ management plugin serves a web UI on port 15672 and the
 * broker ships with a guest/guest account. The audit reports on whether the
 * configuration replaces that account before the UI is exposed.
 */

export const DEFAULT_RABBITMQ_USER = "guest";
export const MANAGEMENT_PORT = 15672;

export type AuditSeverity = "warn" | "error";

export interface AuditFinding {
  severity: AuditSeverity;
  message: string;
}

export interface ManagementCredentials {
  /** Whether the management plugin gets enabled. */
  management: boolean;
  /** Administrator to create, or null to keep the broker defaults. */
  user: string | null;
  password: string | null;
}

/**
 * Check the management UI credentials.
 *
 * - management disabled: nothing to report
 * - no administrator configured: warn, the guest account stays active
 * - the administrator is guest, or its password is guest: error
 */
export function auditManagementCredentials(creds: ManagementCredentials): AuditFinding[] {
  if (!creds.management) return [];

  if (creds.user === null || creds.password === null) {
    return [
      {
        severity: "warn",
        message:
          `Management UI on port ${MANAGEMENT_PORT} keeps the default ${DEFAULT_RABBITMQ_USER} account. ` +
          "Set rabbitmq.user and rabbitmq.password to replace it.",
      },
    ];
  }

  const findings: AuditFinding[] = [];
  if (creds.user === DEFAULT_RABBITMQ_USER) {
    findings.push({
      severity: "error",
      message: `rabbitmq.user must not be "${DEFAULT_RABBITMQ_USER}"; that account is deleted after provisioning.`,
    });
  }
  if (creds.password === DEFAULT_RABBITMQ_USER) {
    findings.push({
      severity: "error",
      message: `rabbitmq.password must not be the well-known default "${DEFAULT_RABBITMQ_USER}".`,
    });
  }
  return findings;
}

/** True when any finding must stop the bootstrap. */
export function hasBlockingFinding(findings: AuditFinding[]): boolean {
  return findings.some((f) => f.severity === "error");
}
