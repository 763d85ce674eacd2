/**
 * Security module for taskstack.
 *
 * Exports secret redaction and the management-credential audit.
 */
export { redactSecrets, containsSecret } from "./redact.js";
export {
  auditManagementCredentials,
  hasBlockingFinding,
  DEFAULT_RABBITMQ_USER,
  MANAGEMENT_PORT,
} from "./audit.js";
export type { AuditFinding, AuditSeverity, ManagementCredentials } from "./audit.js";
