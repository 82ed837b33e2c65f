export { createAuditStore, createInMemoryAuditStore } from './audit-store.js';
export {
	AUDIT_DECISIONS,
	AUDIT_RESULTS,
	type AuditDecision,
	type AuditEntry,
	type AuditFilters,
	type AuditResult,
	type AuditStore,
	type ToolUsage,
} from './types.js';
