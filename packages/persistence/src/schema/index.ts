/**
 * Schema Exports
 */

export { sortableIdColumn, timestampColumn, baseEntityColumns, type BaseEntity } from './common.js';

export {
	adminAuditLog,
	AUDIT_COLUMN_LIMITS,
	type AuditLogRecord,
	type NewAuditLog,
} from './audit-log.js';

export { applySqlFile, AUDIT_LOG_SQL } from './bootstrap.js';
