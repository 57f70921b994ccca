/**
 * @gatehouse/persistence
 *
 * Database layer for the Gatehouse admin backend, on Drizzle ORM and postgres.js:
 * - Pooled connection with overflow, recycling and a health check
 * - Transaction manager
 * - Unit of work manager (lifecycle, deadlines, abort handling)
 * - Audit recorder writing inside the request's unit of work
 * - admin_audit_log schema and its append/read repository
 *
 * @example
 * ```typescript
 * import {
 *     createDatabase,
 *     createTransactionManager,
 *     createUnitOfWorkManager,
 *     createAuditLogRepository,
 *     createAuditRecorder,
 * } from '@gatehouse/persistence';
 *
 * const database = createDatabase({ url: env.DATABASE_URL, poolSize: 20, maxOverflow: 40 });
 * const transactionManager = createTransactionManager(database.db);
 * const unitOfWorkManager = createUnitOfWorkManager({ transactionManager, logger });
 * const auditRecorder = createAuditRecorder(createAuditLogRepository(database.db));
 * ```
 */

export {
	createDatabase,
	poolOptions,
	DEFAULT_POOL_SIZE,
	DEFAULT_MAX_OVERFLOW,
	DEFAULT_MAX_LIFETIME_SECONDS,
	type Database,
	type DatabaseConfig,
} from './connection.js';

export {
	createTransactionManager,
	resolveDb,
	type DrizzleDb,
	type TransactionContext,
	type TransactionManager,
} from './transaction.js';

export {
	createUnitOfWorkManager,
	UnitOfWorkState,
	type UnitOfWork,
	type UnitOfWorkManager,
	type UnitOfWorkManagerConfig,
	type UnitOfWorkTransition,
	type AcquireOptions,
} from './unit-of-work.js';

export { UnitOfWorkAbortedError, UnitOfWorkStateError, type AbortReason } from './errors.js';

export {
	createAuditRecorder,
	describeTarget,
	isMutatingMethod,
	type AuditRecorder,
	type AuditEntry,
	type AuditOutcome,
	type AuditTarget,
} from './audit-recorder.js';

export {
	createAuditLogRepository,
	type AuditLogRepository,
	type AuditLogWriter,
	type AuditLogFilters,
} from './repositories/audit-log-repository.js';

export {
	createPagedResult,
	pageRequest,
	DEFAULT_PAGE_SIZE,
	MAX_PAGE_SIZE,
	type PagedResult,
	type PageRequest,
} from './repository.js';

export {
	sortableIdColumn,
	timestampColumn,
	baseEntityColumns,
	adminAuditLog,
	AUDIT_COLUMN_LIMITS,
	applySqlFile,
	AUDIT_LOG_SQL,
	type BaseEntity,
	type AuditLogRecord,
	type NewAuditLog,
} from './schema/index.js';
