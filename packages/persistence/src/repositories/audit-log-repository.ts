/**
 * Audit Log Repository
 *
 * Append plus read-only queries over admin_audit_log. There is no update
 * or delete path.
 */

import { and, desc, eq, sql, type SQL } from 'drizzle-orm';
import { adminAuditLog, type AuditLogRecord, type NewAuditLog } from '../schema/audit-log.js';
import { createPagedResult, type PagedResult, type PageRequest } from '../repository.js';
import type { DrizzleDb, TransactionContext } from '../transaction.js';

/**
 * The write side the audit recorder needs; always inside a transaction.
 */
export interface AuditLogWriter {
	append(row: NewAuditLog, tx: TransactionContext): Promise<AuditLogRecord>;
}

export interface AuditLogFilters {
	readonly traceId?: string | undefined;
	readonly entityType?: string | undefined;
	readonly entityId?: string | undefined;
	readonly actorId?: string | undefined;
	readonly method?: string | undefined;
}

export interface AuditLogRepository extends AuditLogWriter {
	findById(id: number, tx?: TransactionContext): Promise<AuditLogRecord | undefined>;
	findByTraceId(traceId: string, tx?: TransactionContext): Promise<AuditLogRecord[]>;
	findPaged(filters: AuditLogFilters, page: PageRequest, tx?: TransactionContext): Promise<PagedResult<AuditLogRecord>>;
}

export function createAuditLogRepository(defaultDb: DrizzleDb): AuditLogRepository {
	const db = (tx?: TransactionContext): DrizzleDb => tx?.db ?? defaultDb;

	return {
		async append(row: NewAuditLog, tx: TransactionContext): Promise<AuditLogRecord> {
			const [record] = await tx.db.insert(adminAuditLog).values(row).returning();
			if (!record) {
				throw new Error('Audit log insert returned no row');
			}
			return record;
		},

		async findById(id: number, tx?: TransactionContext): Promise<AuditLogRecord | undefined> {
			const [record] = await db(tx).select().from(adminAuditLog).where(eq(adminAuditLog.id, id)).limit(1);
			return record;
		},

		async findByTraceId(traceId: string, tx?: TransactionContext): Promise<AuditLogRecord[]> {
			return db(tx)
				.select()
				.from(adminAuditLog)
				.where(eq(adminAuditLog.traceId, traceId))
				.orderBy(adminAuditLog.id);
		},

		async findPaged(
			filters: AuditLogFilters,
			page: PageRequest,
			tx?: TransactionContext,
		): Promise<PagedResult<AuditLogRecord>> {
			const conditions: SQL[] = [];

			if (filters.traceId) {
				conditions.push(eq(adminAuditLog.traceId, filters.traceId));
			}
			if (filters.entityType) {
				conditions.push(eq(adminAuditLog.entityType, filters.entityType));
			}
			if (filters.entityId) {
				conditions.push(eq(adminAuditLog.entityId, filters.entityId));
			}
			if (filters.actorId) {
				conditions.push(eq(adminAuditLog.actorId, filters.actorId));
			}
			if (filters.method) {
				conditions.push(eq(adminAuditLog.method, filters.method.toUpperCase()));
			}

			const whereClause = conditions.length > 0 ? and(...conditions) : undefined;

			const [records, countResult] = await Promise.all([
				db(tx)
					.select()
					.from(adminAuditLog)
					.where(whereClause)
					.orderBy(desc(adminAuditLog.createdAt), desc(adminAuditLog.id))
					.limit(page.pageSize)
					.offset(page.page * page.pageSize),
				db(tx)
					.select({ count: sql<number>`count(*)` })
					.from(adminAuditLog)
					.where(whereClause),
			]);

			return createPagedResult(records, page.page, page.pageSize, Number(countResult[0]?.count ?? 0));
		},
	};
}
