import type { AuditLogFilters, AuditLogRepository } from '../repositories/audit-log-repository.js';
import { createPagedResult, type PagedResult, type PageRequest } from '../repository.js';
import type { AuditLogRecord, NewAuditLog } from '../schema/audit-log.js';
import type { TransactionContext } from '../transaction.js';
import type { InMemoryTransactionManager } from './in-memory-transaction.js';

export interface InMemoryAuditLogRepository extends AuditLogRepository {
	/** Committed rows, in insertion order */
	readonly rows: readonly AuditLogRecord[];
	/** Make the next append reject, as a failed INSERT would */
	failNextAppend(error: Error): void;
}

function matches(record: AuditLogRecord, filters: AuditLogFilters): boolean {
	return (
		(filters.traceId === undefined || record.traceId === filters.traceId) &&
		(filters.entityType === undefined || record.entityType === filters.entityType) &&
		(filters.entityId === undefined || record.entityId === filters.entityId) &&
		(filters.actorId === undefined || record.actorId === filters.actorId) &&
		(filters.method === undefined || record.method === filters.method.toUpperCase())
	);
}

export function createInMemoryAuditLogRepository(
	transactions: InMemoryTransactionManager,
): InMemoryAuditLogRepository {
	const rows: AuditLogRecord[] = [];
	let nextId = 1;
	let appendFailure: Error | null = null;

	return {
		rows,

		async append(row: NewAuditLog, tx: TransactionContext): Promise<AuditLogRecord> {
			if (appendFailure) {
				const failure = appendFailure;
				appendFailure = null;
				throw failure;
			}

			const record: AuditLogRecord = {
				id: row.id ?? nextId++,
				traceId: row.traceId,
				method: row.method,
				path: row.path,
				entityType: row.entityType,
				entityId: row.entityId ?? null,
				outcome: row.outcome,
				statusCode: row.statusCode ?? null,
				actorId: row.actorId,
				actorName: row.actorName,
				ipAddress: row.ipAddress ?? null,
				payload: row.payload ?? null,
				createdAt: row.createdAt ?? new Date(),
			};
			transactions.stage(tx, () => rows.push(record));
			return record;
		},

		async findById(id: number): Promise<AuditLogRecord | undefined> {
			return rows.find((record) => record.id === id);
		},

		async findByTraceId(traceId: string): Promise<AuditLogRecord[]> {
			return rows.filter((record) => record.traceId === traceId);
		},

		async findPaged(filters: AuditLogFilters, page: PageRequest): Promise<PagedResult<AuditLogRecord>> {
			const matching = rows.filter((record) => matches(record, filters)).reverse();
			const start = page.page * page.pageSize;
			return createPagedResult(matching.slice(start, start + page.pageSize), page.page, page.pageSize, matching.length);
		},

		failNextAppend(error: Error): void {
			appendFailure = error;
		},
	};
}
