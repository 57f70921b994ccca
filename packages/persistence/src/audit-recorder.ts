/**
 * Audit Recorder
 *
 * Writes the audit record for a mutating request through the request's own
 * unit of work, so the record commits or rolls back together with the
 * change it describes. Insert failures are not caught here: they reject
 * the work and roll the whole unit of work back.
 */

import type { Actor } from '@gatehouse/domain-core';
import type { UnitOfWork } from './unit-of-work.js';
import { AUDIT_COLUMN_LIMITS, type AuditLogRecord, type NewAuditLog } from './schema/audit-log.js';
import type { AuditLogWriter } from './repositories/audit-log-repository.js';

export type AuditOutcome = 'success' | 'failure';

export interface AuditEntry {
	readonly method: string;
	readonly path: string;
	readonly entityType: string;
	readonly entityId?: string | null | undefined;
	readonly outcome: AuditOutcome;
	readonly statusCode?: number | undefined;
	readonly actor: Actor;
	/** Non-secret description of the change; never raw credentials */
	readonly payload?: Record<string, unknown> | null | undefined;
}

export interface AuditRecorder {
	/**
	 * @throws UnitOfWorkStateError when the unit of work is not active
	 */
	record(uow: UnitOfWork, entry: AuditEntry): Promise<AuditLogRecord>;
}

const MUTATING_METHODS: ReadonlySet<string> = new Set(['POST', 'PUT', 'PATCH', 'DELETE']);

export function isMutatingMethod(method: string): boolean {
	return MUTATING_METHODS.has(method.toUpperCase());
}

export interface AuditTarget {
	readonly entityType: string;
	readonly entityId: string | null;
}

/**
 * Derive the audited entity from an admin path:
 * `/admin/<entity>/<id>/...` → `{ entityType: '<entity>', entityId: '<id>' }`.
 * Query strings are ignored; paths outside /admin fall back to their first segment.
 */
export function describeTarget(path: string): AuditTarget {
	const [pathname = ''] = path.split('?');
	const segments = pathname.split('/').filter((segment) => segment.length > 0);
	const offset = segments[0] === 'admin' ? 1 : 0;

	const entityType = segments[offset] ?? 'unknown';
	const entityId = segments[offset + 1] ?? null;

	return {
		entityType: truncate(entityType, AUDIT_COLUMN_LIMITS.entityType),
		entityId: entityId === null ? null : truncate(decodeSegment(entityId), AUDIT_COLUMN_LIMITS.entityId),
	};
}

function decodeSegment(segment: string): string {
	try {
		return decodeURIComponent(segment);
	} catch {
		return segment;
	}
}

function truncate(value: string, length: number): string {
	return value.length > length ? value.slice(0, length) : value;
}

export function createAuditRecorder(writer: AuditLogWriter): AuditRecorder {
	return {
		async record(uow: UnitOfWork, entry: AuditEntry): Promise<AuditLogRecord> {
			uow.assertActive();

			const row: NewAuditLog = {
				traceId: uow.traceContext.idOrSentinel(),
				method: truncate(entry.method.toUpperCase(), AUDIT_COLUMN_LIMITS.method),
				path: truncate(entry.path, AUDIT_COLUMN_LIMITS.path),
				entityType: truncate(entry.entityType, AUDIT_COLUMN_LIMITS.entityType),
				entityId: entry.entityId == null ? null : truncate(entry.entityId, AUDIT_COLUMN_LIMITS.entityId),
				outcome: entry.outcome,
				statusCode: entry.statusCode ?? null,
				actorId: truncate(entry.actor.id, AUDIT_COLUMN_LIMITS.actorId),
				actorName: truncate(entry.actor.name, AUDIT_COLUMN_LIMITS.actorName),
				ipAddress: entry.actor.ipAddress === null ? null : truncate(entry.actor.ipAddress, AUDIT_COLUMN_LIMITS.ipAddress),
				payload: entry.payload ?? null,
			};

			const record = await writer.append(row, uow.tx);
			uow.logger.info(
				{ auditId: record.id, entityType: record.entityType, entityId: record.entityId, method: record.method },
				'audit record written',
			);
			return record;
		},
	};
}
