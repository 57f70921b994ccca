/**
 * Admin Audit Log Schema
 *
 * One row per committed administrative mutation. Rows are written inside
 * the mutation's own transaction and are never updated or deleted.
 */

import { pgTable, bigserial, varchar, integer, jsonb, index } from 'drizzle-orm/pg-core';
import { sortableIdColumn, timestampColumn } from './common.js';

export const AUDIT_COLUMN_LIMITS = {
	method: 8,
	path: 256,
	entityType: 32,
	entityId: 64,
	outcome: 16,
	actorId: 64,
	actorName: 128,
	ipAddress: 45,
} as const;

export const adminAuditLog = pgTable(
	'admin_audit_log',
	{
		id: bigserial('id', { mode: 'number' }).primaryKey(),

		// "-" when the request carried no trace id
		traceId: sortableIdColumn('trace_id').notNull(),

		method: varchar('method', { length: AUDIT_COLUMN_LIMITS.method }).notNull(),
		path: varchar('path', { length: AUDIT_COLUMN_LIMITS.path }).notNull(),
		entityType: varchar('entity_type', { length: AUDIT_COLUMN_LIMITS.entityType }).notNull(),
		entityId: varchar('entity_id', { length: AUDIT_COLUMN_LIMITS.entityId }),
		outcome: varchar('outcome', { length: AUDIT_COLUMN_LIMITS.outcome }).notNull(),
		statusCode: integer('status_code'),

		actorId: varchar('actor_id', { length: AUDIT_COLUMN_LIMITS.actorId }).notNull(),
		actorName: varchar('actor_name', { length: AUDIT_COLUMN_LIMITS.actorName }).notNull(),
		ipAddress: varchar('ip_address', { length: AUDIT_COLUMN_LIMITS.ipAddress }),

		payload: jsonb('payload').$type<Record<string, unknown>>(),

		createdAt: timestampColumn('created_at').notNull().defaultNow(),
	},
	(table) => [
		index('idx_admin_audit_log_trace').on(table.traceId),
		index('idx_admin_audit_log_actor').on(table.actorId),
		index('idx_admin_audit_log_created').on(table.createdAt),
		index('idx_admin_audit_log_entity').on(table.entityType, table.entityId),
	],
);

export type AuditLogRecord = typeof adminAuditLog.$inferSelect;

export type NewAuditLog = typeof adminAuditLog.$inferInsert;
