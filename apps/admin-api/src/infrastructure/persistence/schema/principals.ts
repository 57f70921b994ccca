/**
 * Admin Principals Schema
 *
 * Administrator accounts with their current credential hash and the
 * retired hashes kept for reuse checks.
 */

import { pgTable, varchar, jsonb, uniqueIndex } from 'drizzle-orm/pg-core';
import { baseEntityColumns, timestampColumn } from '@gatehouse/persistence';

export const adminPrincipals = pgTable(
	'admin_principals',
	{
		...baseEntityColumns,
		username: varchar('username', { length: 64 }).notNull(),
		displayName: varchar('display_name', { length: 128 }).notNull(),
		credentialHash: varchar('credential_hash', { length: 255 }).notNull(),
		// oldest first, at most 3 entries
		credentialHistory: jsonb('credential_history').$type<string[]>().notNull().default([]),
		credentialChangedAt: timestampColumn('credential_changed_at').notNull(),
	},
	(table) => [uniqueIndex('uq_admin_principals_username').on(table.username)],
);

export type PrincipalRecord = typeof adminPrincipals.$inferSelect;
export type NewPrincipalRecord = typeof adminPrincipals.$inferInsert;

export const PRINCIPALS_SQL = new URL('./principals.sql', import.meta.url);
