/**
 * Transaction Management
 *
 * Thin layer over Drizzle transactions on postgres.js. A transaction
 * commits when the callback resolves and rolls back when it rejects;
 * there are no retries at this level or above it.
 */

import { sql } from 'drizzle-orm';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';

/**
 * Any Drizzle handle on postgres.js: the pooled database or an open transaction.
 */
export type DrizzleDb = PgDatabase<PostgresJsQueryResultHKT>;

/**
 * Transaction context passed to repository operations.
 */
export interface TransactionContext {
	/** Drizzle handle scoped to this transaction */
	readonly db: DrizzleDb;
}

export interface TransactionManager {
	/**
	 * Run `fn` inside a transaction on one pooled connection.
	 * Resolve commits; reject rolls back and re-throws.
	 */
	inTransaction<T>(fn: (tx: TransactionContext) => Promise<T>): Promise<T>;

	/**
	 * Round-trip on the transaction's connection so a stale socket fails
	 * before business code runs.
	 */
	ping(tx: TransactionContext): Promise<void>;

	/** Non-transactional handle for read-only queries */
	readonly db: DrizzleDb;
}

export function createTransactionManager(db: DrizzleDb): TransactionManager {
	return {
		db,
		async inTransaction<T>(fn: (tx: TransactionContext) => Promise<T>): Promise<T> {
			return db.transaction(async (tx) => fn({ db: tx }));
		},
		async ping(tx: TransactionContext): Promise<void> {
			await tx.db.execute(sql`select 1`);
		},
	};
}

/**
 * Resolve the database handle from a transaction context or fall back to default.
 */
export function resolveDb(defaultDb: DrizzleDb, tx?: TransactionContext): DrizzleDb {
	return tx?.db ?? defaultDb;
}
