/**
 * Schema bootstrap
 *
 * Idempotent DDL files applied at startup when AUTO_APPLY_SCHEMA is set.
 * The .sql files sit beside the Drizzle table definitions they mirror.
 */

import { readFile } from 'node:fs/promises';
import type postgres from 'postgres';

export const AUDIT_LOG_SQL = new URL('./audit-log.sql', import.meta.url);

export async function applySqlFile(client: postgres.Sql, file: URL): Promise<void> {
	const ddl = await readFile(file, 'utf8');
	await client.unsafe(ddl);
}
