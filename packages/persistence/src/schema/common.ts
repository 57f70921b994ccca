/**
 * Common Schema Definitions
 */

import { varchar, timestamp } from 'drizzle-orm/pg-core';

/**
 * 26-character sortable ID column (Crockford Base32).
 * Used for trace ids and entity primary keys.
 */
export const sortableIdColumn = (name: string) => varchar(name, { length: 26 });

/**
 * Standard timestamp column with timezone.
 */
export const timestampColumn = (name: string) => timestamp(name, { withTimezone: true, mode: 'date' });

export const baseEntityColumns = {
	id: sortableIdColumn('id').primaryKey(),
	createdAt: timestampColumn('created_at').notNull().defaultNow(),
	updatedAt: timestampColumn('updated_at').notNull().defaultNow(),
};

export interface BaseEntity {
	readonly id: string;
	readonly createdAt: Date;
	readonly updatedAt: Date;
}
