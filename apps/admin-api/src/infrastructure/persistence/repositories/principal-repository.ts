/**
 * Principal Repository
 *
 * Data access for admin principals. Credential updates are conditional on
 * the hash the caller read, so a competing change makes the update miss
 * instead of silently overwriting it.
 */

import { and, eq } from 'drizzle-orm';
import { resolveDb, type DrizzleDb, type TransactionContext } from '@gatehouse/persistence';
import type { CredentialHash } from '@gatehouse/credentials';
import type { AdminPrincipal } from '../../../domain/index.js';
import { adminPrincipals, type PrincipalRecord } from '../schema/index.js';

export interface CredentialUpdate {
	readonly principalId: string;
	/** Hash read before the change was prepared */
	readonly expectedHash: CredentialHash;
	readonly credentialHash: CredentialHash;
	readonly credentialHistory: readonly CredentialHash[];
	readonly changedAt: Date;
}

export interface PrincipalRepository {
	findById(id: string, tx?: TransactionContext): Promise<AdminPrincipal | undefined>;
	existsByUsername(username: string, tx?: TransactionContext): Promise<boolean>;
	/**
	 * @returns false when the username is already taken
	 */
	insert(principal: AdminPrincipal, tx: TransactionContext): Promise<boolean>;
	/**
	 * @returns false when the stored hash no longer matches `expectedHash`
	 */
	updateCredential(update: CredentialUpdate, tx: TransactionContext): Promise<boolean>;
}

function recordToPrincipal(record: PrincipalRecord): AdminPrincipal {
	return {
		id: record.id,
		username: record.username,
		displayName: record.displayName,
		credentialHash: record.credentialHash,
		credentialHistory: record.credentialHistory,
		credentialChangedAt: record.credentialChangedAt,
		createdAt: record.createdAt,
		updatedAt: record.updatedAt,
	};
}

export function createPrincipalRepository(defaultDb: DrizzleDb): PrincipalRepository {
	return {
		async findById(id: string, tx?: TransactionContext): Promise<AdminPrincipal | undefined> {
			const [record] = await resolveDb(defaultDb, tx)
				.select()
				.from(adminPrincipals)
				.where(eq(adminPrincipals.id, id))
				.limit(1);
			return record ? recordToPrincipal(record) : undefined;
		},

		async existsByUsername(username: string, tx?: TransactionContext): Promise<boolean> {
			const [record] = await resolveDb(defaultDb, tx)
				.select({ id: adminPrincipals.id })
				.from(adminPrincipals)
				.where(eq(adminPrincipals.username, username))
				.limit(1);
			return record !== undefined;
		},

		async insert(principal: AdminPrincipal, tx: TransactionContext): Promise<boolean> {
			const inserted = await tx.db
				.insert(adminPrincipals)
				.values({
					id: principal.id,
					username: principal.username,
					displayName: principal.displayName,
					credentialHash: principal.credentialHash,
					credentialHistory: [...principal.credentialHistory],
					credentialChangedAt: principal.credentialChangedAt,
					createdAt: principal.createdAt,
					updatedAt: principal.updatedAt,
				})
				.onConflictDoNothing({ target: adminPrincipals.username })
				.returning({ id: adminPrincipals.id });
			return inserted.length > 0;
		},

		async updateCredential(update: CredentialUpdate, tx: TransactionContext): Promise<boolean> {
			const updated = await tx.db
				.update(adminPrincipals)
				.set({
					credentialHash: update.credentialHash,
					credentialHistory: [...update.credentialHistory],
					credentialChangedAt: update.changedAt,
					updatedAt: update.changedAt,
				})
				.where(and(eq(adminPrincipals.id, update.principalId), eq(adminPrincipals.credentialHash, update.expectedHash)))
				.returning({ id: adminPrincipals.id });
			return updated.length > 0;
		},
	};
}
