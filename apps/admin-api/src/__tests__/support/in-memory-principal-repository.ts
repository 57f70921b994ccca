import type { TransactionContext } from '@gatehouse/persistence';
import type { InMemoryTransactionManager } from '@gatehouse/persistence/testing';
import type { AdminPrincipal } from '../../domain/index.js';
import type { CredentialUpdate, PrincipalRepository } from '../../infrastructure/persistence/index.js';

export interface InMemoryPrincipalRepository extends PrincipalRepository {
	/** Committed principals by id */
	readonly principals: ReadonlyMap<string, AdminPrincipal>;
	/** Store a principal outside any transaction */
	seed(principal: AdminPrincipal): void;
	/** Replace the stored hash, as a competing request's committed change would */
	overwriteHash(principalId: string, credentialHash: string): void;
}

/**
 * Principal table stand-in. Writes are staged on the transaction and land
 * on commit; the username and expected-hash checks read committed state,
 * as the database constraints would.
 */
export function createInMemoryPrincipalRepository(transactions: InMemoryTransactionManager): InMemoryPrincipalRepository {
	const principals = new Map<string, AdminPrincipal>();

	const usernameTaken = (username: string) => [...principals.values()].some((p) => p.username === username);

	return {
		principals,

		seed(principal: AdminPrincipal): void {
			principals.set(principal.id, principal);
		},

		overwriteHash(principalId: string, credentialHash: string): void {
			const principal = principals.get(principalId);
			if (!principal) {
				throw new Error(`No principal ${principalId}`);
			}
			principals.set(principalId, { ...principal, credentialHash });
		},

		async findById(id: string): Promise<AdminPrincipal | undefined> {
			return principals.get(id);
		},

		async existsByUsername(username: string): Promise<boolean> {
			return usernameTaken(username);
		},

		async insert(principal: AdminPrincipal, tx: TransactionContext): Promise<boolean> {
			if (usernameTaken(principal.username)) {
				return false;
			}
			transactions.stage(tx, () => principals.set(principal.id, principal));
			return true;
		},

		async updateCredential(update: CredentialUpdate, tx: TransactionContext): Promise<boolean> {
			const current = principals.get(update.principalId);
			if (!current || current.credentialHash !== update.expectedHash) {
				return false;
			}
			transactions.stage(tx, () =>
				principals.set(update.principalId, {
					...current,
					credentialHash: update.credentialHash,
					credentialHistory: [...update.credentialHistory],
					credentialChangedAt: update.changedAt,
					updatedAt: update.changedAt,
				}),
			);
			return true;
		},
	};
}
