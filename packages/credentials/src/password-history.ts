/**
 * Password History Guard
 *
 * Rejects a new credential that matches any of the most recently retired
 * hashes. History is ordered oldest first; only the last `size` entries
 * count. Entries are compared newest first and the scan stops on the
 * first match.
 */

import { ResultAsync, errAsync, okAsync } from 'neverthrow';
import type { CredentialError } from './errors.js';
import type { CredentialHash, PasswordHasher } from './password-hasher.js';
import { HISTORY_SIZE } from './password-policy.js';

export class PasswordHistoryGuard {
	constructor(
		private readonly hasher: PasswordHasher,
		private readonly size: number = HISTORY_SIZE,
	) {
		if (!Number.isInteger(size) || size < 1) {
			throw new Error(`History size must be a positive integer, got ${size}`);
		}
	}

	/**
	 * The entries that are still checked, oldest first.
	 */
	window(history: readonly CredentialHash[]): CredentialHash[] {
		return history.slice(-this.size);
	}

	wasUsedRecently(candidate: string, history: readonly CredentialHash[]): Promise<boolean> {
		return this.anyMatches(candidate, this.window(history));
	}

	/**
	 * Reject reuse of the current credential or anything in the window.
	 */
	ensureNotReused(
		candidate: string,
		currentHash: CredentialHash | null,
		history: readonly CredentialHash[],
	): ResultAsync<void, CredentialError> {
		// the current hash is compared on top of the full window
		const checked = currentHash === null ? this.window(history) : [...this.window(history), currentHash];

		return ResultAsync.fromSafePromise(this.anyMatches(candidate, checked)).andThen((reused) =>
			reused
				? errAsync<void, CredentialError>({
						type: 'recently_used',
						message: `Password must differ from the current and last ${this.size} passwords`,
					})
				: okAsync<void, CredentialError>(undefined),
		);
	}

	/**
	 * Append the outgoing hash and drop everything older than the window.
	 */
	retire(history: readonly CredentialHash[], outgoing: CredentialHash): CredentialHash[] {
		return this.window([...history, outgoing]);
	}

	private async anyMatches(candidate: string, hashes: readonly CredentialHash[]): Promise<boolean> {
		for (const hash of [...hashes].reverse()) {
			if (await this.hasher.verify(candidate, hash)) {
				return true;
			}
		}
		return false;
	}
}
