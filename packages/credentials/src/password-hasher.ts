/**
 * Argon2id Password Hasher
 *
 * Default work factor (OWASP recommended for Argon2id):
 * - Memory cost: 65536 KiB (64 MiB)
 * - Time cost: 3 iterations
 * - Parallelism: 4 threads
 * - Hash length: 32 bytes
 *
 * Output format: PHC string, self-describing its parameters and salt
 * $argon2id$v=19$m=65536,t=3,p=4$<salt>$<hash>
 *
 * Hashing runs on libuv's thread pool. Callers hash before acquiring a
 * unit of work so a pooled connection is never held across it.
 */

import argon2 from 'argon2';
import { ResultAsync } from 'neverthrow';
import type { CredentialError } from './errors.js';

/**
 * PHC-format Argon2id hash string.
 */
export type CredentialHash = string;

export interface PasswordHasherOptions {
	memoryCost?: number;
	timeCost?: number;
	parallelism?: number;
	hashLength?: number;
}

export const DEFAULT_HASHER_OPTIONS: Required<PasswordHasherOptions> = {
	memoryCost: 65536,
	timeCost: 3,
	parallelism: 4,
	hashLength: 32,
};

export class PasswordHasher {
	private readonly options: argon2.Options;

	constructor(options: PasswordHasherOptions = {}) {
		this.options = {
			type: argon2.argon2id,
			...DEFAULT_HASHER_OPTIONS,
			...options,
		};
	}

	/**
	 * Hash a credential with a fresh random salt.
	 */
	hash(candidate: string): ResultAsync<CredentialHash, CredentialError> {
		return ResultAsync.fromPromise(argon2.hash(candidate, this.options), (e) => ({
			type: 'hashing_failed' as const,
			message: `Password hashing failed: ${e instanceof Error ? e.message : String(e)}`,
			cause: e instanceof Error ? e : undefined,
		}));
	}

	/**
	 * Fails closed: a malformed or foreign hash verifies as false, never throws.
	 */
	async verify(candidate: string, hash: CredentialHash): Promise<boolean> {
		if (!hash.startsWith('$argon2')) {
			return false;
		}
		try {
			return await argon2.verify(hash, candidate);
		} catch {
			return false;
		}
	}
}
