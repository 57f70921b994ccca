/**
 * Admin Principal
 *
 * An administrator account and the credential state the admin API manages.
 * The clear-text password never appears here: only its Argon2id hash and the
 * hashes it has replaced.
 */

import { PasswordPolicy, type CredentialHash } from '@gatehouse/credentials';

export const USERNAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{2,63}$/;
export const DISPLAY_NAME_MAX_LENGTH = 128;

export interface AdminPrincipal {
	readonly id: string;
	readonly username: string;
	readonly displayName: string;
	readonly credentialHash: CredentialHash;
	/** Retired hashes, oldest first */
	readonly credentialHistory: readonly CredentialHash[];
	readonly credentialChangedAt: Date;
	readonly createdAt: Date;
	readonly updatedAt: Date;
}

export interface CredentialStatus {
	readonly principalId: string;
	readonly changedAt: Date;
	readonly expiresAt: Date;
	readonly expired: boolean;
}

export function credentialStatus(
	principal: Pick<AdminPrincipal, 'id' | 'credentialChangedAt'>,
	now: Date = new Date(),
): CredentialStatus {
	return {
		principalId: principal.id,
		changedAt: principal.credentialChangedAt,
		expiresAt: PasswordPolicy.expiresAt(principal.credentialChangedAt),
		expired: PasswordPolicy.isExpired(principal.credentialChangedAt, now),
	};
}
