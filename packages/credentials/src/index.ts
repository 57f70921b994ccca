/**
 * @gatehouse/credentials
 *
 * Credential security for administrator accounts:
 * - Password policy (strength rules, requirements summary, 90-day rotation)
 * - Argon2id hashing with fail-closed verification
 * - Password history guard over the last 3 retired hashes
 */

export {
	PasswordPolicy,
	MIN_LENGTH,
	SPECIAL_CHARACTERS,
	MAX_AGE_DAYS,
	HISTORY_SIZE,
	type PasswordRule,
	type PolicyVerdict,
	type PasswordRequirements,
} from './password-policy.js';

export {
	PasswordHasher,
	DEFAULT_HASHER_OPTIONS,
	type CredentialHash,
	type PasswordHasherOptions,
} from './password-hasher.js';

export { PasswordHistoryGuard } from './password-history.js';

export type { CredentialError } from './errors.js';
