import type { PasswordRule } from './password-policy.js';

export type CredentialError =
	| { type: 'policy_violation'; unmet: readonly PasswordRule[]; message: string }
	| { type: 'recently_used'; message: string }
	| { type: 'hashing_failed'; message: string; cause?: Error | undefined };
