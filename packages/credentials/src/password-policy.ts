/**
 * Password Policy
 *
 * Fixed strength and rotation rules for administrator credentials:
 * - Length: at least 12 characters (Unicode code points)
 * - At least 1 ASCII uppercase letter
 * - At least 1 ASCII digit
 * - At least 1 character from `!@#$%^&*(),.?":{}|<>`
 * - Maximum credential age: 90 days
 *
 * The rules are compiled in; nothing can relax them at runtime. `validate`
 * and `requirements` read the same constants so the displayed policy can
 * never drift from the enforced one.
 */

import { type Result, ok, err } from 'neverthrow';
import type { CredentialError } from './errors.js';

export const MIN_LENGTH = 12;
export const SPECIAL_CHARACTERS = '!@#$%^&*(),.?":{}|<>';
export const MAX_AGE_DAYS = 90;
export const HISTORY_SIZE = 3;

const DAY_MS = 24 * 60 * 60 * 1000;

export type PasswordRule = 'MIN_LENGTH' | 'UPPERCASE' | 'DIGIT' | 'SPECIAL';

export interface PolicyVerdict {
	readonly accepted: boolean;
	readonly unmet: readonly PasswordRule[];
}

export interface PasswordRequirements {
	readonly minLength: number;
	readonly requireUppercase: boolean;
	readonly requireDigit: boolean;
	readonly requireSpecial: boolean;
	readonly specialCharacters: string;
	readonly maxAgeDays: number;
	readonly historySize: number;
	readonly message: string;
}

const RULE_MESSAGES: Record<PasswordRule, string> = {
	MIN_LENGTH: `Password must be at least ${MIN_LENGTH} characters`,
	UPPERCASE: 'Password must contain at least one uppercase letter',
	DIGIT: 'Password must contain at least one digit',
	SPECIAL: 'Password must contain at least one special character',
};

const RULES: ReadonlyArray<readonly [PasswordRule, (candidate: string) => boolean]> = [
	['MIN_LENGTH', (candidate) => [...candidate].length >= MIN_LENGTH],
	['UPPERCASE', (candidate) => /[A-Z]/.test(candidate)],
	['DIGIT', (candidate) => /[0-9]/.test(candidate)],
	['SPECIAL', (candidate) => [...candidate].some((c) => SPECIAL_CHARACTERS.includes(c))],
];

export const PasswordPolicy = {
	/**
	 * Evaluate every rule and report the ones that failed. Never throws.
	 */
	validate(candidate: string): PolicyVerdict {
		const unmet = RULES.filter(([, passes]) => !passes(candidate)).map(([rule]) => rule);
		return { accepted: unmet.length === 0, unmet };
	},

	/**
	 * `validate` as a Result, for callers composing with other credential steps.
	 */
	check(candidate: string): Result<void, CredentialError> {
		const verdict = PasswordPolicy.validate(candidate);
		if (verdict.accepted) {
			return ok(undefined);
		}
		return err({
			type: 'policy_violation',
			unmet: verdict.unmet,
			message: verdict.unmet.map((rule) => RULE_MESSAGES[rule]).join('; '),
		});
	},

	requirements(): PasswordRequirements {
		return {
			minLength: MIN_LENGTH,
			requireUppercase: true,
			requireDigit: true,
			requireSpecial: true,
			specialCharacters: SPECIAL_CHARACTERS,
			maxAgeDays: MAX_AGE_DAYS,
			historySize: HISTORY_SIZE,
			message: `Password must be at least ${MIN_LENGTH} characters with uppercase, number, and special character`,
		};
	},

	describe(rule: PasswordRule): string {
		return RULE_MESSAGES[rule];
	},

	expiresAt(changedAt: Date): Date {
		return new Date(changedAt.getTime() + MAX_AGE_DAYS * DAY_MS);
	},

	isExpired(changedAt: Date, now: Date = new Date()): boolean {
		return now.getTime() >= PasswordPolicy.expiresAt(changedAt).getTime();
	},
};
