import { describe, it, expect } from 'vitest';
import { PasswordPolicy, MIN_LENGTH, SPECIAL_CHARACTERS } from '../password-policy.js';

describe('PasswordPolicy', () => {
	describe('validate', () => {
		it('should accept a password meeting every rule', () => {
			expect(PasswordPolicy.validate('Abcdefgh12$A')).toEqual({ accepted: true, unmet: [] });
		});

		it('should report every unmet rule', () => {
			expect(PasswordPolicy.validate('Abcdef12345')).toEqual({
				accepted: false,
				unmet: ['MIN_LENGTH', 'SPECIAL'],
			});
		});

		it('should reject 11 characters even when the rest is satisfied', () => {
			expect(PasswordPolicy.validate('Abcdef1234$').unmet).toEqual(['MIN_LENGTH']);
		});

		it('should require an ASCII uppercase letter', () => {
			expect(PasswordPolicy.validate('abcdefgh12$a').unmet).toEqual(['UPPERCASE']);
			expect(PasswordPolicy.validate('äbcdefgh12$ä').unmet).toEqual(['UPPERCASE']);
		});

		it('should require an ASCII digit', () => {
			expect(PasswordPolicy.validate('Abcdefghij$k').unmet).toEqual(['DIGIT']);
			expect(PasswordPolicy.validate('Abcdefghij$１').unmet).toEqual(['DIGIT']);
		});

		it('should only count characters from the fixed special set', () => {
			expect(PasswordPolicy.validate('Abcdefgh1234_').unmet).toEqual(['SPECIAL']);
			expect(PasswordPolicy.validate('Abcdefgh1234-').unmet).toEqual(['SPECIAL']);
		});

		it('should accept each character of the special set', () => {
			for (const special of SPECIAL_CHARACTERS) {
				expect(PasswordPolicy.validate(`Abcdefgh123${special}`).accepted).toBe(true);
			}
		});

		it('should count code points rather than UTF-16 units', () => {
			expect(PasswordPolicy.validate(`Aa1$${'😀'.repeat(8)}`).accepted).toBe(true);
			expect(PasswordPolicy.validate(`Aa1$${'😀'.repeat(7)}`).unmet).toEqual(['MIN_LENGTH']);
		});

		it('should accept non-ASCII letters alongside the required classes', () => {
			expect(PasswordPolicy.validate('Ünïcødé12$AB').accepted).toBe(true);
		});

		it('should report all rules for an empty string', () => {
			expect(PasswordPolicy.validate('').unmet).toEqual(['MIN_LENGTH', 'UPPERCASE', 'DIGIT', 'SPECIAL']);
		});
	});

	describe('check', () => {
		it('should succeed for a strong password', () => {
			expect(PasswordPolicy.check('Abcdefgh12$A').isOk()).toBe(true);
		});

		it('should carry the unmet rules and their messages', () => {
			const error = PasswordPolicy.check('Abcdef1234$')._unsafeUnwrapErr();

			expect(error).toEqual({
				type: 'policy_violation',
				unmet: ['MIN_LENGTH'],
				message: 'Password must be at least 12 characters',
			});
		});
	});

	describe('requirements', () => {
		it('should describe the enforced rules', () => {
			expect(PasswordPolicy.requirements()).toEqual({
				minLength: MIN_LENGTH,
				requireUppercase: true,
				requireDigit: true,
				requireSpecial: true,
				specialCharacters: '!@#$%^&*(),.?":{}|<>',
				maxAgeDays: 90,
				historySize: 3,
				message: 'Password must be at least 12 characters with uppercase, number, and special character',
			});
		});
	});

	describe('rotation', () => {
		const changedAt = new Date('2026-01-01T00:00:00.000Z');

		it('should expire 90 days after the last change', () => {
			expect(PasswordPolicy.expiresAt(changedAt).toISOString()).toBe('2026-04-01T00:00:00.000Z');
		});

		it('should not be expired just before the deadline', () => {
			expect(PasswordPolicy.isExpired(changedAt, new Date('2026-03-31T23:59:59.999Z'))).toBe(false);
		});

		it('should be expired at the deadline', () => {
			expect(PasswordPolicy.isExpired(changedAt, new Date('2026-04-01T00:00:00.000Z'))).toBe(true);
		});
	});
});
