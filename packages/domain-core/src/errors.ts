/**
 * Use Case Error Types
 *
 * Closed set of failures a use case may return instead of throwing.
 * Infrastructure faults (lost connections, failed audit writes) are not
 * modelled here: they are thrown, roll the unit of work back, and surface
 * through the HTTP error handler as 500s.
 *
 * HTTP Status Mapping:
 * - ValidationError → 400 Bad Request
 * - NotFoundError → 404 Not Found
 * - BusinessRuleViolation → 409 Conflict
 * - ConcurrencyError → 409 Conflict
 */

export interface UseCaseErrorBase {
	readonly type: string;
	readonly code: string;
	readonly message: string;
	readonly details: Record<string, unknown>;
}

/**
 * Input rejected, including credentials that fail policy or were used recently.
 */
export interface ValidationError extends UseCaseErrorBase {
	readonly type: 'validation';
}

export interface NotFoundError extends UseCaseErrorBase {
	readonly type: 'not_found';
}

/**
 * Entity in the wrong state for the requested change (e.g. duplicate username).
 */
export interface BusinessRuleViolation extends UseCaseErrorBase {
	readonly type: 'business_rule';
}

/**
 * The entity changed between read and write, typically a competing credential change.
 */
export interface ConcurrencyError extends UseCaseErrorBase {
	readonly type: 'concurrency';
}

export type UseCaseError = ValidationError | NotFoundError | BusinessRuleViolation | ConcurrencyError;

export type UseCaseErrorType = UseCaseError['type'];

export const UseCaseError = {
	/**
	 * @example
	 * ```typescript
	 * UseCaseError.validation('PASSWORD_POLICY_VIOLATION', 'Password does not meet policy', { unmet: ['MIN_LENGTH'] })
	 * ```
	 */
	validation(code: string, message: string, details: Record<string, unknown> = {}): ValidationError {
		return { type: 'validation', code, message, details };
	},

	notFound(code: string, message: string, details: Record<string, unknown> = {}): NotFoundError {
		return { type: 'not_found', code, message, details };
	},

	businessRule(code: string, message: string, details: Record<string, unknown> = {}): BusinessRuleViolation {
		return { type: 'business_rule', code, message, details };
	},

	concurrency(code: string, message: string, details: Record<string, unknown> = {}): ConcurrencyError {
		return { type: 'concurrency', code, message, details };
	},

	httpStatus(error: UseCaseError): number {
		switch (error.type) {
			case 'validation':
				return 400;
			case 'not_found':
				return 404;
			case 'business_rule':
			case 'concurrency':
				return 409;
		}
	},
};
