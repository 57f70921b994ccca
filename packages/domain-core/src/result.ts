/**
 * Result Type for Use Case Execution
 *
 * Discriminated union with two variants:
 * - Success<T> - contains the successful result value
 * - Failure<T> - contains the use case error
 *
 * A use case running inside an audited unit of work returns a Result.
 * Success lets the audit record be written and the transaction commit;
 * failure rolls the transaction back with nothing recorded.
 *
 * ```typescript
 * if (!verdict.accepted) {
 *     return Result.failure(UseCaseError.validation('PASSWORD_POLICY_VIOLATION', 'Weak password'));
 * }
 * return Result.success({ principalId });
 * ```
 */

import type { UseCaseError } from './errors.js';

export interface Success<T> {
	readonly _tag: 'success';
	readonly value: T;
}

// T is carried so a Failure can stand in for any Result<T>
export interface Failure<T> {
	readonly _tag: 'failure';
	readonly error: UseCaseError;
	readonly _value?: T;
}

export type Result<T> = Success<T> | Failure<T>;

export function isSuccess<T>(result: Result<T>): result is Success<T> {
	return result._tag === 'success';
}

export function isFailure<T>(result: Result<T>): result is Failure<T> {
	return result._tag === 'failure';
}

export const Result = {
	success<T>(value: T): Success<T> {
		return { _tag: 'success', value };
	},

	failure<T>(error: UseCaseError): Failure<T> {
		return { _tag: 'failure', error };
	},

	isSuccess,

	isFailure,
};
