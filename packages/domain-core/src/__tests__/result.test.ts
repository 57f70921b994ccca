import { describe, it, expect } from 'vitest';
import { Result, isSuccess, isFailure } from '../result.js';
import { UseCaseError } from '../errors.js';

describe('Result', () => {
	it('should create a success', () => {
		const result = Result.success('value');

		expect(isSuccess(result)).toBe(true);
		expect(isFailure(result)).toBe(false);
		expect(result.value).toBe('value');
	});

	it('should create a failure', () => {
		const error = UseCaseError.validation('INVALID', 'Invalid input');
		const result = Result.failure<string>(error);

		expect(isFailure(result)).toBe(true);
		expect(result.error).toBe(error);
	});
});
