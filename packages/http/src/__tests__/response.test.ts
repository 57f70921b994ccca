import { describe, it, expect } from 'vitest';
import { UseCaseError } from '@gatehouse/domain-core';
import { getErrorStatus, toErrorResponse } from '../response.js';
import { CommonSchemas, safeValidate, Type } from '../openapi.js';

describe('toErrorResponse', () => {
	it('should include details only when present', () => {
		expect(toErrorResponse(UseCaseError.notFound('PRINCIPAL_NOT_FOUND', 'Principal not found'))).toEqual({
			code: 'PRINCIPAL_NOT_FOUND',
			message: 'Principal not found',
		});
		expect(
			toErrorResponse(UseCaseError.validation('PASSWORD_POLICY_VIOLATION', 'Too weak', { unmet: ['MIN_LENGTH'] })),
		).toEqual({ code: 'PASSWORD_POLICY_VIOLATION', message: 'Too weak', details: { unmet: ['MIN_LENGTH'] } });
	});
});

describe('getErrorStatus', () => {
	it.each([
		[UseCaseError.validation('A', 'a'), 400],
		[UseCaseError.notFound('B', 'b'), 404],
		[UseCaseError.businessRule('C', 'c'), 409],
		[UseCaseError.concurrency('D', 'd'), 409],
	])('should map %o to %i', (error, status) => {
		expect(getErrorStatus(error)).toBe(status);
	});
});

describe('safeValidate', () => {
	const Body = Type.Object({ password: Type.String({ minLength: 1 }) });

	it('should return the data when valid', () => {
		expect(safeValidate({ password: 'x' }, Body)).toEqual({ success: true, data: { password: 'x' } });
	});

	it('should describe failures', () => {
		const result = safeValidate({}, Body);
		expect(result.success).toBe(false);
		expect(result.success ? '' : result.error).toContain('/password');
	});

	it('should accept sortable ids and reject others', () => {
		expect(safeValidate('01HQ3V5K8M0000000000000000', CommonSchemas.SortableId).success).toBe(true);
		expect(safeValidate('81HQ3V5K8M0000000000000000', CommonSchemas.SortableId).success).toBe(false);
		expect(safeValidate('01HQ3V5K8M', CommonSchemas.SortableId).success).toBe(false);
	});
});
