/**
 * Response Utilities
 *
 * Maps use case Results onto Fastify replies.
 */

import type { FastifyReply } from 'fastify';
import { Result, UseCaseError } from '@gatehouse/domain-core';
import type { ErrorResponse } from './types.js';

export function getErrorStatus(error: UseCaseError): number {
	return UseCaseError.httpStatus(error);
}

export function toErrorResponse(error: UseCaseError): ErrorResponse {
	const hasDetails = Object.keys(error.details).length > 0;
	return {
		message: error.message,
		code: error.code,
		...(hasDetails ? { details: error.details } : {}),
	};
}

export interface SendResultOptions<T, R> {
	/** Status code for success (default: 200) */
	successStatus?: number;
	/** Transform success value before sending */
	transform?: (value: T) => R;
}

/**
 * Send a Result as an HTTP response.
 *
 * @example
 * ```typescript
 * const prepared = await createPrincipalUseCase.prepare(command, request.traceContext);
 * if (Result.isFailure(prepared)) {
 *     return sendResult(reply, prepared);
 * }
 * ```
 */
export function sendResult<T, R = T>(
	reply: FastifyReply,
	result: Result<T>,
	options: SendResultOptions<T, R> = {},
): FastifyReply {
	const { successStatus = 200, transform } = options;

	if (Result.isSuccess(result)) {
		const value = transform ? transform(result.value) : result.value;
		return reply.status(successStatus).send(value);
	}

	return reply.status(getErrorStatus(result.error)).send(toErrorResponse(result.error));
}

export function jsonSuccess<T>(reply: FastifyReply, data: T, status: number = 200): FastifyReply {
	return reply.status(status).send(data);
}

export function jsonError(
	reply: FastifyReply,
	status: number,
	code: string,
	message: string,
	details?: Record<string, unknown>,
): FastifyReply {
	const response: ErrorResponse = {
		code,
		message,
		...(details ? { details } : {}),
	};
	return reply.status(status).send(response);
}

export function notFound(reply: FastifyReply, message: string = 'Not found'): FastifyReply {
	return jsonError(reply, 404, 'NOT_FOUND', message);
}

export function badRequest(reply: FastifyReply, message: string, details?: Record<string, unknown>): FastifyReply {
	return jsonError(reply, 400, 'BAD_REQUEST', message, details);
}
