/**
 * Error Handler
 *
 * Global error handler plugin. Thrown errors never carry a use case
 * failure (those travel as Results), so anything reaching here is either
 * a Fastify request error, a mapped infrastructure error, or a 500.
 */

import type { FastifyPluginAsync, FastifyError } from 'fastify';
import fp from 'fastify-plugin';
import { UnitOfWorkAbortedError } from '@gatehouse/persistence';
import type { ErrorResponse } from './types.js';

export interface ErrorHandlerConfig {
	/** Whether to include stack traces in responses (default: false) */
	readonly includeStack?: boolean;
	readonly mappers?: ErrorMapper[];
}

export interface ErrorMapper {
	canHandle: (error: FastifyError) => boolean;
	toResponse: (error: FastifyError) => { status: number; body: ErrorResponse };
}

/**
 * Handles, in order:
 * - registered mappers
 * - Fastify errors carrying a 4xx statusCode
 * - anything else, as 500 INTERNAL_ERROR
 *
 * 5xx responses are logged at error through the request logger, which
 * carries the trace id.
 *
 * @example
 * ```typescript
 * await fastify.register(errorHandlerPlugin, createStandardErrorHandlerOptions());
 * ```
 */
const errorHandlerPluginAsync: FastifyPluginAsync<ErrorHandlerConfig> = async (fastify, opts) => {
	const { includeStack = false, mappers = [] } = opts;

	fastify.setErrorHandler((error: FastifyError, request, reply) => {
		const log = request.log;

		for (const mapper of mappers) {
			if (mapper.canHandle(error)) {
				const { status, body } = mapper.toResponse(error);

				if (status >= 500) {
					log.error({ err: error, status, code: body.code }, 'Mapped error');
				}

				return reply.status(status).send(body);
			}
		}

		const statusCode = error.statusCode ?? 500;
		if (statusCode >= 400 && statusCode < 500) {
			const body: ErrorResponse = {
				code: `HTTP_${statusCode}`,
				message: error.message || 'An error occurred',
			};
			return reply.status(statusCode).send(body);
		}

		log.error({ err: error }, 'Unhandled error');

		const body: ErrorResponse = {
			code: 'INTERNAL_ERROR',
			message: 'An unexpected error occurred',
			...(includeStack && error.stack ? { details: { stack: error.stack } } : {}),
		};

		return reply.status(500).send(body);
	});
};

export const errorHandlerPlugin = fp(errorHandlerPluginAsync, {
	name: '@gatehouse/error-handler',
	fastify: '5.x',
});

export function createCommonErrorMappers(): ErrorMapper[] {
	return [
		// TypeBox schema failures from Fastify's AJV integration
		{
			canHandle: (e) => e.code === 'FST_ERR_VALIDATION',
			toResponse: (e) => ({
				status: 400,
				body: {
					code: 'VALIDATION_ERROR',
					message: 'Request validation failed',
					...(e.validation ? { details: { errors: e.validation } } : {}),
				},
			}),
		},
		{
			canHandle: (e) => e instanceof SyntaxError && e.message.includes('JSON'),
			toResponse: () => ({
				status: 400,
				body: {
					code: 'INVALID_JSON',
					message: 'Invalid JSON in request body',
				},
			}),
		},
		// Cancelled or timed-out unit of work; the transaction was rolled back
		{
			canHandle: (e) => e instanceof UnitOfWorkAbortedError,
			toResponse: (e) => ({
				status: 503,
				body: {
					code: 'UNIT_OF_WORK_ABORTED',
					message: 'The request was abandoned before it completed; no changes were saved',
					details: { reason: e instanceof UnitOfWorkAbortedError ? e.reason : 'aborted' },
				},
			}),
		},
	];
}

export function createStandardErrorHandlerOptions(): ErrorHandlerConfig {
	return {
		mappers: createCommonErrorMappers(),
	};
}
