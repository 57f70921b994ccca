/**
 * Fastify server logging
 *
 * Fastify uses pino natively; request logs share the shape of
 * `@gatehouse/logging` and carry the trace id as `traceId`.
 */

import type { FastifyServerOptions } from 'fastify';
import { loggerOptions, TRACE_ID_LOG_KEY, type LoggerConfig } from '@gatehouse/logging';
import { createTraceIdGenerator } from './plugins/tracing.js';

export type FastifyLoggingConfig = Omit<LoggerConfig, 'destination'>;

/**
 * @example
 * ```typescript
 * const fastify = Fastify({
 *     ...createFastifyLoggingOptions({ level: 'info', serviceName: 'admin-api' }),
 * });
 * ```
 */
export function createFastifyLoggingOptions(
	config: FastifyLoggingConfig | false,
): Pick<FastifyServerOptions, 'logger' | 'genReqId' | 'requestIdHeader' | 'requestIdLogLabel'> {
	return {
		logger: config === false ? false : loggerOptions(config),
		genReqId: createTraceIdGenerator(),
		requestIdHeader: false,
		requestIdLogLabel: TRACE_ID_LOG_KEY,
	};
}
