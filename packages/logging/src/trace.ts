import type { Logger } from 'pino';
import type { TraceContext } from '@gatehouse/domain-core';

/**
 * Field every log line carries the trace id under. Fastify uses it as its
 * request id label, so request logs and these child loggers line up.
 */
export const TRACE_ID_LOG_KEY = 'traceId';

/**
 * Child logger stamped with the context's trace id, or "-" when unbound.
 */
export function bindTraceLogger(logger: Logger, trace: TraceContext): Logger {
	return logger.child({ [TRACE_ID_LOG_KEY]: trace.idOrSentinel() });
}
