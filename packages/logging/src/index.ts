import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export { bindTraceLogger, TRACE_ID_LOG_KEY } from './trace.js';

export const LogLevel = {
	TRACE: 'trace',
	DEBUG: 'debug',
	INFO: 'info',
	WARN: 'warn',
	ERROR: 'error',
	FATAL: 'fatal',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export interface LoggerConfig {
	level: LogLevel;
	/** Service name for structured logs */
	serviceName: string;
	/** Pretty printing via pino-pretty (dev only) */
	pretty?: boolean;
	base?: Record<string, unknown>;
	/** Write somewhere other than stdout, e.g. an in-memory stream in tests */
	destination?: DestinationStream;
}

/**
 * Shared pino options: ISO timestamps, level labels, service base field.
 * Also handed to Fastify so request logs use the same shape.
 */
export function loggerOptions(config: Omit<LoggerConfig, 'destination'>): LoggerOptions {
	const options: LoggerOptions = {
		level: config.level,
		base: {
			service: config.serviceName,
			...config.base,
		},
		timestamp: pino.stdTimeFunctions.isoTime,
		formatters: {
			level: (label) => ({ level: label }),
		},
	};

	if (config.pretty) {
		return {
			...options,
			transport: {
				target: 'pino-pretty',
				options: {
					colorize: true,
					translateTime: 'SYS:standard',
					ignore: 'pid,hostname',
					messageFormat: '{traceId} | {msg}',
				},
			},
		};
	}

	return options;
}

export function createLogger(config: LoggerConfig): Logger {
	const options = loggerOptions(config);
	if (config.destination && !config.pretty) {
		return pino(options, config.destination);
	}
	return pino(options);
}
