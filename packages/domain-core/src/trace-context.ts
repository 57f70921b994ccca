/**
 * Trace Context
 *
 * Request-scoped holder of the trace identifier that correlates log lines
 * with the audit record a request produces. One instance is created per
 * inbound request and handed explicitly to everything that needs it
 * (request logger, unit of work, audit recorder). There is no ambient
 * storage, so concurrent requests never see each other's ids.
 */

import { generate, isValid } from '@gatehouse/sortable-id';

declare const traceIdBrand: unique symbol;

/**
 * 26-character, time-sortable Crockford Base32 identifier.
 */
export type TraceId = string & { readonly [traceIdBrand]: true };

/**
 * Rendered in place of a trace id wherever none is bound.
 */
export const TRACE_SENTINEL = '-';

export const TRACE_ID_HEADER = 'x-trace-id';

export class TraceContextError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'TraceContextError';
	}
}

export class TraceContext {
	private traceId: TraceId | null;

	private constructor(traceId: TraceId | null) {
		this.traceId = traceId;
	}

	static generate(): TraceId {
		const id = generate();
		if (!TraceContext.isTraceId(id)) {
			throw new TraceContextError(`Generated malformed trace id: ${id}`);
		}
		return id;
	}

	static isTraceId(value: string): value is TraceId {
		return isValid(value);
	}

	/**
	 * Narrow a string (such as a Fastify request id) to a TraceId.
	 * Lowercase input is normalised so ordering stays lexical.
	 */
	static parse(value: string | null | undefined): TraceId | null {
		if (typeof value !== 'string') return null;
		const normalised = value.trim().toUpperCase();
		return TraceContext.isTraceId(normalised) ? normalised : null;
	}

	static unbound(): TraceContext {
		return new TraceContext(null);
	}

	static bound(traceId: TraceId): TraceContext {
		return new TraceContext(traceId);
	}

	/**
	 * Bound context carrying a freshly generated id.
	 */
	static fresh(): TraceContext {
		return new TraceContext(TraceContext.generate());
	}

	current(): TraceId | null {
		return this.traceId;
	}

	/**
	 * Bind an id for the rest of this context's lifetime.
	 * Binding the same id twice is a no-op; a different id throws.
	 */
	bind(traceId: TraceId): void {
		if (this.traceId !== null && this.traceId !== traceId) {
			throw new TraceContextError(`Trace context already bound to ${this.traceId}`);
		}
		this.traceId = traceId;
	}

	idOrSentinel(): string {
		return this.traceId ?? TRACE_SENTINEL;
	}
}
