/**
 * HTTP Layer Types
 *
 * Fastify request decorations and shared response shapes.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { Actor, TraceContext } from '@gatehouse/domain-core';

export interface TracingPluginOptions {
	/** Header carrying the trace id in and out (default: x-trace-id) */
	readonly header?: string;
	/** Echo the trace id on every response (default: true) */
	readonly propagateToResponse?: boolean;
}

export interface ActorPluginOptions {
	/** Header set by the upstream authenticator with the admin's id (default: x-admin-id) */
	readonly idHeader?: string;
	/** Header with the admin's display name (default: x-admin-name) */
	readonly nameHeader?: string;
}

/**
 * Standard error response format.
 */
export interface ErrorResponse {
	/** Human-readable error message */
	readonly message: string;
	/** Machine-readable error code */
	readonly code: string;
	readonly details?: Record<string, unknown>;
}

declare module 'fastify' {
	interface FastifyRequest {
		/** Trace context bound to this request's trace id */
		traceContext: TraceContext;
		/** Who issued the request, as reported by the upstream authenticator */
		actor: Actor;
	}
}

export type { FastifyRequest, FastifyReply };
