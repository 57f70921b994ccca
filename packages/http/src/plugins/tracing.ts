/**
 * Tracing Plugin
 *
 * Binds a TraceContext to every request. The trace id is always minted
 * here: it is the Fastify request id when the server was built with
 * `createTraceIdGenerator` as its `genReqId`, so request logs already carry
 * it under `traceId`. An inbound trace header never becomes the trace id;
 * a well-formed one is only logged as `upstreamTraceId`.
 */

import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { TraceContext, TRACE_ID_HEADER } from '@gatehouse/domain-core';
import { TRACE_ID_LOG_KEY } from '@gatehouse/logging';
import type { TracingPluginOptions } from '../types.js';

export const UPSTREAM_TRACE_ID_LOG_KEY = 'upstreamTraceId';

function firstHeader(value: string | string[] | undefined): string | undefined {
	return Array.isArray(value) ? value[0] : value;
}

/**
 * Build a Fastify `genReqId` that makes the request id a fresh trace id.
 *
 * @example
 * ```typescript
 * const fastify = Fastify({
 *     genReqId: createTraceIdGenerator(),
 *     requestIdLogLabel: 'traceId',
 * });
 * ```
 */
export function createTraceIdGenerator(): () => string {
	return () => TraceContext.generate();
}

const tracingPluginAsync: FastifyPluginAsync<TracingPluginOptions> = async (fastify, opts) => {
	const header = (opts.header ?? TRACE_ID_HEADER).toLowerCase();
	const { propagateToResponse = true } = opts;

	fastify.decorateRequest('traceContext', null, []);

	fastify.addHook('onRequest', async (request, reply) => {
		let traceId = TraceContext.parse(request.id);
		if (traceId === null) {
			traceId = TraceContext.generate();
			request.log = request.log.child({ [TRACE_ID_LOG_KEY]: traceId });
		}

		const upstream = TraceContext.parse(firstHeader(request.headers[header]));
		if (upstream !== null) {
			request.log = request.log.child({ [UPSTREAM_TRACE_ID_LOG_KEY]: upstream });
		}

		request.traceContext = TraceContext.bound(traceId);

		if (propagateToResponse) {
			reply.header(header, traceId);
		}
	});
};

export const tracingPlugin = fp(tracingPluginAsync, {
	name: '@gatehouse/tracing',
	fastify: '5.x',
});
