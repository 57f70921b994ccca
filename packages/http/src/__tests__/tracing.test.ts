import { describe, it, expect, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { TraceContext } from '@gatehouse/domain-core';
import { tracingPlugin, createTraceIdGenerator } from '../plugins/tracing.js';
import { createFastifyLoggingOptions } from '../logging.js';

const INBOUND = '01HQ3V5K8M0000000000000000';

interface LogEntry {
	msg?: string;
	traceId?: string;
	upstreamTraceId?: string;
}

describe('tracingPlugin', () => {
	let fastify: FastifyInstance;

	afterEach(async () => {
		await fastify.close();
	});

	async function build(options: { withGenerator: boolean }): Promise<FastifyInstance> {
		const app = options.withGenerator ? Fastify(createFastifyLoggingOptions(false)) : Fastify({ logger: false });
		await app.register(tracingPlugin);
		app.get('/trace', async (request) => ({
			requestId: request.id,
			traceId: request.traceContext.current(),
		}));
		await app.ready();
		return app;
	}

	it('should generate a trace id and echo it in the response header', async () => {
		fastify = await build({ withGenerator: true });

		const res = await fastify.inject({ method: 'GET', url: '/trace' });
		const body = res.json<{ requestId: string; traceId: string }>();

		expect(body.traceId).toHaveLength(26);
		expect(TraceContext.isTraceId(body.traceId)).toBe(true);
		expect(res.headers['x-trace-id']).toBe(body.traceId);
		expect(body.requestId).toBe(body.traceId);
	});

	it('should not adopt a well-formed inbound trace id', async () => {
		fastify = await build({ withGenerator: true });

		const res = await fastify.inject({ method: 'GET', url: '/trace', headers: { 'x-trace-id': INBOUND } });
		const traceId = res.json<{ traceId: string }>().traceId;

		expect(traceId).not.toBe(INBOUND);
		expect(TraceContext.isTraceId(traceId)).toBe(true);
		expect(res.headers['x-trace-id']).toBe(traceId);
	});

	it('should mint distinct trace ids for requests sharing an inbound header', async () => {
		fastify = await build({ withGenerator: true });

		const headers = { 'x-trace-id': '00000000000000000000000000' };
		const first = await fastify.inject({ method: 'GET', url: '/trace', headers });
		const second = await fastify.inject({ method: 'GET', url: '/trace', headers });

		expect(first.headers['x-trace-id']).not.toBe(second.headers['x-trace-id']);
	});

	it('should replace a malformed inbound trace id', async () => {
		fastify = await build({ withGenerator: true });

		const res = await fastify.inject({ method: 'GET', url: '/trace', headers: { 'x-trace-id': 'not-a-trace' } });
		const traceId = res.json<{ traceId: string }>().traceId;

		expect(traceId).not.toBe('not-a-trace');
		expect(TraceContext.isTraceId(traceId)).toBe(true);
	});

	it('should ignore a request-id header', async () => {
		fastify = await build({ withGenerator: true });

		const res = await fastify.inject({ method: 'GET', url: '/trace', headers: { 'request-id': INBOUND } });
		const body = res.json<{ requestId: string; traceId: string }>();

		expect(body.requestId).not.toBe(INBOUND);
		expect(body.traceId).toBe(body.requestId);
	});

	it('should still bind a fresh trace id without the generator', async () => {
		fastify = await build({ withGenerator: false });

		const res = await fastify.inject({ method: 'GET', url: '/trace', headers: { 'x-trace-id': INBOUND } });
		const body = res.json<{ requestId: string; traceId: string }>();

		expect(body.traceId).not.toBe(INBOUND);
		expect(TraceContext.isTraceId(body.traceId)).toBe(true);
		expect(body.requestId).not.toBe(body.traceId);
		expect(res.headers['x-trace-id']).toBe(body.traceId);
	});

	it('should give concurrent requests distinct trace ids', async () => {
		fastify = await build({ withGenerator: true });

		const responses = await Promise.all(
			Array.from({ length: 20 }, () => fastify.inject({ method: 'GET', url: '/trace' })),
		);
		const ids = responses.map((res) => res.headers['x-trace-id']);

		expect(new Set(ids).size).toBe(20);
	});

	it('should log a well-formed upstream id beside the minted trace id', async () => {
		const lines: string[] = [];
		fastify = Fastify({
			logger: { level: 'info', stream: { write: (line: string) => lines.push(line) } },
			genReqId: createTraceIdGenerator(),
			requestIdHeader: false,
			requestIdLogLabel: 'traceId',
		});
		await fastify.register(tracingPlugin);
		fastify.get('/trace', async (request) => {
			request.log.info('handled');
			return { ok: true };
		});
		await fastify.ready();

		const res = await fastify.inject({
			method: 'GET',
			url: '/trace',
			headers: { 'x-trace-id': INBOUND.toLowerCase() },
		});

		const handled = lines
			.map((line): LogEntry => JSON.parse(line))
			.find((entry) => entry.msg === 'handled');

		expect(handled?.upstreamTraceId).toBe(INBOUND);
		expect(handled?.traceId).toBe(res.headers['x-trace-id']);
		expect(handled?.traceId).not.toBe(INBOUND);
	});
});
