import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { actorPlugin } from '../plugins/actor.js';

describe('actorPlugin', () => {
	let fastify: FastifyInstance;

	beforeEach(async () => {
		fastify = Fastify({ logger: false });
		await fastify.register(actorPlugin);
		fastify.get('/whoami', async (request) => request.actor);
		await fastify.ready();
	});

	afterEach(async () => {
		await fastify.close();
	});

	it('should read the administrator from upstream headers', async () => {
		const res = await fastify.inject({
			method: 'GET',
			url: '/whoami',
			headers: { 'x-admin-id': 'admin-7', 'x-admin-name': 'Root Admin' },
		});

		expect(res.json()).toEqual({ id: 'admin-7', name: 'Root Admin', ipAddress: '127.0.0.1' });
	});

	it('should fall back to the id when no name is given', async () => {
		const res = await fastify.inject({ method: 'GET', url: '/whoami', headers: { 'x-admin-id': ' admin-7 ' } });

		expect(res.json()).toEqual({ id: 'admin-7', name: 'admin-7', ipAddress: '127.0.0.1' });
	});

	it('should record anonymous requests with their address', async () => {
		const res = await fastify.inject({
			method: 'GET',
			url: '/whoami',
			remoteAddress: '10.1.2.3',
			headers: { 'x-admin-id': '   ' },
		});

		expect(res.json()).toEqual({ id: 'anonymous', name: 'anonymous', ipAddress: '10.1.2.3' });
	});
});
