/**
 * Health API
 *
 * Liveness plus a database round-trip. Never audited.
 */

import type { FastifyInstance } from 'fastify';
import { jsonSuccess } from '@gatehouse/http';

export interface HealthRoutesDeps {
	readonly serviceName: string;
	/** Rejects when the database is unreachable */
	readonly pingDatabase: () => Promise<void>;
}

export async function registerHealthRoutes(fastify: FastifyInstance, deps: HealthRoutesDeps): Promise<void> {
	const { serviceName, pingDatabase } = deps;

	fastify.get('/health', async (request, reply) => {
		try {
			await pingDatabase();
			return jsonSuccess(reply, { status: 'ok', service: serviceName, database: 'up' });
		} catch (error) {
			request.log.warn({ err: error }, 'database health check failed');
			return jsonSuccess(reply, { status: 'degraded', service: serviceName, database: 'down' }, 503);
		}
	});
}
