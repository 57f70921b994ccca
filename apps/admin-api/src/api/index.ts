/**
 * API Layer
 *
 * REST endpoints for the admin API.
 */

import type { FastifyInstance } from 'fastify';

import { registerPrincipalsRoutes, type PrincipalsRoutesDeps } from './admin/principals.js';
import { registerPasswordPolicyRoutes } from './admin/password-policy.js';
import { registerAuditLogsRoutes, type AuditLogsRoutesDeps } from './admin/audit-logs.js';

export { registerHealthRoutes, type HealthRoutesDeps } from './health.js';

export interface AdminRoutesDeps extends PrincipalsRoutesDeps, AuditLogsRoutesDeps {}

/**
 * Register all admin API routes under /admin.
 */
export async function registerAdminRoutes(fastify: FastifyInstance, deps: AdminRoutesDeps): Promise<void> {
	await fastify.register(
		async (adminRouter) => {
			await registerPasswordPolicyRoutes(adminRouter);
			await registerPrincipalsRoutes(adminRouter, deps);
			await registerAuditLogsRoutes(adminRouter, deps);
		},
		{ prefix: '/admin' },
	);
}
