/**
 * Admin API application
 *
 * Builds the Fastify instance from already-constructed infrastructure, so the
 * server entry point and the tests share one wiring.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import { PasswordHistoryGuard, type PasswordHasher } from '@gatehouse/credentials';
import type { Logger } from '@gatehouse/logging';
import type { AuditLogRepository, AuditRecorder, UnitOfWorkManager } from '@gatehouse/persistence';
import {
	tracingPlugin,
	actorPlugin,
	errorHandlerPlugin,
	createStandardErrorHandlerOptions,
	createFastifyLoggingOptions,
	createAuditedMutation,
	type FastifyLoggingConfig,
} from '@gatehouse/http';

import type { PrincipalRepository } from './infrastructure/persistence/index.js';
import { createCreatePrincipalUseCase, createChangePasswordUseCase } from './application/index.js';
import { registerAdminRoutes, registerHealthRoutes } from './api/index.js';

export const SERVICE_NAME = 'admin-api';

export interface AdminApiDeps {
	readonly principalRepository: PrincipalRepository;
	readonly auditLogRepository: AuditLogRepository;
	readonly unitOfWorkManager: UnitOfWorkManager;
	readonly auditRecorder: AuditRecorder;
	readonly passwordHasher: PasswordHasher;
	/** Application logger for work outside the request lifecycle */
	readonly logger: Logger;
	readonly pingDatabase: () => Promise<void>;
	/** Fastify request logging; false disables it */
	readonly logging: FastifyLoggingConfig | false;
	readonly clock?: () => Date;
}

export async function buildAdminApi(deps: AdminApiDeps): Promise<FastifyInstance> {
	const { passwordHasher, principalRepository, logger, clock = () => new Date() } = deps;

	const fastify = Fastify({
		...createFastifyLoggingOptions(deps.logging),
	});

	await fastify.register(tracingPlugin);
	await fastify.register(actorPlugin);
	await fastify.register(errorHandlerPlugin, createStandardErrorHandlerOptions());

	const historyGuard = new PasswordHistoryGuard(passwordHasher);

	await registerHealthRoutes(fastify, {
		serviceName: SERVICE_NAME,
		pingDatabase: deps.pingDatabase,
	});

	await registerAdminRoutes(fastify, {
		principalRepository,
		auditLogRepository: deps.auditLogRepository,
		createPrincipalUseCase: createCreatePrincipalUseCase({ principalRepository, passwordHasher, logger, clock }),
		changePasswordUseCase: createChangePasswordUseCase({
			principalRepository,
			passwordHasher,
			historyGuard,
			logger,
			clock,
		}),
		auditedMutation: createAuditedMutation({
			unitOfWorkManager: deps.unitOfWorkManager,
			auditRecorder: deps.auditRecorder,
		}),
		clock,
	});

	return fastify;
}
