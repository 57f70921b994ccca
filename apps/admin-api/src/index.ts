/**
 * Gatehouse Admin API
 *
 * Service entry point: environment, database pool, unit of work manager,
 * and the HTTP server with graceful shutdown.
 */

import { PasswordHasher } from '@gatehouse/credentials';
import { createLogger } from '@gatehouse/logging';
import {
	createDatabase,
	createTransactionManager,
	createUnitOfWorkManager,
	createAuditLogRepository,
	createAuditRecorder,
	applySqlFile,
	AUDIT_LOG_SQL,
} from '@gatehouse/persistence';

import { getEnv } from './env.js';
import { buildAdminApi, SERVICE_NAME } from './app.js';
import { createPrincipalRepository, PRINCIPALS_SQL } from './infrastructure/persistence/index.js';

export { buildAdminApi, type AdminApiDeps } from './app.js';

export async function startAdminApi() {
	const env = getEnv();

	const loggerConfig = {
		level: env.LOG_LEVEL,
		serviceName: SERVICE_NAME,
		pretty: env.LOG_PRETTY,
	};
	const logger = createLogger(loggerConfig);

	const database = createDatabase({
		url: env.DATABASE_URL,
		poolSize: env.DB_POOL_SIZE,
		maxOverflow: env.DB_MAX_OVERFLOW,
		idleTimeout: env.DB_IDLE_TIMEOUT_SECONDS,
		maxLifetime: env.DB_MAX_LIFETIME_SECONDS,
		connectTimeout: env.DB_CONNECT_TIMEOUT_SECONDS,
		logger,
	});
	logger.info({ maxConnections: database.maxConnections }, 'Database pool configured');

	if (env.AUTO_APPLY_SCHEMA) {
		await applySqlFile(database.client, AUDIT_LOG_SQL);
		await applySqlFile(database.client, PRINCIPALS_SQL);
		logger.info('Schema applied');
	}

	const transactionManager = createTransactionManager(database.db);
	const auditLogRepository = createAuditLogRepository(database.db);

	const server = await buildAdminApi({
		principalRepository: createPrincipalRepository(database.db),
		auditLogRepository,
		unitOfWorkManager: createUnitOfWorkManager({
			transactionManager,
			logger,
			prePing: env.DB_PRE_PING,
			defaultTimeoutMs: env.UNIT_OF_WORK_TIMEOUT_MS,
		}),
		auditRecorder: createAuditRecorder(auditLogRepository),
		passwordHasher: new PasswordHasher(),
		logger,
		pingDatabase: () => database.ping(),
		logging: loggerConfig,
	});

	await server.listen({ port: env.PORT, host: env.HOST });

	let shuttingDown = false;
	const shutdown = async (signal: string) => {
		if (shuttingDown) return;
		shuttingDown = true;

		logger.info({ signal }, 'Shutdown signal received');

		// 1. Stop accepting requests and let in-flight units of work finish
		await server.close();
		// 2. Drain the pool
		await database.close();

		logger.info('Graceful shutdown complete');
	};

	const onSignal = (signal: string) => {
		shutdown(signal).catch((error: unknown) => {
			logger.error({ err: error }, 'Shutdown failed');
			process.exitCode = 1;
		});
	};

	process.once('SIGINT', onSignal);
	process.once('SIGTERM', onSignal);

	return { server, database, shutdown };
}

// Run when executed as main module
const isMainModule =
	typeof process !== 'undefined' &&
	process.argv[1] !== undefined &&
	(process.argv[1].endsWith('/index.ts') || process.argv[1].endsWith('/index.js'));

if (isMainModule) {
	startAdminApi().catch((error: unknown) => {
		console.error('Failed to start admin API:', error);
		process.exit(1);
	});
}
