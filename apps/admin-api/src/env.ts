/**
 * Environment Configuration
 *
 * Loads and validates environment variables for the admin API.
 */

import { parseEnv, CommonEnvSchemas, z } from '@gatehouse/config';

export const envSchema = z.object({
	// Server
	PORT: CommonEnvSchemas.port,
	HOST: CommonEnvSchemas.host,

	// Database
	DATABASE_URL: CommonEnvSchemas.databaseUrl.default('postgres://localhost:5432/gatehouse'),
	DB_POOL_SIZE: CommonEnvSchemas.positiveInt.prefault('20'),
	DB_MAX_OVERFLOW: CommonEnvSchemas.nonNegativeInt.prefault('40'),
	DB_IDLE_TIMEOUT_SECONDS: CommonEnvSchemas.positiveInt.prefault('20'),
	DB_MAX_LIFETIME_SECONDS: CommonEnvSchemas.positiveInt.prefault('3600'),
	DB_CONNECT_TIMEOUT_SECONDS: CommonEnvSchemas.positiveInt.prefault('30'),
	DB_PRE_PING: CommonEnvSchemas.boolean.prefault('true'),
	UNIT_OF_WORK_TIMEOUT_MS: CommonEnvSchemas.durationMs.prefault('10000'),
	AUTO_APPLY_SCHEMA: CommonEnvSchemas.boolean,

	// Logging
	LOG_LEVEL: CommonEnvSchemas.logLevel,
	LOG_PRETTY: CommonEnvSchemas.boolean,
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

export function getEnv(): Env {
	if (!cachedEnv) {
		cachedEnv = parseEnv(envSchema);
	}
	return cachedEnv;
}
