import { describe, it, expect } from 'vitest';
import { parseEnv, CommonEnvSchemas, z } from '../index.js';

const schema = z.object({
	PORT: CommonEnvSchemas.port,
	LOG_LEVEL: CommonEnvSchemas.logLevel,
	DB_PRE_PING: CommonEnvSchemas.boolean,
	DB_POOL_SIZE: CommonEnvSchemas.positiveInt.prefault('20'),
	DATABASE_URL: CommonEnvSchemas.databaseUrl,
});

describe('parseEnv', () => {
	it('should apply defaults for missing variables', () => {
		expect(parseEnv(schema, { DATABASE_URL: 'postgres://localhost/gatehouse' })).toEqual({
			PORT: 3000,
			LOG_LEVEL: 'info',
			DB_PRE_PING: false,
			DB_POOL_SIZE: 20,
			DATABASE_URL: 'postgres://localhost/gatehouse',
		});
	});

	it('should coerce strings', () => {
		const env = parseEnv(schema, {
			DATABASE_URL: 'postgresql://db:5432/gatehouse',
			PORT: '8080',
			DB_PRE_PING: '1',
			DB_POOL_SIZE: '5',
		});

		expect(env.PORT).toBe(8080);
		expect(env.DB_PRE_PING).toBe(true);
		expect(env.DB_POOL_SIZE).toBe(5);
	});

	it('should name each invalid variable', () => {
		expect(() => parseEnv(schema, { DATABASE_URL: 'mysql://db', PORT: '70000' })).toThrow(
			/Environment validation failed:\n {2}PORT: .+\n {2}DATABASE_URL: must be a postgres:\/\/ connection string/,
		);
	});

	it('should reject a non-positive pool size', () => {
		expect(() =>
			parseEnv(schema, { DATABASE_URL: 'postgres://localhost/gatehouse', DB_POOL_SIZE: '0' }),
		).toThrow(/DB_POOL_SIZE/);
	});
});
