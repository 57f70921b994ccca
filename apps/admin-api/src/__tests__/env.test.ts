import { describe, it, expect } from 'vitest';
import { parseEnv } from '@gatehouse/config';
import { envSchema } from '../env.js';

describe('admin API environment', () => {
	it('should fall back to the pool defaults', () => {
		expect(parseEnv(envSchema, {})).toEqual({
			PORT: 3000,
			HOST: '0.0.0.0',
			DATABASE_URL: 'postgres://localhost:5432/gatehouse',
			DB_POOL_SIZE: 20,
			DB_MAX_OVERFLOW: 40,
			DB_IDLE_TIMEOUT_SECONDS: 20,
			DB_MAX_LIFETIME_SECONDS: 3600,
			DB_CONNECT_TIMEOUT_SECONDS: 30,
			DB_PRE_PING: true,
			UNIT_OF_WORK_TIMEOUT_MS: 10000,
			AUTO_APPLY_SCHEMA: false,
			LOG_LEVEL: 'info',
			LOG_PRETTY: false,
		});
	});

	it('should allow pre-ping and overflow to be turned off', () => {
		const env = parseEnv(envSchema, { DB_PRE_PING: 'false', DB_MAX_OVERFLOW: '0' });

		expect(env.DB_PRE_PING).toBe(false);
		expect(env.DB_MAX_OVERFLOW).toBe(0);
	});

	it('should refuse an empty pool', () => {
		expect(() => parseEnv(envSchema, { DB_POOL_SIZE: '0' })).toThrow(/DB_POOL_SIZE/);
	});
});
