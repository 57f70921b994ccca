import { describe, it, expect, vi } from 'vitest';
import { createLogger } from '@gatehouse/logging';
import { poolOptions } from '../connection.js';

describe('poolOptions', () => {
	it('should size the pool as base plus overflow with recycling', () => {
		expect(poolOptions({ url: 'postgres://localhost/gatehouse' })).toEqual({
			max: 60,
			idle_timeout: 20,
			max_lifetime: 3600,
			connect_timeout: 30,
		});
	});

	it('should honour explicit settings', () => {
		const options = poolOptions({
			url: 'postgres://localhost/gatehouse',
			poolSize: 5,
			maxOverflow: 0,
			idleTimeout: 10,
			maxLifetime: 600,
			connectTimeout: 3,
		});

		expect(options).toMatchObject({ max: 5, idle_timeout: 10, max_lifetime: 600, connect_timeout: 3 });
	});

	it('should reject an empty pool', () => {
		expect(() => poolOptions({ url: 'postgres://localhost/gatehouse', poolSize: 0 })).toThrow(
			'Invalid pool bounds: poolSize=0, maxOverflow=40',
		);
	});

	it('should route statement logging through the logger when debugging', () => {
		const logger = createLogger({ level: 'debug', serviceName: 'connection-test' });
		const debug = vi.spyOn(logger, 'debug').mockImplementation(() => undefined);

		const options = poolOptions({ url: 'postgres://localhost/gatehouse', debug: true, logger });
		if (typeof options.debug !== 'function') throw new Error('expected a debug hook');
		options.debug(1, 'select 1', [], []);

		expect(debug).toHaveBeenCalledWith({ query: 'select 1', params: [] }, 'sql');
	});
});
