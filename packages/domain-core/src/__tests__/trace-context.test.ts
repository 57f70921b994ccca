import { describe, it, expect } from 'vitest';
import { TraceContext, TraceContextError, TRACE_SENTINEL } from '../trace-context.js';
import { Actor } from '../actor.js';

describe('TraceContext', () => {
	describe('generate', () => {
		it('should produce 26-character Crockford Base32 ids', () => {
			const id = TraceContext.generate();
			expect(id).toHaveLength(26);
			expect(id).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
		});

		it('should produce unique ids', () => {
			const ids = new Set(Array.from({ length: 500 }, () => TraceContext.generate()));
			expect(ids.size).toBe(500);
		});

		it('should produce lexically non-decreasing ids', () => {
			const ids = Array.from({ length: 200 }, () => TraceContext.generate());
			expect(ids).toEqual([...ids].sort());
		});
	});

	describe('unbound context', () => {
		it('should report no current id', () => {
			expect(TraceContext.unbound().current()).toBeNull();
		});

		it('should render the sentinel', () => {
			expect(TraceContext.unbound().idOrSentinel()).toBe(TRACE_SENTINEL);
			expect(TRACE_SENTINEL).toBe('-');
		});
	});

	describe('bind', () => {
		it('should make the id current', () => {
			const ctx = TraceContext.unbound();
			const id = TraceContext.generate();

			ctx.bind(id);

			expect(ctx.current()).toBe(id);
			expect(ctx.idOrSentinel()).toBe(id);
		});

		it('should allow re-binding the same id', () => {
			const id = TraceContext.generate();
			const ctx = TraceContext.bound(id);

			expect(() => ctx.bind(id)).not.toThrow();
		});

		it('should refuse to re-bind a different id', () => {
			const ctx = TraceContext.fresh();
			expect(() => ctx.bind(TraceContext.generate())).toThrow(TraceContextError);
		});

		it('should keep concurrent contexts isolated', async () => {
			const contexts = Array.from({ length: 20 }, () => TraceContext.fresh());

			const seen = await Promise.all(
				contexts.map(async (ctx, i) => {
					await new Promise((resolve) => setTimeout(resolve, (i * 7) % 5));
					return ctx.current();
				}),
			);

			expect(seen).toEqual(contexts.map((ctx) => ctx.current()));
			expect(new Set(seen).size).toBe(20);
		});
	});

	describe('parse', () => {
		it('should accept a well-formed id and upper-case it', () => {
			expect(TraceContext.parse('01hq3v5k8m0000000000000000')).toBe('01HQ3V5K8M0000000000000000');
		});

		it('should reject malformed ids', () => {
			expect(TraceContext.parse('not-a-trace-id')).toBeNull();
			expect(TraceContext.parse('')).toBeNull();
			expect(TraceContext.parse(undefined)).toBeNull();
		});
	});
});

describe('Actor', () => {
	it('should build a named actor', () => {
		expect(Actor.of('42', 'alice', '10.0.0.1')).toEqual({ id: '42', name: 'alice', ipAddress: '10.0.0.1' });
	});

	it('should recognise the anonymous actor', () => {
		expect(Actor.isAnonymous(Actor.anonymous())).toBe(true);
		expect(Actor.isAnonymous(Actor.of('1', 'root'))).toBe(false);
	});
});
