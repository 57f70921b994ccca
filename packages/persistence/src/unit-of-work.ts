/**
 * Unit of Work Manager
 *
 * Scopes one database transaction to one request. Every unit of work walks
 * the same lifecycle:
 *
 *   created → active → committed | rolled_back → released
 *
 * - created: transaction begun; with pre-ping a `select 1` runs first so a
 *   stale pooled connection fails before any business code
 * - active: the caller's work runs against `uow.tx`
 * - committed: the work resolved and COMMIT succeeded
 * - rolled_back: the work rejected, asked for rollback, was aborted or ran
 *   past its deadline, or COMMIT failed
 * - released: always reached; the transaction handle is gone
 *
 * Nothing is retried. A failure is logged once with the trace id and
 * re-thrown to the caller.
 */

import { generate } from '@gatehouse/sortable-id';
import type { TraceContext } from '@gatehouse/domain-core';
import { bindTraceLogger, type Logger } from '@gatehouse/logging';
import { UnitOfWorkAbortedError, UnitOfWorkStateError } from './errors.js';
import type { TransactionContext, TransactionManager } from './transaction.js';

export const UnitOfWorkState = {
	CREATED: 'created',
	ACTIVE: 'active',
	COMMITTED: 'committed',
	ROLLED_BACK: 'rolled_back',
	RELEASED: 'released',
} as const;

export type UnitOfWorkState = (typeof UnitOfWorkState)[keyof typeof UnitOfWorkState];

const TRANSITIONS: Record<UnitOfWorkState, readonly UnitOfWorkState[]> = {
	created: ['active', 'rolled_back'],
	active: ['committed', 'rolled_back'],
	committed: ['released'],
	rolled_back: ['released'],
	released: [],
};

export interface UnitOfWorkTransition {
	readonly unitOfWorkId: string;
	readonly traceId: string;
	readonly from: UnitOfWorkState;
	readonly to: UnitOfWorkState;
}

export interface UnitOfWork {
	readonly id: string;
	readonly traceContext: TraceContext;
	/** Transaction handle; throws once the unit of work is released */
	readonly tx: TransactionContext;
	/** Fires when the caller aborts or the deadline passes */
	readonly signal: AbortSignal;
	/** Request logger carrying traceId and unitOfWorkId */
	readonly logger: Logger;
	readonly state: UnitOfWorkState;
	readonly rollbackOnly: boolean;

	/**
	 * @throws UnitOfWorkStateError unless active
	 * @throws UnitOfWorkAbortedError once the signal has fired
	 */
	assertActive(): void;

	/**
	 * Roll back instead of committing when the work returns. The work's
	 * return value is still handed back to the caller.
	 */
	setRollbackOnly(): void;
}

export interface AcquireOptions {
	readonly traceContext: TraceContext;
	readonly signal?: AbortSignal | undefined;
	/** Overrides the manager's default deadline */
	readonly timeoutMs?: number | undefined;
}

export interface UnitOfWorkManager {
	acquire<T>(work: (uow: UnitOfWork) => Promise<T>, options: AcquireOptions): Promise<T>;
}

export interface UnitOfWorkManagerConfig {
	readonly transactionManager: TransactionManager;
	readonly logger: Logger;
	/** Ping the connection before handing it out (default: true) */
	readonly prePing?: boolean;
	readonly defaultTimeoutMs?: number;
	readonly onTransition?: (transition: UnitOfWorkTransition) => void;
}

class RollbackRequested extends Error {
	constructor() {
		super('Rollback requested by unit of work');
		this.name = 'RollbackRequested';
	}
}

class ManagedUnitOfWork implements UnitOfWork {
	private current: UnitOfWorkState = UnitOfWorkState.CREATED;
	private transaction: TransactionContext | null = null;
	private rollbackRequested = false;

	constructor(
		readonly id: string,
		readonly traceContext: TraceContext,
		readonly signal: AbortSignal,
		readonly logger: Logger,
		private readonly observer: ((transition: UnitOfWorkTransition) => void) | undefined,
	) {}

	get state(): UnitOfWorkState {
		return this.current;
	}

	get rollbackOnly(): boolean {
		return this.rollbackRequested;
	}

	get tx(): TransactionContext {
		if (this.transaction === null) {
			throw new UnitOfWorkStateError(`Unit of work ${this.id} has no open transaction (${this.current})`);
		}
		return this.transaction;
	}

	assertActive(): void {
		if (this.current !== UnitOfWorkState.ACTIVE) {
			throw new UnitOfWorkStateError(`Unit of work ${this.id} is ${this.current}, not active`);
		}
		if (this.signal.aborted) {
			throw this.abortError();
		}
	}

	setRollbackOnly(): void {
		this.assertActive();
		this.rollbackRequested = true;
	}

	abortError(): UnitOfWorkAbortedError {
		const reason: unknown = this.signal.reason;
		return reason instanceof UnitOfWorkAbortedError ? reason : new UnitOfWorkAbortedError('aborted', this.id);
	}

	open(tx: TransactionContext): void {
		this.transaction = tx;
		this.transition(UnitOfWorkState.ACTIVE);
	}

	release(): void {
		this.transaction = null;
		this.transition(UnitOfWorkState.RELEASED);
	}

	isOpen(): boolean {
		return this.current === UnitOfWorkState.CREATED || this.current === UnitOfWorkState.ACTIVE;
	}

	transition(to: UnitOfWorkState): void {
		const from = this.current;
		if (!TRANSITIONS[from].includes(to)) {
			throw new UnitOfWorkStateError(`Illegal unit of work transition ${from} -> ${to}`);
		}
		this.current = to;
		this.logger.debug({ from, to }, 'unit of work transition');

		if (this.observer) {
			try {
				this.observer({ unitOfWorkId: this.id, traceId: this.traceContext.idOrSentinel(), from, to });
			} catch (error) {
				this.logger.warn({ err: error }, 'unit of work transition observer failed');
			}
		}
	}
}

/**
 * Settle with `work`, or reject as soon as the unit of work is aborted.
 */
function untilAborted<T>(work: Promise<T>, uow: ManagedUnitOfWork): Promise<T> {
	return new Promise<T>((resolve, reject) => {
		const onAbort = () => reject(uow.abortError());
		if (uow.signal.aborted) {
			onAbort();
		} else {
			uow.signal.addEventListener('abort', onAbort, { once: true });
		}
		work.then(
			(value) => {
				uow.signal.removeEventListener('abort', onAbort);
				resolve(value);
			},
			(error: unknown) => {
				uow.signal.removeEventListener('abort', onAbort);
				reject(error);
			},
		);
	});
}

/**
 * @example
 * ```typescript
 * const unitOfWorkManager = createUnitOfWorkManager({ transactionManager, logger });
 *
 * await unitOfWorkManager.acquire(
 *     async (uow) => {
 *         await principalRepository.update(principal, uow.tx);
 *         await auditRecorder.record(uow, entry);
 *     },
 *     { traceContext: request.traceContext, signal },
 * );
 * ```
 */
export function createUnitOfWorkManager(config: UnitOfWorkManagerConfig): UnitOfWorkManager {
	const { transactionManager, prePing = true, defaultTimeoutMs, onTransition } = config;

	return {
		async acquire<T>(work: (uow: UnitOfWork) => Promise<T>, options: AcquireOptions): Promise<T> {
			const id = generate();
			const logger = bindTraceLogger(config.logger, options.traceContext).child({ unitOfWorkId: id });
			const controller = new AbortController();
			const uow = new ManagedUnitOfWork(id, options.traceContext, controller.signal, logger, onTransition);

			const callerSignal = options.signal;
			const onCallerAbort = () => controller.abort(new UnitOfWorkAbortedError('aborted', id));
			if (callerSignal?.aborted) {
				onCallerAbort();
			} else {
				callerSignal?.addEventListener('abort', onCallerAbort, { once: true });
			}

			const timeoutMs = options.timeoutMs ?? defaultTimeoutMs;
			const timer =
				timeoutMs === undefined
					? undefined
					: setTimeout(() => controller.abort(new UnitOfWorkAbortedError('timeout', id)), timeoutMs);

			// set inside the transaction callback when the work asked for rollback
			const outcome: { rolledBackValue?: { value: T } } = {};

			try {
				if (controller.signal.aborted) {
					throw uow.abortError();
				}

				const value = await transactionManager.inTransaction(async (tx) => {
					// acquiring the connection may outlast the deadline
					if (controller.signal.aborted) {
						throw uow.abortError();
					}
					if (prePing) {
						await transactionManager.ping(tx);
						if (controller.signal.aborted) {
							throw uow.abortError();
						}
					}
					uow.open(tx);

					const result = await untilAborted(work(uow), uow);

					// last chance to honour an abort that landed after the work settled
					if (controller.signal.aborted) {
						throw uow.abortError();
					}
					if (uow.rollbackOnly) {
						outcome.rolledBackValue = { value: result };
						throw new RollbackRequested();
					}
					return result;
				});

				uow.transition(UnitOfWorkState.COMMITTED);
				return value;
			} catch (error) {
				if (uow.isOpen()) {
					uow.transition(UnitOfWorkState.ROLLED_BACK);
				}

				if (error instanceof RollbackRequested && outcome.rolledBackValue) {
					logger.debug('unit of work rolled back on request');
					return outcome.rolledBackValue.value;
				}

				if (error instanceof UnitOfWorkAbortedError) {
					logger.warn({ reason: error.reason }, 'unit of work aborted, transaction rolled back');
				} else {
					logger.error({ err: error }, 'unit of work failed, transaction rolled back');
				}
				throw error;
			} finally {
				if (timer !== undefined) {
					clearTimeout(timer);
				}
				callerSignal?.removeEventListener('abort', onCallerAbort);
				uow.release();
			}
		},
	};
}
