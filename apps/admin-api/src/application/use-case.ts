/**
 * Credential use cases run in two phases. `prepare` reads, checks policy and
 * history, and hashes, all without holding a connection; `apply` writes the
 * prepared change through the request's unit of work.
 */

import type { Result, TraceContext } from '@gatehouse/domain-core';
import type { UnitOfWork } from '@gatehouse/persistence';

export interface CredentialUseCase<TCommand, TPrepared, TResult> {
	prepare(command: TCommand, traceContext: TraceContext): Promise<Result<TPrepared>>;
	apply(prepared: TPrepared, uow: UnitOfWork): Promise<Result<TResult>>;
}
