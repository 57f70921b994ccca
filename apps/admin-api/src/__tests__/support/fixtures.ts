import { PasswordHasher } from '@gatehouse/credentials';
import { Result, TraceContext } from '@gatehouse/domain-core';
import { createLogger } from '@gatehouse/logging';
import type { UnitOfWorkManager } from '@gatehouse/persistence';
import type { CredentialUseCase } from '../../application/index.js';

// low work factor keeps the suite fast; production uses the defaults
export const testHasher = new PasswordHasher({ memoryCost: 4096, timeCost: 2, parallelism: 1 });

export const quietLogger = createLogger({ level: 'fatal', serviceName: 'admin-api-test' });

export const fixedClock = (iso: string) => () => new Date(iso);

/**
 * Prepare outside the unit of work, then apply inside it, the way the
 * routes run a credential use case.
 */
export async function execute<TCommand, TPrepared, TResult>(
	useCase: CredentialUseCase<TCommand, TPrepared, TResult>,
	command: TCommand,
	unitOfWorkManager: UnitOfWorkManager,
): Promise<Result<TResult>> {
	const traceContext = TraceContext.fresh();
	const prepared = await useCase.prepare(command, traceContext);
	if (Result.isFailure(prepared)) {
		return Result.failure(prepared.error);
	}
	return unitOfWorkManager.acquire(
		async (uow) => {
			const result = await useCase.apply(prepared.value, uow);
			if (Result.isFailure(result)) {
				uow.setRollbackOnly();
			}
			return result;
		},
		{ traceContext },
	);
}
