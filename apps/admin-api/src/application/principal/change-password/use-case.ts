/**
 * Change Password Use Case
 *
 * Replaces an administrator's credential. The candidate must pass the
 * policy and differ from the current password and the retained history.
 * The outgoing hash is retired into history, which keeps the last 3.
 *
 * The write only lands if the stored hash is still the one read during
 * `prepare`; a competing change in between fails with
 * CREDENTIAL_CHANGED_CONCURRENTLY.
 */

import { Result, UseCaseError, type TraceContext } from '@gatehouse/domain-core';
import { PasswordPolicy, type PasswordHasher, type PasswordHistoryGuard } from '@gatehouse/credentials';
import { bindTraceLogger, type Logger } from '@gatehouse/logging';
import type { UnitOfWork } from '@gatehouse/persistence';

import { credentialStatus, type CredentialStatus } from '../../../domain/index.js';
import type { CredentialUpdate, PrincipalRepository } from '../../../infrastructure/persistence/index.js';
import type { CredentialUseCase } from '../../use-case.js';
import { credentialFailure } from '../credential-failure.js';
import type { ChangePasswordCommand } from './command.js';

export interface ChangePasswordUseCaseDeps {
	readonly principalRepository: PrincipalRepository;
	readonly passwordHasher: PasswordHasher;
	readonly historyGuard: PasswordHistoryGuard;
	readonly logger: Logger;
	readonly clock?: () => Date;
}

export type ChangePasswordUseCase = CredentialUseCase<ChangePasswordCommand, CredentialUpdate, CredentialStatus>;

export function createChangePasswordUseCase(deps: ChangePasswordUseCaseDeps): ChangePasswordUseCase {
	const { principalRepository, passwordHasher, historyGuard, clock = () => new Date() } = deps;

	return {
		async prepare(command: ChangePasswordCommand, traceContext: TraceContext): Promise<Result<CredentialUpdate>> {
			const logger = bindTraceLogger(deps.logger, traceContext);

			const principal = await principalRepository.findById(command.principalId);
			if (!principal) {
				return Result.failure(
					UseCaseError.notFound('PRINCIPAL_NOT_FOUND', `Principal not found: ${command.principalId}`, {
						principalId: command.principalId,
					}),
				);
			}

			const hashed = await PasswordPolicy.check(command.newPassword)
				.asyncAndThen(() =>
					historyGuard.ensureNotReused(command.newPassword, principal.credentialHash, principal.credentialHistory),
				)
				.andThen(() => passwordHasher.hash(command.newPassword));
			if (hashed.isErr()) {
				return credentialFailure(hashed.error, logger, principal.id);
			}

			return Result.success({
				principalId: principal.id,
				expectedHash: principal.credentialHash,
				credentialHash: hashed.value,
				credentialHistory: historyGuard.retire(principal.credentialHistory, principal.credentialHash),
				changedAt: clock(),
			});
		},

		async apply(update: CredentialUpdate, uow: UnitOfWork): Promise<Result<CredentialStatus>> {
			const updated = await principalRepository.updateCredential(update, uow.tx);
			if (!updated) {
				uow.logger.info({ principalId: update.principalId }, 'credential changed concurrently');
				return Result.failure(
					UseCaseError.concurrency(
						'CREDENTIAL_CHANGED_CONCURRENTLY',
						'The password was changed by another request; reload and try again',
						{ principalId: update.principalId },
					),
				);
			}

			uow.logger.info({ principalId: update.principalId }, 'password changed');
			return Result.success(
				credentialStatus({ id: update.principalId, credentialChangedAt: update.changedAt }, update.changedAt),
			);
		},
	};
}
