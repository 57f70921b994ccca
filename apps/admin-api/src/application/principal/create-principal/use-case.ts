/**
 * Create Principal Use Case
 *
 * Creates an administrator with an initial password. The password must pass
 * the policy; there is no history to check yet.
 */

import { Result, UseCaseError, type TraceContext } from '@gatehouse/domain-core';
import { PasswordPolicy, type PasswordHasher } from '@gatehouse/credentials';
import { bindTraceLogger, type Logger } from '@gatehouse/logging';
import type { UnitOfWork } from '@gatehouse/persistence';
import { generate } from '@gatehouse/sortable-id';

import { USERNAME_PATTERN, DISPLAY_NAME_MAX_LENGTH, type AdminPrincipal } from '../../../domain/index.js';
import type { PrincipalRepository } from '../../../infrastructure/persistence/index.js';
import type { CredentialUseCase } from '../../use-case.js';
import { credentialFailure } from '../credential-failure.js';
import type { CreatePrincipalCommand } from './command.js';

export interface CreatePrincipalUseCaseDeps {
	readonly principalRepository: PrincipalRepository;
	readonly passwordHasher: PasswordHasher;
	readonly logger: Logger;
	readonly clock?: () => Date;
}

export type CreatePrincipalUseCase = CredentialUseCase<CreatePrincipalCommand, AdminPrincipal, AdminPrincipal>;

function usernameTaken(username: string): UseCaseError {
	return UseCaseError.businessRule('USERNAME_EXISTS', 'Username already exists', { username });
}

export function createCreatePrincipalUseCase(deps: CreatePrincipalUseCaseDeps): CreatePrincipalUseCase {
	const { principalRepository, passwordHasher, clock = () => new Date() } = deps;

	return {
		async prepare(command: CreatePrincipalCommand, traceContext: TraceContext): Promise<Result<AdminPrincipal>> {
			const logger = bindTraceLogger(deps.logger, traceContext);
			const username = command.username.trim();
			const displayName = command.displayName.trim();

			if (!USERNAME_PATTERN.test(username)) {
				return Result.failure(
					UseCaseError.validation(
						'USERNAME_INVALID',
						'Username must be 3-64 characters of letters, digits, dot, dash or underscore',
						{ username },
					),
				);
			}

			if (displayName.length === 0 || displayName.length > DISPLAY_NAME_MAX_LENGTH) {
				return Result.failure(
					UseCaseError.validation(
						'DISPLAY_NAME_INVALID',
						`Display name must be 1-${DISPLAY_NAME_MAX_LENGTH} characters`,
					),
				);
			}

			if (await principalRepository.existsByUsername(username)) {
				return Result.failure(usernameTaken(username));
			}

			const hashed = await PasswordPolicy.check(command.password).asyncAndThen(() =>
				passwordHasher.hash(command.password),
			);
			if (hashed.isErr()) {
				return credentialFailure(hashed.error, logger, username);
			}

			const now = clock();
			return Result.success({
				id: generate(),
				username,
				displayName,
				credentialHash: hashed.value,
				credentialHistory: [],
				credentialChangedAt: now,
				createdAt: now,
				updatedAt: now,
			});
		},

		async apply(principal: AdminPrincipal, uow: UnitOfWork): Promise<Result<AdminPrincipal>> {
			const inserted = await principalRepository.insert(principal, uow.tx);
			if (!inserted) {
				return Result.failure(usernameTaken(principal.username));
			}

			uow.logger.info({ principalId: principal.id, username: principal.username }, 'principal created');
			return Result.success(principal);
		},
	};
}
