import { Result, UseCaseError } from '@gatehouse/domain-core';
import type { CredentialError } from '@gatehouse/credentials';
import type { Logger } from '@gatehouse/logging';

/**
 * Turn a rejected credential into a use case failure. Rejections are
 * ordinary outcomes and log at info; a hashing failure is an
 * infrastructure fault and is thrown.
 */
export function credentialFailure<T>(error: CredentialError, logger: Logger, principal: string): Result<T> {
	switch (error.type) {
		case 'policy_violation':
			logger.info({ principal, unmet: error.unmet }, 'password rejected by policy');
			return Result.failure(
				UseCaseError.validation('PASSWORD_POLICY_VIOLATION', error.message, { unmet: [...error.unmet] }),
			);
		case 'recently_used':
			logger.info({ principal }, 'password rejected as recently used');
			return Result.failure(UseCaseError.validation('PASSWORD_RECENTLY_USED', error.message));
		case 'hashing_failed':
			throw new Error(`Credential hashing failed: ${error.message}`, { cause: error.cause });
	}
}
