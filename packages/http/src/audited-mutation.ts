/**
 * Audited Mutations
 *
 * Runs a mutating route handler inside a unit of work bound to the
 * request's trace context. A successful Result is audited through the
 * same unit of work before it commits; a failed Result rolls back with
 * nothing recorded. Thrown errors roll back and reach the error handler.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { Result } from '@gatehouse/domain-core';
import {
	describeTarget,
	isMutatingMethod,
	type AuditRecorder,
	type UnitOfWork,
	type UnitOfWorkManager,
} from '@gatehouse/persistence';
import { sendResult } from './response.js';

export interface AuditedMutationDeps {
	readonly unitOfWorkManager: UnitOfWorkManager;
	readonly auditRecorder: AuditRecorder;
	/** Per-request deadline; falls back to the manager's default */
	readonly timeoutMs?: number | undefined;
}

export interface AuditedMutationOptions<T, R> {
	/** Status code for success (default: 200) */
	readonly successStatus?: number;
	/** Overrides the entity type derived from the path */
	readonly entityType?: string;
	/** Entity id for the audit row, e.g. the id of a created principal */
	readonly entityId?: (value: T) => string | null;
	/** Non-secret summary stored with the audit row */
	readonly payload?: (value: T) => Record<string, unknown> | null;
	/** Transform success value before sending */
	readonly transform?: (value: T) => R;
}

export type AuditedMutation = <T, R = T>(
	request: FastifyRequest,
	reply: FastifyReply,
	work: (uow: UnitOfWork) => Promise<Result<T>>,
	options?: AuditedMutationOptions<T, R>,
) => Promise<FastifyReply>;

/**
 * Abort signal that fires when the client goes away before the reply is sent.
 */
function disconnectSignal(reply: FastifyReply): { signal: AbortSignal; dispose: () => void } {
	const controller = new AbortController();
	const onClose = () => {
		if (!reply.raw.writableFinished) {
			controller.abort();
		}
	};
	reply.raw.once('close', onClose);
	return {
		signal: controller.signal,
		dispose: () => reply.raw.removeListener('close', onClose),
	};
}

/**
 * @example
 * ```typescript
 * const auditedMutation = createAuditedMutation({ unitOfWorkManager, auditRecorder });
 *
 * fastify.put('/principals/:id/password', async (request, reply) =>
 *     auditedMutation(request, reply, (uow) => changePassword.apply(prepared, uow), {
 *         payload: () => ({ field: 'credential' }),
 *     }),
 * );
 * ```
 */
export function createAuditedMutation(deps: AuditedMutationDeps): AuditedMutation {
	const { unitOfWorkManager, auditRecorder, timeoutMs } = deps;

	return async function auditedMutation<T, R = T>(
		request: FastifyRequest,
		reply: FastifyReply,
		work: (uow: UnitOfWork) => Promise<Result<T>>,
		options: AuditedMutationOptions<T, R> = {},
	): Promise<FastifyReply> {
		const successStatus = options.successStatus ?? 200;
		const audited = isMutatingMethod(request.method);
		const [path = request.url] = request.url.split('?');
		const target = describeTarget(path);
		const disconnect = disconnectSignal(reply);

		try {
			const result = await unitOfWorkManager.acquire(
				async (uow) => {
					const outcome = await work(uow);

					if (Result.isFailure(outcome)) {
						uow.logger.info({ code: outcome.error.code }, 'mutation rejected, rolling back');
						uow.setRollbackOnly();
						return outcome;
					}

					if (audited) {
						await auditRecorder.record(uow, {
							method: request.method,
							path,
							entityType: options.entityType ?? target.entityType,
							entityId: options.entityId ? options.entityId(outcome.value) : target.entityId,
							outcome: 'success',
							statusCode: successStatus,
							actor: request.actor,
							payload: options.payload ? options.payload(outcome.value) : null,
						});
					}
					return outcome;
				},
				{ traceContext: request.traceContext, signal: disconnect.signal, timeoutMs },
			);

			return sendResult(reply, result, { successStatus, transform: options.transform });
		} finally {
			disconnect.dispose();
		}
	};
}
