/**
 * Principals Admin API
 *
 * Creating administrators and rotating their passwords. Both mutations are
 * audited; a rejected password never opens a unit of work.
 */

import type { FastifyInstance } from 'fastify';
import { Result } from '@gatehouse/domain-core';
import {
	Type,
	CommonSchemas,
	safeValidate,
	sendResult,
	jsonSuccess,
	notFound,
	badRequest,
	type AuditedMutation,
	type Static,
} from '@gatehouse/http';

import { credentialStatus, type AdminPrincipal, type CredentialStatus } from '../../domain/index.js';
import type { PrincipalRepository } from '../../infrastructure/persistence/index.js';
import type { CreatePrincipalUseCase, ChangePasswordUseCase } from '../../application/index.js';

// ─── Request Schemas ────────────────────────────────────────────────────────

const IdParam = Type.Object({ id: CommonSchemas.SortableId });

const CreatePrincipalBody = Type.Object({
	username: Type.String({ minLength: 3, maxLength: 64 }),
	displayName: Type.String({ minLength: 1, maxLength: 128 }),
	password: Type.String({ maxLength: 1024 }),
});

const ChangePasswordBody = Type.Object({
	newPassword: Type.String({ maxLength: 1024 }),
});

// ─── Response Schemas ───────────────────────────────────────────────────────

const PrincipalResponseSchema = Type.Object({
	id: Type.String(),
	username: Type.String(),
	displayName: Type.String(),
	credentialChangedAt: CommonSchemas.DateTime,
	createdAt: CommonSchemas.DateTime,
});

const CredentialStatusResponseSchema = Type.Object({
	principalId: Type.String(),
	changedAt: CommonSchemas.DateTime,
	expiresAt: CommonSchemas.DateTime,
	expired: Type.Boolean(),
});

type PrincipalResponse = Static<typeof PrincipalResponseSchema>;
type CredentialStatusResponse = Static<typeof CredentialStatusResponseSchema>;

export interface PrincipalsRoutesDeps {
	readonly principalRepository: PrincipalRepository;
	readonly createPrincipalUseCase: CreatePrincipalUseCase;
	readonly changePasswordUseCase: ChangePasswordUseCase;
	readonly auditedMutation: AuditedMutation;
	readonly clock: () => Date;
}

function toPrincipalResponse(principal: AdminPrincipal): PrincipalResponse {
	return {
		id: principal.id,
		username: principal.username,
		displayName: principal.displayName,
		credentialChangedAt: principal.credentialChangedAt.toISOString(),
		createdAt: principal.createdAt.toISOString(),
	};
}

function toCredentialStatusResponse(status: CredentialStatus): CredentialStatusResponse {
	return {
		principalId: status.principalId,
		changedAt: status.changedAt.toISOString(),
		expiresAt: status.expiresAt.toISOString(),
		expired: status.expired,
	};
}

export async function registerPrincipalsRoutes(fastify: FastifyInstance, deps: PrincipalsRoutesDeps): Promise<void> {
	const { principalRepository, createPrincipalUseCase, changePasswordUseCase, auditedMutation, clock } = deps;

	// POST /admin/principals - Create an administrator
	fastify.post(
		'/principals',
		{
			schema: {
				body: CreatePrincipalBody,
				response: { 201: PrincipalResponseSchema },
			},
		},
		async (request, reply) => {
			const body = safeValidate(request.body, CreatePrincipalBody);
			if (!body.success) {
				return badRequest(reply, body.error);
			}

			const prepared = await createPrincipalUseCase.prepare(body.data, request.traceContext);
			if (Result.isFailure(prepared)) {
				return sendResult(reply, prepared);
			}

			return auditedMutation(request, reply, (uow) => createPrincipalUseCase.apply(prepared.value, uow), {
				successStatus: 201,
				entityId: (principal) => principal.id,
				payload: (principal) => ({ username: principal.username, displayName: principal.displayName }),
				transform: toPrincipalResponse,
			});
		},
	);

	// PUT /admin/principals/:id/password - Rotate a password
	fastify.put(
		'/principals/:id/password',
		{
			schema: {
				params: IdParam,
				body: ChangePasswordBody,
				response: { 200: CredentialStatusResponseSchema },
			},
		},
		async (request, reply) => {
			const params = safeValidate(request.params, IdParam);
			const body = safeValidate(request.body, ChangePasswordBody);
			if (!params.success) {
				return badRequest(reply, params.error);
			}
			if (!body.success) {
				return badRequest(reply, body.error);
			}

			const prepared = await changePasswordUseCase.prepare(
				{ principalId: params.data.id, newPassword: body.data.newPassword },
				request.traceContext,
			);
			if (Result.isFailure(prepared)) {
				return sendResult(reply, prepared);
			}

			return auditedMutation(request, reply, (uow) => changePasswordUseCase.apply(prepared.value, uow), {
				payload: (status) => ({ credentialChangedAt: status.changedAt.toISOString() }),
				transform: toCredentialStatusResponse,
			});
		},
	);

	// GET /admin/principals/:id/password-status - Rotation status
	fastify.get(
		'/principals/:id/password-status',
		{
			schema: {
				params: IdParam,
				response: { 200: CredentialStatusResponseSchema },
			},
		},
		async (request, reply) => {
			const params = safeValidate(request.params, IdParam);
			if (!params.success) {
				return badRequest(reply, params.error);
			}

			const principal = await principalRepository.findById(params.data.id);
			if (!principal) {
				return notFound(reply, `Principal not found: ${params.data.id}`);
			}

			return jsonSuccess(reply, toCredentialStatusResponse(credentialStatus(principal, clock())));
		},
	);
}
