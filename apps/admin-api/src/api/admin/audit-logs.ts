/**
 * Audit Logs Admin API
 *
 * Read-only views over admin_audit_log. Nothing here writes or audits.
 */

import type { FastifyInstance } from 'fastify';
import { pageRequest, type AuditLogRecord, type AuditLogRepository } from '@gatehouse/persistence';
import {
	Type,
	CommonSchemas,
	safeValidate,
	paginatedResponse,
	jsonSuccess,
	notFound,
	badRequest,
	type Static,
} from '@gatehouse/http';

// ─── Param / Query Schemas ──────────────────────────────────────────────────

const IdParam = Type.Object({ id: Type.String({ pattern: '^[0-9]{1,15}$' }) });

const ListAuditLogsQuery = Type.Composite([
	Type.Object({
		traceId: Type.Optional(Type.String({ maxLength: 26 })),
		entityType: Type.Optional(Type.String({ maxLength: 32 })),
		entityId: Type.Optional(Type.String({ maxLength: 64 })),
		actorId: Type.Optional(Type.String({ maxLength: 64 })),
		method: Type.Optional(Type.String({ maxLength: 8 })),
	}),
	CommonSchemas.PaginationQuery,
]);

// ─── Response Schemas ───────────────────────────────────────────────────────

const AuditLogResponseSchema = Type.Object({
	id: Type.Integer(),
	traceId: Type.String(),
	method: Type.String(),
	path: Type.String(),
	entityType: Type.String(),
	entityId: Type.Union([Type.String(), Type.Null()]),
	outcome: Type.String(),
	statusCode: Type.Union([Type.Integer(), Type.Null()]),
	actorId: Type.String(),
	actorName: Type.String(),
	ipAddress: Type.Union([Type.String(), Type.Null()]),
	payload: Type.Unknown(),
	createdAt: CommonSchemas.DateTime,
});

type AuditLogResponse = Static<typeof AuditLogResponseSchema>;

export interface AuditLogsRoutesDeps {
	readonly auditLogRepository: AuditLogRepository;
}

function toResponse(record: AuditLogRecord): AuditLogResponse {
	return {
		id: record.id,
		traceId: record.traceId,
		method: record.method,
		path: record.path,
		entityType: record.entityType,
		entityId: record.entityId,
		outcome: record.outcome,
		statusCode: record.statusCode,
		actorId: record.actorId,
		actorName: record.actorName,
		ipAddress: record.ipAddress,
		payload: record.payload,
		createdAt: record.createdAt.toISOString(),
	};
}

function optionalInt(value: string | undefined): number | undefined {
	return value === undefined ? undefined : Number.parseInt(value, 10);
}

export async function registerAuditLogsRoutes(fastify: FastifyInstance, deps: AuditLogsRoutesDeps): Promise<void> {
	const { auditLogRepository } = deps;

	// GET /admin/audit-logs - Newest first, filterable
	fastify.get(
		'/audit-logs',
		{
			schema: {
				querystring: ListAuditLogsQuery,
				response: { 200: paginatedResponse(AuditLogResponseSchema) },
			},
		},
		async (request, reply) => {
			const query = safeValidate(request.query, ListAuditLogsQuery);
			if (!query.success) {
				return badRequest(reply, query.error);
			}

			const { page, pageSize, ...filters } = query.data;
			const result = await auditLogRepository.findPaged(
				filters,
				pageRequest(optionalInt(page), optionalInt(pageSize)),
			);

			return jsonSuccess(reply, { ...result, items: result.items.map(toResponse) });
		},
	);

	// GET /admin/audit-logs/:id
	fastify.get(
		'/audit-logs/:id',
		{
			schema: {
				params: IdParam,
				response: { 200: AuditLogResponseSchema },
			},
		},
		async (request, reply) => {
			const params = safeValidate(request.params, IdParam);
			if (!params.success) {
				return badRequest(reply, params.error);
			}

			const record = await auditLogRepository.findById(Number(params.data.id));
			if (!record) {
				return notFound(reply, `Audit log not found: ${params.data.id}`);
			}

			return jsonSuccess(reply, toResponse(record));
		},
	);
}
