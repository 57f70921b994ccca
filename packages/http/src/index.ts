/**
 * @gatehouse/http
 *
 * Fastify layer for the Gatehouse admin backend:
 * - Tracing plugin binding a TraceContext to every request
 * - Actor plugin reading the upstream-authenticated administrator
 * - Audited mutations: unit of work, audit record and reply in one call
 * - Result to HTTP response mapping and the global error handler
 * - TypeBox schema utilities
 *
 * @example
 * ```typescript
 * import Fastify from 'fastify';
 * import {
 *     tracingPlugin,
 *     actorPlugin,
 *     errorHandlerPlugin,
 *     createStandardErrorHandlerOptions,
 *     createFastifyLoggingOptions,
 *     createAuditedMutation,
 * } from '@gatehouse/http';
 *
 * const fastify = Fastify({
 *     ...createFastifyLoggingOptions({ level: 'info', serviceName: 'admin-api' }),
 * });
 *
 * await fastify.register(tracingPlugin);
 * await fastify.register(actorPlugin);
 * await fastify.register(errorHandlerPlugin, createStandardErrorHandlerOptions());
 *
 * const auditedMutation = createAuditedMutation({ unitOfWorkManager, auditRecorder });
 * fastify.post('/admin/principals', (request, reply) =>
 *     auditedMutation(request, reply, (uow) => createPrincipal.apply(prepared, uow), { successStatus: 201 }),
 * );
 * ```
 */

export {
	type TracingPluginOptions,
	type ActorPluginOptions,
	type ErrorResponse,
	type FastifyRequest,
	type FastifyReply,
} from './types.js';

export {
	tracingPlugin,
	createTraceIdGenerator,
	UPSTREAM_TRACE_ID_LOG_KEY,
	actorPlugin,
} from './plugins/index.js';

export { createFastifyLoggingOptions, type FastifyLoggingConfig } from './logging.js';

export {
	createAuditedMutation,
	type AuditedMutation,
	type AuditedMutationDeps,
	type AuditedMutationOptions,
} from './audited-mutation.js';

export {
	getErrorStatus,
	toErrorResponse,
	sendResult,
	jsonSuccess,
	jsonError,
	notFound,
	badRequest,
	type SendResultOptions,
} from './response.js';

export {
	errorHandlerPlugin,
	createCommonErrorMappers,
	createStandardErrorHandlerOptions,
	type ErrorHandlerConfig,
	type ErrorMapper,
} from './error-handler.js';

export {
	CommonSchemas,
	ErrorResponseSchema,
	type ErrorResponseType,
	paginatedResponse,
	safeValidate,
	Type,
	Value,
	type Static,
	type TSchema,
} from './openapi.js';
