/**
 * @gatehouse/domain-core
 *
 * Core types shared by every Gatehouse package:
 * - Result type returned by use cases
 * - Use case error types with HTTP status mapping
 * - Trace context carrying the per-request trace id
 * - Actor recorded against audited mutations
 *
 * @example
 * ```typescript
 * import { Result, UseCaseError, TraceContext } from '@gatehouse/domain-core';
 *
 * const trace = TraceContext.fresh();
 * trace.idOrSentinel(); // "01JABCDE5Y8JY5ZQ0HZXEQ5Y8J"
 *
 * if (!verdict.accepted) {
 *     return Result.failure(UseCaseError.validation('PASSWORD_POLICY_VIOLATION', 'Weak password'));
 * }
 * ```
 */

export {
	UseCaseError,
	type UseCaseErrorBase,
	type UseCaseErrorType,
	type ValidationError,
	type NotFoundError,
	type BusinessRuleViolation,
	type ConcurrencyError,
} from './errors.js';

export { Result, isSuccess, isFailure, type Success, type Failure } from './result.js';

export {
	TraceContext,
	TraceContextError,
	TRACE_SENTINEL,
	TRACE_ID_HEADER,
	type TraceId,
} from './trace-context.js';

export { Actor, ANONYMOUS_ACTOR_ID } from './actor.js';
