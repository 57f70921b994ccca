/**
 * Schema Utilities
 *
 * TypeBox schemas shared by the admin routes. Fastify validates requests
 * against them through AJV; handlers narrow the validated payloads with
 * `safeValidate`.
 */

import { Type, type Static, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

export const CommonSchemas = {
	/**
	 * 26-character Crockford Base32 sortable id (principal ids, trace ids).
	 */
	SortableId: Type.String({
		minLength: 26,
		maxLength: 26,
		pattern: '^[0-7][0-9A-HJKMNP-TV-Z]{25}$',
		description: 'Sortable id in Crockford Base32 format',
	}),

	DateTime: Type.String({
		format: 'date-time',
		description: 'ISO 8601 datetime',
	}),

	NonEmptyString: Type.String({
		minLength: 1,
		description: 'Non-empty string',
	}),

	/**
	 * Query strings arrive as text; pages are 0-based.
	 */
	PaginationQuery: Type.Object({
		page: Type.Optional(Type.String({ pattern: '^[0-9]+$' })),
		pageSize: Type.Optional(Type.String({ pattern: '^[0-9]+$' })),
	}),
};

export const ErrorResponseSchema = Type.Object({
	message: Type.String({ description: 'Human-readable error message' }),
	code: Type.String({ description: 'Machine-readable error code' }),
	details: Type.Optional(Type.Record(Type.String(), Type.Unknown(), { description: 'Additional error details' })),
});

export type ErrorResponseType = Static<typeof ErrorResponseSchema>;

export function paginatedResponse<T extends TSchema>(itemSchema: T) {
	return Type.Object({
		items: Type.Array(itemSchema),
		page: Type.Integer({ minimum: 0 }),
		pageSize: Type.Integer({ minimum: 1 }),
		totalItems: Type.Integer({ minimum: 0 }),
		totalPages: Type.Integer({ minimum: 0 }),
		hasNext: Type.Boolean(),
		hasPrevious: Type.Boolean(),
	});
}

/**
 * Validation that returns a Result-like object instead of throwing.
 */
export function safeValidate<T extends TSchema>(
	data: unknown,
	schema: T,
): { success: true; data: Static<T> } | { success: false; error: string } {
	if (Value.Check(schema, data)) {
		return { success: true, data };
	}
	const message = [...Value.Errors(schema, data)].map((e) => `${e.path}: ${e.message}`).join(', ');
	return { success: false, error: message };
}

export { Type, Value, type Static, type TSchema };
