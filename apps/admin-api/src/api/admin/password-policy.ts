/**
 * Password Policy API
 *
 * The requirements an administrator's password must meet, for display
 * next to password forms.
 */

import type { FastifyInstance } from 'fastify';
import { PasswordPolicy } from '@gatehouse/credentials';
import { Type, jsonSuccess } from '@gatehouse/http';

const PasswordRequirementsSchema = Type.Object({
	minLength: Type.Integer(),
	requireUppercase: Type.Boolean(),
	requireDigit: Type.Boolean(),
	requireSpecial: Type.Boolean(),
	specialCharacters: Type.String(),
	maxAgeDays: Type.Integer(),
	historySize: Type.Integer(),
	message: Type.String(),
});

export async function registerPasswordPolicyRoutes(fastify: FastifyInstance): Promise<void> {
	// GET /admin/password-policy
	fastify.get(
		'/password-policy',
		{ schema: { response: { 200: PasswordRequirementsSchema } } },
		async (_request, reply) => jsonSuccess(reply, PasswordPolicy.requirements()),
	);
}
