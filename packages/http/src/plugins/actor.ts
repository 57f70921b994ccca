/**
 * Actor Plugin
 *
 * Copies the acting administrator from headers set by the upstream
 * authenticator onto `request.actor`. Requests without them are recorded
 * as the anonymous actor. Nothing here authenticates or authorizes.
 */

import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { Actor } from '@gatehouse/domain-core';
import type { ActorPluginOptions } from '../types.js';

const DEFAULT_ID_HEADER = 'x-admin-id';
const DEFAULT_NAME_HEADER = 'x-admin-name';

function headerValue(value: string | string[] | undefined): string | null {
	const raw = Array.isArray(value) ? value[0] : value;
	const trimmed = raw?.trim();
	return trimmed ? trimmed : null;
}

const actorPluginAsync: FastifyPluginAsync<ActorPluginOptions> = async (fastify, opts) => {
	const idHeader = (opts.idHeader ?? DEFAULT_ID_HEADER).toLowerCase();
	const nameHeader = (opts.nameHeader ?? DEFAULT_NAME_HEADER).toLowerCase();

	fastify.decorateRequest('actor', null, []);

	fastify.addHook('onRequest', async (request) => {
		const id = headerValue(request.headers[idHeader]);
		const ipAddress = request.ip || null;

		request.actor = id === null ? Actor.anonymous(ipAddress) : Actor.of(id, headerValue(request.headers[nameHeader]) ?? id, ipAddress);
	});
};

export const actorPlugin = fp(actorPluginAsync, {
	name: '@gatehouse/actor',
	fastify: '5.x',
});
