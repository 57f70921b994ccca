/**
 * Actor
 *
 * Who performed an administrative request, as far as the audit trail is
 * concerned. Identification happens upstream (authentication transport is
 * not handled here); the HTTP layer only copies what it was given.
 */

export interface Actor {
	readonly id: string;
	readonly name: string;
	readonly ipAddress: string | null;
}

export const ANONYMOUS_ACTOR_ID = 'anonymous';

export const Actor = {
	of(id: string, name: string, ipAddress: string | null = null): Actor {
		return { id, name, ipAddress };
	},

	anonymous(ipAddress: string | null = null): Actor {
		return { id: ANONYMOUS_ACTOR_ID, name: ANONYMOUS_ACTOR_ID, ipAddress };
	},

	isAnonymous(actor: Actor): boolean {
		return actor.id === ANONYMOUS_ACTOR_ID;
	},
};
