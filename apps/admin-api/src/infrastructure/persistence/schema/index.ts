export {
	adminPrincipals,
	PRINCIPALS_SQL,
	type PrincipalRecord,
	type NewPrincipalRecord,
} from './principals.js';
