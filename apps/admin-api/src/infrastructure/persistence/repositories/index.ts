export {
	createPrincipalRepository,
	type PrincipalRepository,
	type CredentialUpdate,
} from './principal-repository.js';
