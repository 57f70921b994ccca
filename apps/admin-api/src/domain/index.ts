export {
	credentialStatus,
	USERNAME_PATTERN,
	DISPLAY_NAME_MAX_LENGTH,
	type AdminPrincipal,
	type CredentialStatus,
} from './principal.js';
