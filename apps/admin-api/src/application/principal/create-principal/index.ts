/**
 * Create Principal
 *
 * Use case for creating an administrator with an initial password.
 */

export type { CreatePrincipalCommand } from './command.js';
export {
	createCreatePrincipalUseCase,
	type CreatePrincipalUseCase,
	type CreatePrincipalUseCaseDeps,
} from './use-case.js';
