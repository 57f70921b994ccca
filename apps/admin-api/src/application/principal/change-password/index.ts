/**
 * Change Password
 *
 * Use case for rotating an administrator's password.
 */

export type { ChangePasswordCommand } from './command.js';
export {
	createChangePasswordUseCase,
	type ChangePasswordUseCase,
	type ChangePasswordUseCaseDeps,
} from './use-case.js';
