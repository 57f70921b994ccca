export interface ChangePasswordCommand {
	readonly principalId: string;
	/** Clear text; hashed in `prepare` and never stored */
	readonly newPassword: string;
}
