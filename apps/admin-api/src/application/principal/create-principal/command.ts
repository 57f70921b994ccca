export interface CreatePrincipalCommand {
	readonly username: string;
	readonly displayName: string;
	/** Clear text; hashed in `prepare` and never stored */
	readonly password: string;
}
