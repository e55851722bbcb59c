/**
 * Bearer credential used to authenticate gateway calls.
 * Never mutated after creation; its lifecycle ends by deactivation.
 */
export interface Credential {
	id: string;
	/** Full header value including the `Bearer ` prefix. */
	token: string;
	issuedAt: string;
	expiresAt: string;
	active: boolean;
}
