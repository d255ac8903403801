/**
 * Raw Polymarket L2 API key set, as returned by key derivation and before
 * it is sealed into Credentials.
 */
export interface ApiKeySet {
	readonly apiKey: string;
	readonly secret: string;
	readonly passphrase: string;
}
