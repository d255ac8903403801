export type { ApiKeySet } from "./types.js";
export {
	type Credentials,
	Secret,
	createCredentials,
	sealPrivateKey,
	unwrapCredentials,
} from "./credentials.js";
