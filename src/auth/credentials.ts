/**
 * Opaque secret containers: secrets never leak through toString,
 * JSON.stringify, Node.js inspect, or the structured logger.
 */

import { inspect } from "node:util";
import { AuthError } from "../shared/errors.js";
import type { ApiKeySet } from "./types.js";

const REDACTED = "[REDACTED]";

/**
 * Wraps a secret value. The logger recognizes the `__opaque` marker and
 * prints `[REDACTED]` in place of the object.
 *
 * @example
 * const key = new Secret(process.env["PRIVATE_KEY"] ?? "");
 * logger.info({ key }, "wallet loaded"); // key: "[REDACTED]"
 */
export class Secret<T> {
	readonly __opaque = true as const;
	readonly #value: T;

	constructor(value: T) {
		this.#value = value;
	}

	/** The only way to read the sealed value. */
	reveal(): T {
		return this.#value;
	}

	toString(): string {
		return REDACTED;
	}

	toJSON(): string {
		return REDACTED;
	}

	[inspect.custom](): string {
		return REDACTED;
	}
}

export type Credentials = Secret<ApiKeySet>;

/** @throws AuthError when any part of the key set is blank */
export function createCredentials(keys: ApiKeySet): Credentials {
	if (keys.apiKey.trim() === "" || keys.secret.trim() === "" || keys.passphrase.trim() === "") {
		throw new AuthError("API key set is incomplete", {
			hint: "Re-derive the L2 API key with the wallet's private key",
		});
	}
	return new Secret({ ...keys });
}

/** Returns a copy so callers cannot mutate the sealed key set. */
export function unwrapCredentials(credentials: Credentials): ApiKeySet {
	return { ...credentials.reveal() };
}

const PRIVATE_KEY_RE = /^(0x)?[0-9a-fA-F]{64}$/;

/**
 * Seals a wallet private key, normalizing it to 0x-prefixed hex.
 * @throws AuthError when missing or not 32 bytes of hex
 */
export function sealPrivateKey(raw: string | undefined): Secret<string> {
	const trimmed = raw?.trim() ?? "";
	if (trimmed === "") {
		throw new AuthError("PRIVATE_KEY is not set", {
			hint: "Add PRIVATE_KEY to the environment or .env file",
		});
	}
	if (!PRIVATE_KEY_RE.test(trimmed)) {
		throw new AuthError("PRIVATE_KEY must be 32 bytes of hex");
	}
	return new Secret(trimmed.startsWith("0x") ? trimmed : `0x${trimmed}`);
}
