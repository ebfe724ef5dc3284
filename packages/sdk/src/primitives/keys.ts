import { ripemd160 } from "@noble/hashes/legacy.js";
import { sha256 } from "@noble/hashes/sha2.js";

import { bytesToHex, hexToBytes, isHex } from "../utils/index.js";
import {
	KEY_HASH_LENGTH,
	KeyHash,
	PUBLIC_KEY_LENGTH,
	PrimitiveError,
	PublicKey,
} from "./types.js";

/**
 * Validates that a public key is in compressed SEC format.
 */
export function isValidPublicKey(key: Uint8Array): boolean {
	return (
		key.length === PUBLIC_KEY_LENGTH && (key[0] === 0x02 || key[0] === 0x03)
	);
}

export function validatePublicKey(key: Uint8Array): PublicKey {
	if (!isValidPublicKey(key)) {
		throw new PrimitiveError(
			`Invalid public key: expected ${PUBLIC_KEY_LENGTH} bytes with 02/03 prefix, got ${key.length} bytes`,
			"INVALID_PUBLIC_KEY",
			{ key: bytesToHex(key) },
		);
	}
	return key;
}

export function validateKeyHash(hash: Uint8Array): KeyHash {
	if (hash.length !== KEY_HASH_LENGTH) {
		throw new PrimitiveError(
			`Invalid key hash length: expected ${KEY_HASH_LENGTH} bytes, got ${hash.length}`,
			"INVALID_KEY_HASH",
		);
	}
	return hash;
}

/**
 * Parse a hex-encoded compressed public key.
 */
export function publicKeyFromHex(value: string): PublicKey {
	if (!isHex(value)) {
		throw new PrimitiveError(
			`Invalid public key: "${value}" is not hex`,
			"INVALID_PUBLIC_KEY",
		);
	}
	return validatePublicKey(hexToBytes(value));
}

/**
 * HASH160 (RIPEMD160 of SHA256) of a public key, as committed to by `pk_h`.
 */
export function keyHash(key: PublicKey): KeyHash {
	return ripemd160(sha256(key));
}
