import { ripemd160 } from "@noble/hashes/legacy.js";
import { sha256 } from "@noble/hashes/sha2.js";

import { bytesToHex } from "../utils/index.js";
import {
	HASH_DIGEST_LENGTHS,
	HASH_FUNCTIONS,
	HashFunction,
	PREIMAGE_LENGTH,
	PrimitiveError,
} from "./types.js";

export function isHashFunction(value: string): value is HashFunction {
	return HASH_FUNCTIONS.some((fn) => fn === value);
}

/**
 * Digest a preimage with the given hashlock function.
 */
export function hashPreimage(fn: HashFunction, preimage: Uint8Array): Uint8Array {
	switch (fn) {
		case "sha256":
			return sha256(preimage);
		case "hash256":
			return sha256(sha256(preimage));
		case "ripemd160":
			return ripemd160(preimage);
		case "hash160":
			return ripemd160(sha256(preimage));
	}
}

export function validateDigest(fn: HashFunction, digest: Uint8Array): Uint8Array {
	const expected = HASH_DIGEST_LENGTHS[fn];
	if (digest.length !== expected) {
		throw new PrimitiveError(
			`Invalid ${fn} digest: expected ${expected} bytes, got ${digest.length}`,
			"INVALID_DIGEST",
			{ digest: bytesToHex(digest) },
		);
	}
	return digest;
}

// Script hashlocks check `SIZE 32 EQUALVERIFY` before hashing.
export function validatePreimage(preimage: Uint8Array): Uint8Array {
	if (preimage.length !== PREIMAGE_LENGTH) {
		throw new PrimitiveError(
			`Invalid preimage length: expected ${PREIMAGE_LENGTH} bytes, got ${preimage.length}`,
			"INVALID_PREIMAGE",
		);
	}
	return preimage;
}
