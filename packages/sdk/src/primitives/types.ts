/**
 * Primitive capability types
 *
 * Keys, digests and timelocks are treated as opaque values by the rest of
 * the SDK. Curve arithmetic and signing are left to collaborators; only the
 * shapes the script layer depends on are validated here.
 */

/**
 * Compressed SEC public key (33 bytes, 0x02/0x03 prefix)
 */
export type PublicKey = Uint8Array;

/**
 * HASH160 of a compressed public key (20 bytes)
 */
export type KeyHash = Uint8Array;

/**
 * Hash functions a hashlock can commit to.
 */
export type HashFunction = "sha256" | "hash256" | "ripemd160" | "hash160";

/**
 * Relative (`older`, BIP68/112) or absolute (`after`, BIP65) timelock.
 */
export type TimelockKind = "older" | "after";

export const PUBLIC_KEY_LENGTH = 33;
export const KEY_HASH_LENGTH = 20;
export const PREIMAGE_LENGTH = 32;

export const HASH_DIGEST_LENGTHS: Readonly<Record<HashFunction, number>> = {
	sha256: 32,
	hash256: 32,
	ripemd160: 20,
	hash160: 20,
};

export const HASH_FUNCTIONS: readonly HashFunction[] = [
	"sha256",
	"hash256",
	"ripemd160",
	"hash160",
];

/** nLockTime values at or above this are UNIX timestamps, below are heights */
export const LOCKTIME_THRESHOLD = 500_000_000;
/** nSequence bit selecting time-based (512s units) relative locks */
export const SEQUENCE_LOCKTIME_TYPE_FLAG = 1 << 22;
/** nSequence bit disabling relative lock semantics */
export const SEQUENCE_LOCKTIME_DISABLE_FLAG = 0x80000000;
export const SEQUENCE_LOCKTIME_MASK = 0x0000ffff;
/** Largest timelock value representable as a positive 4-byte script number */
export const MAX_TIMELOCK_VALUE = 0x7fffffff;

export type PrimitiveErrorCode =
	| "INVALID_PUBLIC_KEY"
	| "INVALID_KEY_HASH"
	| "INVALID_DIGEST"
	| "INVALID_PREIMAGE"
	| "INVALID_TIMELOCK";

/**
 * Raised when a key, digest or timelock does not have the expected shape.
 */
export class PrimitiveError extends Error {
	constructor(
		message: string,
		public readonly code: PrimitiveErrorCode,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "PrimitiveError";
	}
}
