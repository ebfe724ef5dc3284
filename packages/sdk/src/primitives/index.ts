/**
 * Primitives - keys, hashlocks and timelocks consumed by the script layer
 */

export type {
	PublicKey,
	KeyHash,
	HashFunction,
	TimelockKind,
	PrimitiveErrorCode,
} from "./types.js";

export {
	PrimitiveError,
	PUBLIC_KEY_LENGTH,
	KEY_HASH_LENGTH,
	PREIMAGE_LENGTH,
	HASH_DIGEST_LENGTHS,
	HASH_FUNCTIONS,
	LOCKTIME_THRESHOLD,
	SEQUENCE_LOCKTIME_TYPE_FLAG,
	SEQUENCE_LOCKTIME_DISABLE_FLAG,
	SEQUENCE_LOCKTIME_MASK,
	MAX_TIMELOCK_VALUE,
} from "./types.js";

export {
	isValidPublicKey,
	validatePublicKey,
	validateKeyHash,
	publicKeyFromHex,
	keyHash,
} from "./keys.js";

export {
	isHashFunction,
	hashPreimage,
	validateDigest,
	validatePreimage,
} from "./hashes.js";

export {
	isHeightLock,
	isValidTimelock,
	validateTimelock,
	isOlderSatisfied,
	isAfterSatisfied,
} from "./timelock.js";
