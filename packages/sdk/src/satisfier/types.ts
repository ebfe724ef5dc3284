/**
 * Satisfier types
 */

import type {
	HashFunction,
	KeyHash,
	PublicKey,
	TimelockKind,
} from "../primitives/index.js";

/**
 * What the spender has at hand. Every lookup is synchronous; an
 * implementation backed by a signing device resolves its answers before
 * `satisfy` is called.
 */
export interface SatisfactionOracle {
	/** Signature (DER plus sighash byte) by `key`, if one can be produced */
	lookupSignature(key: PublicKey): Uint8Array | undefined;
	/** Public key committed to by a `pk_h` hash */
	lookupPublicKey?(hash: KeyHash): PublicKey | undefined;
	/** 32-byte preimage of `digest` under `fn` */
	lookupPreimage(fn: HashFunction, digest: Uint8Array): Uint8Array | undefined;
	/** Whether the transaction being built meets `older(value)` / `after(value)` */
	isTimelockSatisfied(kind: TimelockKind, value: number): boolean;
}

/**
 * Input of `createOracle`.
 */
export interface OracleData {
	/** Signatures keyed by hex public key */
	signatures?: Readonly<Record<string, Uint8Array>>;
	/** Known preimages; matched against digests under every hash function */
	preimages?: readonly Uint8Array[];
	/** Public keys revealable for `pk_h` (keys with a signature are included) */
	publicKeys?: readonly PublicKey[];
	/** nSequence of the input being signed */
	sequence?: number;
	/** nLockTime of the transaction being signed */
	lockTime?: number;
}

export interface SatisfyOptions {
	/**
	 * Choose the cheapest witness even when a third party could turn it
	 * into a different valid one.
	 */
	allowMalleable?: boolean;
}

/**
 * `impossible`: nobody can satisfy the fragment for this transaction.
 * `unavailable`: the oracle cannot, though someone else might, or any
 * witness would be malleable.
 */
export type UnsatisfiableReason = "impossible" | "unavailable";

export type SatisfactionResult =
	| {
			status: "satisfied";
			/** Stack items, bottom to top */
			witness: Uint8Array[];
			/** Serialized size of the items */
			size: number;
	  }
	| { status: "unsatisfiable"; reason: UnsatisfiableReason };

export type SatisfierErrorCode = "INVALID_ORACLE_DATA";

export class SatisfierError extends Error {
	constructor(
		message: string,
		public readonly code: SatisfierErrorCode,
		public readonly details?: Record<string, unknown>,
	) {
		super(message);
		this.name = "SatisfierError";
	}
}
