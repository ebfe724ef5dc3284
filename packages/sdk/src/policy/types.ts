/**
 * Abstract policy types
 */

import type { HashFunction, KeyHash, PublicKey } from "../primitives/index.js";
import type { Span } from "../utils/index.js";

export interface WeightedPolicy {
	weight: number;
	policy: Policy;
}

/**
 * Untyped spending condition. The compiler decides how each node is
 * encoded; `or` branch weights are relative likelihoods of each branch being
 * the one used at spend time.
 */
export type Policy =
	| { kind: "unsatisfiable" }
	| { kind: "trivial" }
	| { kind: "key"; key: PublicKey }
	| { kind: "key_hash"; hash: KeyHash }
	| { kind: "after" | "older"; value: number }
	| { kind: "hash"; fn: HashFunction; digest: Uint8Array }
	| { kind: "and"; subs: readonly Policy[] }
	| { kind: "or"; branches: readonly WeightedPolicy[] }
	| { kind: "thresh"; k: number; subs: readonly Policy[] };

export type PolicyKind = Policy["kind"];

/** A leaf condition a spender can hold or meet */
export type PolicyLeaf = Extract<
	Policy,
	{ kind: "key" | "key_hash" | "after" | "older" | "hash" }
>;

/**
 * Capabilities available at spend time, as seen by `isPolicySatisfied`.
 * Keys and hashes are lowercase hex.
 */
export interface AvailableCapabilities {
	keys?: Iterable<string>;
	keyHashes?: Iterable<string>;
	/** Digests (hex) whose preimage is known */
	preimages?: Iterable<string>;
	/** Input nSequence, checked against `older` */
	sequence?: number;
	/** Transaction nLockTime, checked against `after` */
	lockTime?: number;
}

export type PolicyErrorCode =
	| "INVALID_ARITY"
	| "INVALID_THRESHOLD"
	| "INVALID_WEIGHT"
	| "INVALID_TIMELOCK"
	| "INVALID_DIGEST"
	| "INVALID_KEY"
	| "DUPLICATE_KEY";

export class PolicyError extends Error {
	constructor(
		message: string,
		public readonly code: PolicyErrorCode,
		public readonly details?: Record<string, unknown>,
	) {
		super(message);
		this.name = "PolicyError";
	}
}

export type PolicyParseErrorCode = "SYNTAX" | "UNKNOWN_POLICY" | "INVALID_ARGUMENT";

/**
 * Raised by `parsePolicy` with the `[start, end)` span of the offending
 * token.
 */
export class PolicyParseError extends Error {
	constructor(
		message: string,
		public readonly code: PolicyParseErrorCode,
		public readonly span: Span,
		cause?: unknown,
	) {
		super(message, { cause });
		this.name = "PolicyParseError";
	}
}
