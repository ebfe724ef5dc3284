/**
 * Witness verification types
 */

import type { HashFunction } from "../primitives/index.js";

/**
 * Answers the checks a script makes against the spending transaction.
 */
export interface TransactionChecker {
	/** Whether `signature` (DER plus sighash byte) is valid for `key` */
	checkSignature(signature: Uint8Array, key: Uint8Array): boolean;
	/** Whether the input's nSequence meets `older(value)` */
	checkOlder(value: number): boolean;
	/** Whether the transaction's nLockTime meets `after(value)` */
	checkAfter(value: number): boolean;
}

export type InterpreterErrorCode =
	| "MALFORMED_SCRIPT"
	| "BAD_OPCODE"
	| "PUSH_SIZE"
	| "INVALID_STACK_OPERATION"
	| "INVALID_ALTSTACK_OPERATION"
	| "UNBALANCED_CONDITIONAL"
	| "MINIMALIF"
	| "MINIMALDATA"
	| "NUMBER_OVERFLOW"
	| "VERIFY"
	| "EQUALVERIFY"
	| "CHECKSIGVERIFY"
	| "CHECKMULTISIGVERIFY"
	| "NULLFAIL"
	| "SIG_NULLDUMMY"
	| "PUBKEY_COUNT"
	| "SIG_COUNT"
	| "NEGATIVE_LOCKTIME"
	| "UNSATISFIED_LOCKTIME"
	| "EVAL_FALSE"
	| "CLEANSTACK";

/** A condition of the script that the witness met, in execution order */
export type SatisfiedConstraint =
	| { kind: "public_key"; key: Uint8Array; signature: Uint8Array }
	/** `pkh`: the revealed key matched the hash and then signed */
	| { kind: "key_hash"; hash: Uint8Array; key: Uint8Array; signature: Uint8Array }
	| { kind: "hash_lock"; fn: HashFunction; hash: Uint8Array; preimage: Uint8Array }
	| { kind: "older"; value: number }
	| { kind: "after"; value: number };

export type VerificationResult =
	| { valid: true; satisfied: SatisfiedConstraint[] }
	| {
			valid: false;
			error: InterpreterErrorCode;
			/** Index of the failing instruction, when the failure happened inside the script */
			opIndex?: number;
	  };

export class ScriptExecutionError extends Error {
	constructor(
		message: string,
		public readonly code: InterpreterErrorCode,
		public readonly opIndex?: number,
	) {
		super(message);
		this.name = "ScriptExecutionError";
	}
}
