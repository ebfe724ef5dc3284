/**
 * Script codec types
 */

/** Opcodes of the miniscript subset, as named in the `OP` table */
export type OpTokenKind =
	| "BOOLAND"
	| "BOOLOR"
	| "ADD"
	| "EQUAL"
	| "CHECKSIG"
	| "CHECKMULTISIG"
	| "CHECKSEQUENCEVERIFY"
	| "CHECKLOCKTIMEVERIFY"
	| "FROMALTSTACK"
	| "TOALTSTACK"
	| "DUP"
	| "IF"
	| "IFDUP"
	| "NOTIF"
	| "ELSE"
	| "ENDIF"
	| "0NOTEQUAL"
	| "SIZE"
	| "SWAP"
	| "VERIFY"
	| "RIPEMD160"
	| "HASH160"
	| "SHA256"
	| "HASH256";

/**
 * Lexical unit of a script. `*VERIFY` opcodes are split into the base
 * opcode followed by `VERIFY`; pushes are classified by length.
 */
export type Token =
	| { kind: OpTokenKind; offset: number }
	| { kind: "Num"; value: number; offset: number }
	| { kind: "Hash20" | "Hash32" | "Pubkey"; data: Uint8Array; offset: number };

export type TokenKind = Token["kind"];

/** A raw opcode with its push payload, if any */
export interface Instruction {
	opcode: number;
	data?: Uint8Array;
	offset: number;
}

export type ScriptDecodeErrorCode =
	| "TRUNCATED"
	| "NON_MINIMAL_PUSH"
	| "NON_MINIMAL_NUMBER"
	| "NON_MINIMAL_VERIFY"
	| "NEGATIVE_NUMBER"
	| "INVALID_PUSH"
	| "INVALID_OPCODE"
	| "UNEXPECTED_TOKEN"
	| "UNEXPECTED_END"
	| "TOO_MANY_KEYS"
	| "TYPE_CHECK"
	| "INVALID_VALUE";

/**
 * Raised for malformed, non-canonical or ill-typed scripts. `offset` is the
 * byte position of the offending opcode.
 */
export class ScriptDecodeError extends Error {
	constructor(
		message: string,
		public readonly code: ScriptDecodeErrorCode,
		public readonly offset: number,
		cause?: unknown,
	) {
		super(message, { cause });
		this.name = "ScriptDecodeError";
	}
}
