import { OP } from "@scure/btc-signer";

import { OpTokenKind } from "./types.js";

/** Largest push permitted by consensus */
export const MAX_PUSH_SIZE = 520;

/**
 * Lexer mapping for the opcodes miniscript emits. Fused `*VERIFY` opcodes
 * expand to two tokens.
 */
export const OPCODE_TOKENS: ReadonlyMap<number, readonly OpTokenKind[]> = new Map<
	number,
	readonly OpTokenKind[]
>([
	[OP.BOOLAND, ["BOOLAND"]],
	[OP.BOOLOR, ["BOOLOR"]],
	[OP.ADD, ["ADD"]],
	[OP.EQUAL, ["EQUAL"]],
	[OP.EQUALVERIFY, ["EQUAL", "VERIFY"]],
	[OP.CHECKSIG, ["CHECKSIG"]],
	[OP.CHECKSIGVERIFY, ["CHECKSIG", "VERIFY"]],
	[OP.CHECKMULTISIG, ["CHECKMULTISIG"]],
	[OP.CHECKMULTISIGVERIFY, ["CHECKMULTISIG", "VERIFY"]],
	[OP.CHECKSEQUENCEVERIFY, ["CHECKSEQUENCEVERIFY"]],
	[OP.CHECKLOCKTIMEVERIFY, ["CHECKLOCKTIMEVERIFY"]],
	[OP.FROMALTSTACK, ["FROMALTSTACK"]],
	[OP.TOALTSTACK, ["TOALTSTACK"]],
	[OP.DUP, ["DUP"]],
	[OP.IF, ["IF"]],
	[OP.IFDUP, ["IFDUP"]],
	[OP.NOTIF, ["NOTIF"]],
	[OP.ELSE, ["ELSE"]],
	[OP.ENDIF, ["ENDIF"]],
	[OP["0NOTEQUAL"], ["0NOTEQUAL"]],
	[OP.SIZE, ["SIZE"]],
	[OP.SWAP, ["SWAP"]],
	[OP.VERIFY, ["VERIFY"]],
	[OP.RIPEMD160, ["RIPEMD160"]],
	[OP.HASH160, ["HASH160"]],
	[OP.SHA256, ["SHA256"]],
	[OP.HASH256, ["HASH256"]],
]);

/** Opcodes whose result a following VERIFY must be fused into */
export const VERIFY_FUSIBLE: ReadonlySet<number> = new Set<number>([
	OP.EQUAL,
	OP.CHECKSIG,
	OP.CHECKMULTISIG,
]);

/** `OP_1`..`OP_16` */
export function isSmallIntOpcode(opcode: number): boolean {
	return opcode >= 0x51 && opcode <= 0x60;
}

export function opcodeName(opcode: number): string {
	const name: string | undefined = OP[opcode];
	if (name === undefined) {
		return `OP_UNKNOWN_${opcode.toString(16).padStart(2, "0")}`;
	}
	return name.startsWith("OP_") ? name : `OP_${name}`;
}
