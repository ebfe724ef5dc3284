/**
 * Script lexer
 *
 * Splits raw script bytes into instructions and then into tokens, rejecting
 * every encoding that is not the single canonical one: non-minimal pushes
 * and numbers, negative numbers, opcodes outside the miniscript subset and
 * a VERIFY that should have been fused into the preceding opcode.
 */

import { OP } from "@scure/btc-signer";

import { isValidPublicKey } from "../primitives/index.js";
import { decodeScriptNum } from "../utils/index.js";
import {
	MAX_PUSH_SIZE,
	OPCODE_TOKENS,
	VERIFY_FUSIBLE,
	isSmallIntOpcode,
	opcodeName,
} from "./opcodes.js";
import { Instruction, ScriptDecodeError, Token } from "./types.js";

function readLength(script: Uint8Array, offset: number, width: number): number {
	if (offset + width > script.length) {
		throw new ScriptDecodeError("Push length runs past end of script", "TRUNCATED", offset);
	}
	let length = 0;
	for (let i = width - 1; i >= 0; i--) {
		length = length * 256 + script[offset + i];
	}
	return length;
}

/**
 * Split a script into opcodes and push payloads, enforcing minimal pushes.
 */
export function readInstructions(script: Uint8Array): Instruction[] {
	const instructions: Instruction[] = [];
	let i = 0;
	while (i < script.length) {
		const offset = i;
		const opcode = script[i++];
		let length: number | undefined;
		let minimum = 0;
		if (opcode > OP.OP_0 && opcode < OP.PUSHDATA1) {
			length = opcode;
		} else if (opcode === OP.PUSHDATA1) {
			length = readLength(script, i, 1);
			i += 1;
			minimum = OP.PUSHDATA1;
		} else if (opcode === OP.PUSHDATA2) {
			length = readLength(script, i, 2);
			i += 2;
			minimum = 0x100;
		} else if (opcode === OP.PUSHDATA4) {
			length = readLength(script, i, 4);
			i += 4;
			minimum = 0x10000;
		}
		if (length === undefined) {
			instructions.push({ opcode, offset });
			continue;
		}
		if (length < minimum) {
			throw new ScriptDecodeError(
				`${length}-byte push uses ${opcodeName(opcode)}`,
				"NON_MINIMAL_PUSH",
				offset,
			);
		}
		if (i + length > script.length) {
			throw new ScriptDecodeError("Push runs past end of script", "TRUNCATED", offset);
		}
		const data = script.slice(i, i + length);
		i += length;
		if (length === 1 && ((data[0] >= 1 && data[0] <= 16) || data[0] === 0x81)) {
			throw new ScriptDecodeError(
				`Push of 0x${data[0].toString(16)} must use a small-integer opcode`,
				"NON_MINIMAL_PUSH",
				offset,
			);
		}
		instructions.push({ opcode, data, offset });
	}
	return instructions;
}

function classifyPush(data: Uint8Array, offset: number): Token {
	if (data.length > MAX_PUSH_SIZE) {
		throw new ScriptDecodeError(
			`Push of ${data.length} bytes exceeds ${MAX_PUSH_SIZE}`,
			"INVALID_PUSH",
			offset,
		);
	}
	switch (data.length) {
		case 33:
			if (!isValidPublicKey(data)) {
				throw new ScriptDecodeError(
					"33-byte push is not a compressed public key",
					"INVALID_PUSH",
					offset,
				);
			}
			return { kind: "Pubkey", data, offset };
		case 32:
			return { kind: "Hash32", data, offset };
		case 20:
			return { kind: "Hash20", data, offset };
	}
	if (data.length > 4) {
		throw new ScriptDecodeError(`Unexpected ${data.length}-byte push`, "INVALID_PUSH", offset);
	}
	const value = decodeScriptNum(data);
	if (value === undefined) {
		throw new ScriptDecodeError("Number is not minimally encoded", "NON_MINIMAL_NUMBER", offset);
	}
	if (value < 0) {
		throw new ScriptDecodeError(`Negative number ${value}`, "NEGATIVE_NUMBER", offset);
	}
	return { kind: "Num", value, offset };
}

/**
 * Tokenize a script for the decoder.
 *
 * @throws ScriptDecodeError on any non-canonical or unsupported encoding
 */
export function lexScript(script: Uint8Array): Token[] {
	const tokens: Token[] = [];
	let previous: number | undefined;
	for (const { opcode, data, offset } of readInstructions(script)) {
		if (data !== undefined) {
			tokens.push(classifyPush(data, offset));
		} else if (opcode === OP.OP_0) {
			tokens.push({ kind: "Num", value: 0, offset });
		} else if (isSmallIntOpcode(opcode)) {
			tokens.push({ kind: "Num", value: opcode - 0x50, offset });
		} else if (opcode === OP["1NEGATE"]) {
			throw new ScriptDecodeError("Negative number -1", "NEGATIVE_NUMBER", offset);
		} else {
			const kinds = OPCODE_TOKENS.get(opcode);
			if (kinds === undefined) {
				throw new ScriptDecodeError(
					`${opcodeName(opcode)} is not part of the miniscript subset`,
					"INVALID_OPCODE",
					offset,
				);
			}
			if (opcode === OP.VERIFY && previous !== undefined && VERIFY_FUSIBLE.has(previous)) {
				throw new ScriptDecodeError(
					`${opcodeName(previous)} VERIFY must be encoded as ${opcodeName(previous)}VERIFY`,
					"NON_MINIMAL_VERIFY",
					offset,
				);
			}
			for (const kind of kinds) {
				tokens.push({ kind, offset });
			}
		}
		previous = opcode;
	}
	return tokens;
}
