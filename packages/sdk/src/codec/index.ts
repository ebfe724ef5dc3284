/**
 * Codec - fragment <-> script bytes
 */

export type {
	OpTokenKind,
	Token,
	TokenKind,
	Instruction,
	ScriptDecodeErrorCode,
} from "./types.js";
export { ScriptDecodeError } from "./types.js";

export { encodeFragment } from "./encoder.js";
export { decodeScript } from "./decoder.js";
export { lexScript, readInstructions } from "./lexer.js";
export { scriptToAsm } from "./asm.js";
export { MAX_PUSH_SIZE, opcodeName } from "./opcodes.js";
