import { bytesToHex, decodeScriptNum } from "../utils/index.js";
import { readInstructions } from "./lexer.js";
import { isSmallIntOpcode, opcodeName } from "./opcodes.js";

/**
 * Render a script as space-separated assembly, e.g.
 * `OP_DUP OP_HASH160 <89abcdef…> OP_EQUALVERIFY OP_CHECKSIG`.
 *
 * Pushes of up to four bytes that decode as minimal numbers print as
 * decimals; other pushes print as `<hex>`.
 */
export function scriptToAsm(script: Uint8Array): string {
	return readInstructions(script)
		.map(({ opcode, data }) => {
			if (data !== undefined) {
				const value = data.length <= 4 ? decodeScriptNum(data) : undefined;
				return value === undefined ? `<${bytesToHex(data)}>` : String(value);
			}
			if (isSmallIntOpcode(opcode)) {
				return String(opcode - 0x50);
			}
			return opcodeName(opcode);
		})
		.join(" ");
}
