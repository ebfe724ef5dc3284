import { testKeyHex } from "../../test/helpers.js";
import { parseFragment } from "../fragment/index.js";
import { bytesToHex, hexToBytes } from "../utils/index.js";
import { ScriptDecodeError, decodeScript, encodeFragment, lexScript, scriptToAsm } from "./index.js";

const A = testKeyHex(1);
const B = testKeyHex(2);
const C = testKeyHex(3);
const H = "ab".repeat(32);

const encodeText = (text: string): string => bytesToHex(encodeFragment(parseFragment(text)));

function decodeError(hex: string): ScriptDecodeError {
	try {
		decodeScript(hexToBytes(hex));
	} catch (error) {
		if (error instanceof ScriptDecodeError) {
			return error;
		}
		throw error;
	}
	throw new Error(`${hex} decoded`);
}

describe("encodeFragment", () => {
	it("emits each template", () => {
		expect(encodeText(`pk(${A})`)).toBe(`21${A}ac`);
		expect(encodeText("older(144)")).toBe("029000b2");
		expect(encodeText("after(100)")).toBe("0164b1");
		expect(encodeText(`multi(2,${A},${B},${C})`)).toBe(`5221${A}21${B}21${C}53ae`);
		expect(encodeText(`sha256(${H})`)).toBe(`82012088a820${H}87`);
		expect(encodeText(`pkh(${"11".repeat(20)})`)).toBe(`76a914${"11".repeat(20)}88ac`);
	});

	it("fuses VERIFY into the opcode before it when it can", () => {
		expect(encodeText(`and_v(v:pk(${A}),older(144))`)).toBe(`21${A}ad029000b2`);
		expect(encodeText(`v:multi(1,${A})`)).toBe(`5121${A}51af`);
		expect(encodeText(`and_v(v:sha256(${H}),1)`)).toBe(`82012088a820${H}8851`);
		expect(encodeText("and_v(v:older(144),1)")).toBe("029000b26951");
	});

	it("matches the computed script size", () => {
		const fragment = parseFragment(`thresh(2,pk(${A}),s:pk(${B}),s:pk(${C}))`);
		expect(encodeFragment(fragment)).toHaveLength(fragment.ext.scriptSize);
	});
});

describe("decodeScript", () => {
	it.each([
		`pk(${A})`,
		`pkh(${"11".repeat(20)})`,
		`and_v(v:pk(${A}),older(144))`,
		`or_d(pk(${A}),and_v(v:pk(${B}),after(500000001)))`,
		`andor(pk(${A}),pk(${B}),or_i(pk(${C}),after(100)))`,
		`and_n(pk(${A}),sha256(${H}))`,
		`thresh(2,pk(${A}),s:pk(${B}),sln:older(12))`,
		`multi(2,${A},${B},${C})`,
		`or_b(pk(${A}),a:pk(${B}))`,
		`c:or_i(pk_k(${A}),pk_h(${"22".repeat(20)}))`,
		`j:and_v(v:ripemd160(${"33".repeat(20)}),pk(${A}))`,
		`or_c(pk(${A}),v:hash256(${H}))`,
		`and_b(pk(${A}),s:pk(${B}))`,
		`dv:older(5)`,
		`tv:hash160(${"44".repeat(20)})`,
	])("decodes the encoding of %s back to it", (text) => {
		const fragment = parseFragment(text);
		const decoded = decodeScript(encodeFragment(fragment));
		expect(decoded.toString()).toBe(text);
		expect(encodeFragment(decoded)).toEqual(encodeFragment(fragment));
	});

	it.each([
		["a VERIFY that should be fused", `21${A}ac69`, "NON_MINIMAL_VERIFY"],
		["PUSHDATA1 for a short push", `4c21${A}ac`, "NON_MINIMAL_PUSH"],
		["a pushed small integer", "0105b2", "NON_MINIMAL_PUSH"],
		["a padded number", "03900000b2", "NON_MINIMAL_NUMBER"],
		["a negative number", "4fb2", "NEGATIVE_NUMBER"],
		["an opcode outside the subset", "61", "INVALID_OPCODE"],
		["an uncompressed key prefix", `2104${"11".repeat(32)}ac`, "INVALID_PUSH"],
		["a truncated push", `21${"02".repeat(10)}`, "TRUNCATED"],
		["an empty script", "", "UNEXPECTED_END"],
		["a lone IF", "63", "UNEXPECTED_TOKEN"],
		["two B fragments in sequence", "5151", "TYPE_CHECK"],
	])("rejects %s", (_, hex, code) => {
		expect(decodeError(hex).code).toBe(code);
	});

	it("points at the offending opcode", () => {
		expect(decodeError(`21${A}ac69`).offset).toBe(35);
	});

	it("points at the start of a node that fails to build", () => {
		const illTyped = decodeError(`21${A}ac5151`);
		expect(illTyped.code).toBe("TYPE_CHECK");
		expect(illTyped.offset).toBe(35);

		const badTimelock = decodeError(`21${A}ad00b2`);
		expect(badTimelock.code).toBe("INVALID_VALUE");
		expect(badTimelock.offset).toBe(35);
	});
});

describe("lexScript", () => {
	it("splits fused opcodes into two tokens", () => {
		const tokens = lexScript(hexToBytes(`21${A}ad`));
		expect(tokens.map((t) => t.kind)).toEqual(["Pubkey", "CHECKSIG", "VERIFY"]);
	});
});

describe("scriptToAsm", () => {
	it("renders pushes, numbers and opcodes", () => {
		expect(scriptToAsm(encodeFragment(parseFragment(`and_v(v:pk(${A}),pk(${B}))`)))).toBe(
			`<${A}> OP_CHECKSIGVERIFY <${B}> OP_CHECKSIG`,
		);
		expect(scriptToAsm(encodeFragment(parseFragment(`multi(2,${A},${B},${C})`)))).toBe(
			`2 <${A}> <${B}> <${C}> 3 OP_CHECKMULTISIG`,
		);
		expect(scriptToAsm(hexToBytes("029000b2"))).toBe("144 OP_CHECKSEQUENCEVERIFY");
	});
});
