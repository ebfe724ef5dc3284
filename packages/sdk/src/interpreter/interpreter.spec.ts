import { fakeChecker, fakeSignature, testKey, testKeyHex } from "../../test/helpers.js";
import { encodeFragment } from "../codec/index.js";
import { compilePolicy } from "../compiler/index.js";
import { parseFragment } from "../fragment/index.js";
import { parsePolicy } from "../policy/index.js";
import { hashPreimage, keyHash } from "../primitives/index.js";
import { OracleData, createOracle, satisfy } from "../satisfier/index.js";
import { bytesToHex, hexToBytes } from "../utils/index.js";
import { SatisfiedConstraint, TransactionChecker } from "./types.js";
import { verifyWitness } from "./interpreter.js";

const A = testKeyHex(1);
const B = testKeyHex(2);
const C = testKeyHex(3);
const EMPTY = new Uint8Array(0);

const sig = (n: number) => fakeSignature(testKey(n));
const signedBy = (n: number): SatisfiedConstraint => ({ kind: "public_key", key: testKey(n), signature: sig(n) });
const script = (text: string) => encodeFragment(parseFragment(text));

describe("verifyWitness", () => {
	const checker = fakeChecker();

	describe("valid witnesses", () => {
		it("accepts a signature for pk", () => {
			expect(verifyWitness(script(`pk(${A})`), [sig(1)], checker)).toEqual({
				valid: true,
				satisfied: [signedBy(1)],
			});
		});

		it("accepts a 2-of-3 multisig with an empty dummy", () => {
			const multi = script(`multi(2,${A},${B},${C})`);
			expect(verifyWitness(multi, [EMPTY, sig(2), sig(3)], checker)).toEqual({
				valid: true,
				satisfied: [signedBy(2), signedBy(3)],
			});
		});

		it("accepts a thresh with one dissatisfied key", () => {
			const thresh = script(`thresh(2,pk(${A}),s:pk(${B}),s:pk(${C}))`);
			expect(verifyWitness(thresh, [sig(3), sig(2), EMPTY], checker)).toEqual({
				valid: true,
				satisfied: [signedBy(2), signedBy(3)],
			});
		});

		it("follows both branches of andor", () => {
			const andor = script(`andor(pk(${A}),pk(${B}),older(144))`);
			expect(verifyWitness(andor, [EMPTY], fakeChecker({ sequence: 144 }))).toEqual({
				valid: true,
				satisfied: [{ kind: "older", value: 144 }],
			});
			expect(verifyWitness(andor, [sig(2), sig(1)], checker)).toEqual({
				valid: true,
				satisfied: [signedBy(1), signedBy(2)],
			});
		});

		it("checks a preimage against its digest", () => {
			const preimage = new Uint8Array(32).fill(7);
			const digest = hashPreimage("sha256", preimage);
			const hashlock = script(`sha256(${bytesToHex(digest)})`);
			expect(verifyWitness(hashlock, [preimage], checker)).toEqual({
				valid: true,
				satisfied: [{ kind: "hash_lock", fn: "sha256", hash: digest, preimage }],
			});
			expect(verifyWitness(hashlock, [new Uint8Array(32)], checker)).toEqual({
				valid: false,
				error: "EVAL_FALSE",
				opIndex: 6,
			});
		});

		it("adds negative numbers", () => {
			const add = Uint8Array.of(0x93);
			expect(verifyWitness(add, [Uint8Array.of(0x81), Uint8Array.of(0x81)], checker)).toEqual({
				valid: true,
				satisfied: [],
			});
		});

		it("consults the checker for timelocks", () => {
			const calls: number[] = [];
			const recording: TransactionChecker = {
				...checker,
				checkAfter: (value) => {
					calls.push(value);
					return true;
				},
			};
			expect(verifyWitness(script("after(100)"), [], recording)).toEqual({
				valid: true,
				satisfied: [{ kind: "after", value: 100 }],
			});
			expect(calls).toEqual([100]);
		});
	});

	describe("satisfied conditions", () => {
		const preimage = new Uint8Array(32).fill(9);
		const digest = hashPreimage("sha256", preimage);

		it("reports a key hash once, with the key and its signature", () => {
			const hashOfA = keyHash(testKey(1));
			const fragment = script(`and_v(v:pkh(${bytesToHex(hashOfA)}),sha256(${bytesToHex(digest)}))`);
			expect(verifyWitness(fragment, [preimage, sig(1), testKey(1)], checker)).toEqual({
				valid: true,
				satisfied: [
					{ kind: "key_hash", hash: hashOfA, key: testKey(1), signature: sig(1) },
					{ kind: "hash_lock", fn: "sha256", hash: digest, preimage },
				],
			});
		});

		it("leaves out dissatisfied branches", () => {
			const orD = script(`or_d(pk(${A}),and_v(v:pk(${B}),older(144)))`);
			expect(verifyWitness(orD, [sig(2), EMPTY], fakeChecker({ sequence: 144 }))).toEqual({
				valid: true,
				satisfied: [signedBy(2), { kind: "older", value: 144 }],
			});
		});

		const compiled: [string, string, OracleData, SatisfiedConstraint[]][] = [
			[
				"a signature and a preimage",
				`and(pk(${A}),sha256(${bytesToHex(digest)}))`,
				{ signatures: { [A]: sig(1) }, preimages: [preimage] },
				[signedBy(1), { kind: "hash_lock", fn: "sha256", hash: digest, preimage }],
			],
			[
				"the timelocked branch",
				`or(9@pk(${A}),1@and(pk(${B}),older(144)))`,
				{ signatures: { [B]: sig(2) }, sequence: 144 },
				[signedBy(2), { kind: "older", value: 144 }],
			],
			[
				"two of three keys",
				`thresh(2,pk(${A}),pk(${B}),pk(${C}))`,
				{ signatures: { [A]: sig(1), [C]: sig(3) } },
				[signedBy(1), signedBy(3)],
			],
		];

		it.each(compiled)("matches what the satisfier used for %s", (_, policy, data, expected) => {
			const fragment = compilePolicy(parsePolicy(policy));
			const result = satisfy(fragment, createOracle(data));
			if (result.status !== "satisfied") {
				throw new Error(`${policy} was not satisfied`);
			}
			const verified = verifyWitness(encodeFragment(fragment), result.witness, fakeChecker(data));
			if (!verified.valid) {
				throw new Error(`${policy} failed with ${verified.error}`);
			}
			expect(verified.satisfied).toHaveLength(expected.length);
			expect(verified.satisfied).toEqual(expect.arrayContaining(expected));
		});
	});

	describe("failures", () => {
		it.each([
			["a signature by another key", `pk(${A})`, [sig(2)], "NULLFAIL", 1],
			["a missing signature", `pk(${A})`, [], "INVALID_STACK_OPERATION", 1],
			["an empty signature", `pk(${A})`, [EMPTY], "EVAL_FALSE", 2],
			["an extra stack item", `pk(${A})`, [Uint8Array.of(7), sig(1)], "CLEANSTACK", 2],
			["a non-minimal IF argument", `or_i(pk(${A}),pk(${B}))`, [sig(1), Uint8Array.of(2)], "MINIMALIF", 0],
			["a non-empty multisig dummy", `multi(2,${A},${B},${C})`, [Uint8Array.of(1), sig(2), sig(3)], "SIG_NULLDUMMY", 5],
			["signatures out of key order", `multi(2,${A},${B},${C})`, [EMPTY, sig(3), sig(2)], "NULLFAIL", 5],
			["a failed CHECKSIGVERIFY", `and_v(v:pk(${A}),pk(${B}))`, [sig(2), EMPTY], "CHECKSIGVERIFY", 1],
		])("rejects %s", (_, text, witness, error, opIndex) => {
			expect(verifyWitness(script(text), witness, checker)).toEqual({ valid: false, error, opIndex });
		});

		it("rejects an unmet relative timelock", () => {
			expect(verifyWitness(script("older(144)"), [], fakeChecker({ sequence: 100 }))).toEqual({
				valid: false,
				error: "UNSATISFIED_LOCKTIME",
				opIndex: 1,
			});
		});

		it("evaluates a dissatisfaction to false", () => {
			const orD = script(`or_d(pk(${A}),sha256(${"ab".repeat(32)}))`);
			expect(verifyWitness(orD, [new Uint8Array(32), EMPTY], checker)).toMatchObject({
				valid: false,
				error: "EVAL_FALSE",
			});
		});

		it("rejects oversized witness items before running", () => {
			expect(verifyWitness(script(`pk(${A})`), [new Uint8Array(521)], checker)).toEqual({
				valid: false,
				error: "PUSH_SIZE",
			});
		});

		it.each([
			["an unsupported opcode", "61", [], "BAD_OPCODE", 0],
			["a lone ENDIF", "68", [], "UNBALANCED_CONDITIONAL", 0],
			["a missing ENDIF", "63", [Uint8Array.of(1)], "UNBALANCED_CONDITIONAL", 1],
			["a non-minimal number", "93", [Uint8Array.of(1, 0), Uint8Array.of(1)], "MINIMALDATA", 0],
			["an oversized number", "93", [new Uint8Array(5).fill(1), Uint8Array.of(1)], "NUMBER_OVERFLOW", 0],
			["an empty alt stack", "6c", [Uint8Array.of(1)], "INVALID_ALTSTACK_OPERATION", 0],
			["negative zero", "", [Uint8Array.of(0x80)], "EVAL_FALSE", 0],
		])("rejects %s", (_, hex, witness, error, opIndex) => {
			expect(verifyWitness(hexToBytes(hex), witness, checker)).toEqual({ valid: false, error, opIndex });
		});

		it("reports a truncated push as malformed", () => {
			expect(verifyWitness(hexToBytes("4c"), [], checker)).toEqual({
				valid: false,
				error: "MALFORMED_SCRIPT",
			});
		});
	});
});
