import { fakeChecker, fakeSignature, mockOracle, testKey, testKeyHex } from "../../test/helpers.js";
import { encodeFragment } from "../codec/index.js";
import { compilePolicy } from "../compiler/index.js";
import { Fragment, parseFragment } from "../fragment/index.js";
import { verifyWitness } from "../interpreter/index.js";
import { isPolicySatisfied, parsePolicy } from "../policy/index.js";
import { hashPreimage, keyHash } from "../primitives/index.js";
import { bytesEqual, bytesToHex } from "../utils/index.js";
import {
	OracleData,
	SatisfactionResult,
	Satisfier,
	SatisfierError,
	combineOracles,
	createOracle,
	satisfy,
} from "./index.js";

const A = testKeyHex(1);
const B = testKeyHex(2);
const C = testKeyHex(3);
const EMPTY = new Uint8Array(0);

const P1 = new Uint8Array(32).fill(7);
const P2 = new Uint8Array(32).fill(8);
const H1 = bytesToHex(hashPreimage("sha256", P1));
const H2 = bytesToHex(hashPreimage("sha256", P2));

const sig = (n: number) => fakeSignature(testKey(n));

function signaturesFor(...ns: number[]): Record<string, Uint8Array> {
	return Object.fromEntries(ns.map((n) => [testKeyHex(n), sig(n)]));
}

function* sequences(alphabet: readonly Uint8Array[], length: number): Generator<Uint8Array[]> {
	if (length === 0) {
		yield [];
		return;
	}
	for (const rest of sequences(alphabet, length - 1)) {
		for (const item of alphabet) {
			yield [...rest, item];
		}
	}
}

function witnessOf(result: SatisfactionResult): Uint8Array[] {
	if (result.status !== "satisfied") {
		throw new Error(`Expected a witness, got ${result.reason}`);
	}
	return result.witness;
}

describe("Satisfier", () => {
	describe("weighted recovery path", () => {
		const fragment = compilePolicy(`or(1@and(pk(${A}),pk(${B})),9@older(144))`);

		it("compiles to an andor over the two keys", () => {
			expect(fragment.toString()).toBe(`andor(pk(${A}),pk(${B}),older(144))`);
		});

		it("uses the timelock branch when only the timelock is met", () => {
			const oracle = mockOracle({
				isTimelockSatisfied: (kind, value) => kind === "older" && value <= 144,
			});
			expect(satisfy(fragment, oracle)).toEqual({ status: "satisfied", witness: [EMPTY], size: 1 });
			expect(oracle.isTimelockSatisfied).toHaveBeenCalledWith("older", 144);
		});

		it("uses both signatures when the timelock is not met", () => {
			const oracle = createOracle({ signatures: signaturesFor(1, 2), sequence: 10 });
			expect(witnessOf(satisfy(fragment, oracle))).toEqual([sig(2), sig(1)]);
		});

		it("prefers the signature-free branch when both are possible", () => {
			const oracle = createOracle({ signatures: signaturesFor(1, 2), sequence: 144 });
			expect(witnessOf(satisfy(fragment, oracle))).toEqual([EMPTY]);
		});

		it("reports an impossible spend when neither branch can be met", () => {
			expect(satisfy(fragment, mockOracle())).toEqual({ status: "unsatisfiable", reason: "impossible" });
		});
	});

	describe("2-of-3", () => {
		const holdsBAndC = () =>
			mockOracle({
				lookupSignature: (key) =>
					bytesEqual(key, testKey(2)) || bytesEqual(key, testKey(3))
						? fakeSignature(key)
						: undefined,
			});

		it("selects the two available signatures of a multisig", () => {
			const fragment = compilePolicy(`thresh(2,pk(${A}),pk(${B}),pk(${C}))`);
			const oracle = holdsBAndC();
			expect(satisfy(fragment, oracle)).toEqual({
				status: "satisfied",
				witness: [EMPTY, sig(2), sig(3)],
				size: 147,
			});
			expect(oracle.lookupSignature).toHaveBeenCalledTimes(3);
			expect(oracle.isTimelockSatisfied).not.toHaveBeenCalled();
		});

		it("dissatisfies the missing key of a thresh", () => {
			const fragment = parseFragment(`thresh(2,pk(${A}),s:pk(${B}),s:pk(${C}))`);
			expect(witnessOf(satisfy(fragment, holdsBAndC()))).toEqual([sig(3), sig(2), EMPTY]);
		});

		it("keeps the smaller surplus signatures of a multisig", () => {
			const fragment = parseFragment(`multi(1,${A},${B})`);
			const short = sig(2).subarray(0, 71);
			const oracle = createOracle({ signatures: { [A]: sig(1), [B]: short } });
			expect(witnessOf(satisfy(fragment, oracle))).toEqual([EMPTY, short]);
		});

		it("fails with fewer signatures than the threshold", () => {
			const fragment = parseFragment(`multi(2,${A},${B},${C})`);
			const oracle = createOracle({ signatures: signaturesFor(3) });
			expect(satisfy(fragment, oracle)).toEqual({ status: "unsatisfiable", reason: "impossible" });
		});
	});

	describe("disjunctions", () => {
		it("dissatisfies the left side of or_b", () => {
			const fragment = parseFragment(`or_b(pk(${A}),s:pk(${B}))`);
			const oracle = createOracle({ signatures: signaturesFor(2) });
			expect(witnessOf(satisfy(fragment, oracle))).toEqual([sig(2), EMPTY]);
		});

		it("falls through or_d to a hashlock", () => {
			const fragment = parseFragment(`or_d(pk(${A}),sha256(${H1}))`);
			const oracle = createOracle({ preimages: [P1] });
			expect(witnessOf(satisfy(fragment, oracle))).toEqual([P1, EMPTY]);
		});

		it("refuses to choose between two signature-free branches", () => {
			const fragment = parseFragment(`or_i(sha256(${H1}),sha256(${H2}))`);
			const oracle = createOracle({ preimages: [P1, P2] });
			expect(satisfy(fragment, oracle)).toEqual({ status: "unsatisfiable", reason: "unavailable" });
		});

		it("takes the cheaper branch when malleable witnesses are allowed", () => {
			const fragment = parseFragment(`or_i(sha256(${H1}),sha256(${H2}))`);
			const oracle = createOracle({ preimages: [P1, P2] });
			expect(satisfy(fragment, oracle, { allowMalleable: true })).toEqual({
				status: "satisfied",
				witness: [P2, EMPTY],
				size: 34,
			});
		});

		it("uses the only available branch of or_i", () => {
			const fragment = parseFragment(`or_i(sha256(${H1}),sha256(${H2}))`);
			const oracle = createOracle({ preimages: [P1] });
			expect(witnessOf(satisfy(fragment, oracle))).toEqual([P1, Uint8Array.of(1)]);
		});
	});

	describe("dissatisfaction", () => {
		it("pushes zero bytes of preimage size for a hashlock", () => {
			const satisfier = new Satisfier(mockOracle());
			const dissat = satisfier.dissat(parseFragment(`or_d(pk(${A}),sha256(${H1}))`));
			expect(dissat).toEqual({
				stack: { kind: "stack", items: [new Uint8Array(32), EMPTY] },
				hasSig: false,
			});
		});

		it("has none for a verify wrapper", () => {
			const satisfier = new Satisfier(mockOracle());
			expect(satisfier.dissat(parseFragment(`v:pk(${A})`)).stack).toEqual({ kind: "impossible" });
		});
	});

	describe("key hashes", () => {
		const hashA = bytesToHex(keyHash(testKey(1)));

		it("reveals the key after the signature", () => {
			const fragment = parseFragment(`pkh(${hashA})`);
			const oracle = createOracle({ signatures: signaturesFor(1) });
			expect(witnessOf(satisfy(fragment, oracle))).toEqual([sig(1), testKey(1)]);
		});

		it("is impossible with the key but no signature", () => {
			const fragment = parseFragment(`pkh(${hashA})`);
			const oracle = createOracle({ publicKeys: [testKey(1)] });
			expect(satisfy(fragment, oracle)).toEqual({ status: "unsatisfiable", reason: "impossible" });
		});

		it("is impossible to satisfy when the key is unknown", () => {
			const fragment = parseFragment(`pkh(${hashA})`);
			const oracle = createOracle({ signatures: signaturesFor(2, 3) });
			expect(satisfy(fragment, oracle)).toEqual({ status: "unsatisfiable", reason: "impossible" });
			expect(new Satisfier(oracle).sat(fragment)).toEqual({ stack: { kind: "impossible" }, hasSig: true });
		});

		it("needs the key to dissatisfy", () => {
			const fragment = parseFragment(`or_d(pkh(${hashA}),pk(${B}))`);
			const withKey = createOracle({ signatures: signaturesFor(2), publicKeys: [testKey(1)] });
			expect(witnessOf(satisfy(fragment, withKey))).toEqual([sig(2), EMPTY, testKey(1)]);

			const withoutKey = createOracle({ signatures: signaturesFor(2) });
			expect(satisfy(fragment, withoutKey)).toEqual({ status: "unsatisfiable", reason: "unavailable" });
		});
	});

	describe("compiled policies", () => {
		const keys = [1, 2, 3];
		const cases: [string, boolean][] = [
			[`pk(${A})`, true],
			[`and(pk(${A}),pk(${B}))`, true],
			[`or(pk(${A}),pk(${B}))`, true],
			[`thresh(2,pk(${A}),pk(${B}),pk(${C}))`, true],
			[`or(pk(${A}),and(pk(${B}),pk(${C})))`, true],
			[`or(1@and(pk(${A}),pk(${B})),9@older(144))`, false],
			[`and(pk(${A}),or(pk(${B}),after(100)))`, false],
			[`thresh(2,pk(${A}),pk(${B}),older(144))`, false],
			[`or(9@pk(${A}),1@and(pk(${B}),older(144)))`, false],
		];

		it.each(cases)("produces valid witnesses for %s", (text, keysOnly) => {
			const policy = parsePolicy(text);
			const fragment = compilePolicy(policy);
			const script = encodeFragment(fragment);

			for (let mask = 0; mask < 8; mask++) {
				const held = keys.filter((_, i) => (mask & (1 << i)) !== 0);
				for (const met of [false, true]) {
					const tx = { sequence: met ? 144 : 0, lockTime: met ? 100 : 0 };
					const result = satisfy(fragment, createOracle({ signatures: signaturesFor(...held), ...tx }));
					const expected = isPolicySatisfied(policy, { keys: held.map(testKeyHex), ...tx });

					if (result.status === "satisfied") {
						expect(expected).toBe(true);
						expect(verifyWitness(script, result.witness, fakeChecker(tx))).toMatchObject({ valid: true });
					} else if (keysOnly) {
						expect(expected).toBe(false);
					}
				}
			}
		});
	});
});

describe("non-malleability", () => {
	// Every witness a third party could assemble from the revealed items,
	// an empty push and 0x01, up to one item longer than the original.
	function validAlternatives(fragment: Fragment, witness: Uint8Array[], tx: { sequence?: number }) {
		const alphabet = new Map<string, Uint8Array>();
		for (const item of [EMPTY, Uint8Array.of(1), ...witness]) {
			alphabet.set(bytesToHex(item), item);
		}
		const script = encodeFragment(fragment);
		const valid: Uint8Array[][] = [];
		for (let length = 0; length <= witness.length + 1; length++) {
			for (const candidate of sequences([...alphabet.values()], length)) {
				if (verifyWitness(script, candidate, fakeChecker(tx)).valid) {
					valid.push(candidate);
				}
			}
		}
		return valid;
	}

	it.each([
		["andor with both signatures", `andor(pk(${A}),pk(${B}),older(144))`, signaturesFor(1, 2), 10],
		["andor with the timelock met", `andor(pk(${A}),pk(${B}),older(144))`, signaturesFor(), 144],
		["a 2-of-3 multisig", `multi(2,${A},${B},${C})`, signaturesFor(2, 3), 0],
		["or_b with the right key", `or_b(pk(${A}),s:pk(${B}))`, signaturesFor(2), 0],
	])("leaves no alternative witness for %s", (_, text, signatures, sequence) => {
		const fragment = parseFragment(text);
		const witness = witnessOf(satisfy(fragment, createOracle({ signatures, sequence })));
		expect(validAlternatives(fragment, witness, { sequence })).toEqual([witness]);
	});

	it("leaves no alternative witness for a hashlock fallback", () => {
		const fragment = parseFragment(`or_d(pk(${A}),sha256(${H1}))`);
		const witness = witnessOf(satisfy(fragment, createOracle({ preimages: [P1] })));
		expect(validAlternatives(fragment, witness, {})).toEqual([witness]);
	});
});

describe("createOracle", () => {
	it("answers from the data it was given", () => {
		const oracle = createOracle({
			signatures: signaturesFor(1),
			preimages: [P1],
			sequence: 144,
			lockTime: 500_000_100,
		});
		expect(oracle.lookupSignature(testKey(1))).toEqual(sig(1));
		expect(oracle.lookupSignature(testKey(2))).toBeUndefined();
		expect(oracle.lookupPublicKey?.(keyHash(testKey(1)))).toEqual(testKey(1));
		expect(oracle.lookupPreimage("sha256", hashPreimage("sha256", P1))).toEqual(P1);
		expect(oracle.lookupPreimage("hash160", hashPreimage("hash160", P1))).toEqual(P1);
		expect(oracle.lookupPreimage("sha256", hashPreimage("hash256", P1))).toBeUndefined();
		expect(oracle.isTimelockSatisfied("older", 144)).toBe(true);
		expect(oracle.isTimelockSatisfied("older", 145)).toBe(false);
		expect(oracle.isTimelockSatisfied("after", 500_000_000)).toBe(true);
		expect(oracle.isTimelockSatisfied("after", 100)).toBe(false);
	});

	it("meets no timelock without transaction fields", () => {
		const oracle = createOracle({});
		expect(oracle.isTimelockSatisfied("older", 1)).toBe(false);
		expect(oracle.isTimelockSatisfied("after", 1)).toBe(false);
	});

	const invalid: [string, OracleData][] = [
		["a malformed signature key", { signatures: { zz: sig(1) } }],
		["a short preimage", { preimages: [new Uint8Array(31)] }],
		["a malformed public key", { publicKeys: [new Uint8Array(20)] }],
		["a negative sequence", { sequence: -1 }],
		["an oversized lock time", { lockTime: 2 ** 32 }],
	];

	it.each(invalid)("rejects %s", (_, data) => {
		let thrown: unknown;
		try {
			createOracle(data);
		} catch (error) {
			thrown = error;
		}
		expect(thrown).toBeInstanceOf(SatisfierError);
		expect(thrown).toMatchObject({ code: "INVALID_ORACLE_DATA" });
	});
});

describe("combineOracles", () => {
	it("takes each answer from the first oracle that has one", () => {
		const fragment: Fragment = parseFragment(`and_v(v:pk(${A}),sha256(${H1}))`);
		const combined = combineOracles(
			createOracle({ signatures: signaturesFor(1) }),
			createOracle({ preimages: [P1] }),
		);
		expect(witnessOf(satisfy(fragment, combined))).toEqual([P1, sig(1)]);
	});

	it("meets a timelock any oracle meets", () => {
		const combined = combineOracles(createOracle({}), createOracle({ sequence: 10 }));
		expect(combined.isTimelockSatisfied("older", 10)).toBe(true);
		expect(combined.isTimelockSatisfied("after", 10)).toBe(false);
	});
});
