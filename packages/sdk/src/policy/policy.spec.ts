import { testKey, testKeyHex } from "../../test/helpers.js";
import { parseFragment } from "../fragment/index.js";
import { hashPreimage, keyHash } from "../primitives/index.js";
import { bytesToHex } from "../utils/index.js";
import {
	Policy,
	PolicyError,
	PolicyParseError,
	isPolicySatisfied,
	liftFragment,
	parsePolicy,
	policyLeaves,
	policyToString,
	preimageDigests,
	validatePolicy,
} from "./index.js";

const A = testKeyHex(1);
const B = testKeyHex(2);
const C = testKeyHex(3);

function parseError(text: string): PolicyParseError {
	try {
		parsePolicy(text);
	} catch (error) {
		if (error instanceof PolicyParseError) {
			return error;
		}
		throw error;
	}
	throw new Error(`${text} parsed`);
}

describe("parsePolicy", () => {
	it("builds the policy tree", () => {
		expect(parsePolicy(`or(9@pk(${A}),and(pk(${B}),older(144)))`)).toEqual({
			kind: "or",
			branches: [
				{ weight: 9, policy: { kind: "key", key: testKey(1) } },
				{
					weight: 1,
					policy: {
						kind: "and",
						subs: [
							{ kind: "key", key: testKey(2) },
							{ kind: "older", value: 144 },
						],
					},
				},
			],
		});
	});

	it.each([
		`pk(${A})`,
		`pkh(${"11".repeat(20)})`,
		"after(500000001)",
		`hash160(${"22".repeat(20)})`,
		`or(9@pk(${A}),and(pk(${B}),older(144)))`,
		`thresh(2,pk(${A}),pk(${B}),sha256(${"33".repeat(32)}))`,
		"UNSATISFIABLE",
		"TRIVIAL",
	])("prints %s back unchanged", (text) => {
		expect(policyToString(parsePolicy(text))).toBe(text);
	});

	it("omits unit weights when printing", () => {
		expect(policyToString(parsePolicy(`or(1@pk(${A}),pk(${B}))`))).toBe(`or(pk(${A}),pk(${B}))`);
	});

	it("reports unknown names and syntax errors with spans", () => {
		expect(parseError("foo(1)")).toMatchObject({ code: "UNKNOWN_POLICY", span: { start: 0, end: 3 } });
		expect(parseError(`pk(${A}`)).toMatchObject({ code: "SYNTAX" });
		expect(parseError("and(after(1),after(2)) x")).toMatchObject({
			code: "SYNTAX",
			span: { start: 23, end: 24 },
		});
	});

	it("reports invalid arguments against the offending call", () => {
		const text = `and(pk(${A}),thresh(3,pk(${B}),pk(${C})))`;
		const error = parseError(text);
		const start = text.indexOf("thresh");
		expect(error).toMatchObject({
			code: "INVALID_ARGUMENT",
			span: { start, end: text.length - 1 },
		});
		expect(error.cause).toBeInstanceOf(PolicyError);
		expect(error.cause).toMatchObject({ code: "INVALID_THRESHOLD" });

		expect(parseError("older(0)")).toMatchObject({ span: { start: 0, end: 8 } });
		expect(parseError(`or(0@pk(${A}),pk(${B}))`).cause).toMatchObject({ code: "INVALID_WEIGHT" });
		expect(parseError(`and(pk(${A}))`).cause).toMatchObject({ code: "INVALID_ARITY" });
		expect(parseError("sha256(abcd)").cause).toMatchObject({ code: "INVALID_DIGEST" });
		expect(parseError("pk(zz)")).toMatchObject({ span: { start: 3, end: 5 } });
	});

	it("rejects a key used twice anywhere in the tree", () => {
		const text = `or(pk(${A}),and(pk(${B}),pk(${A})))`;
		const error = parseError(text);
		expect(error.span).toEqual({ start: 0, end: text.length });
		expect(error.cause).toMatchObject({ code: "DUPLICATE_KEY" });
	});
});

describe("validatePolicy", () => {
	it("checks policies built in code", () => {
		const bad: Policy = { kind: "key", key: new Uint8Array(33) };
		expect(() => validatePolicy(bad)).toThrow(expect.objectContaining({ code: "INVALID_KEY" }));
		const unweighted: Policy = {
			kind: "or",
			branches: [
				{ weight: 1.5, policy: { kind: "trivial" } },
				{ weight: 1, policy: { kind: "trivial" } },
			],
		};
		expect(() => validatePolicy(unweighted)).toThrow(expect.objectContaining({ code: "INVALID_WEIGHT" }));
	});

	it("treats a key and the hash of that key as one key", () => {
		const hashOfA = bytesToHex(keyHash(testKey(1)));
		const text = `and(pk(${A}),pkh(${hashOfA}))`;
		expect(parseError(text).cause).toMatchObject({ code: "DUPLICATE_KEY", details: { key: hashOfA } });

		const built: Policy = {
			kind: "and",
			subs: [
				{ kind: "key_hash", hash: keyHash(testKey(2)) },
				{ kind: "key", key: testKey(2) },
			],
		};
		expect(() => validatePolicy(built)).toThrow(
			expect.objectContaining({ code: "DUPLICATE_KEY", details: { key: B } }),
		);
		expect(validatePolicy(parsePolicy(`and(pk(${A}),pkh(${bytesToHex(keyHash(testKey(2)))}))`)).kind).toBe("and");
	});
});

describe("liftFragment", () => {
	it.each([
		[`andor(pk(${A}),pk(${B}),older(144))`, `or(and(pk(${A}),pk(${B})),older(144))`],
		[`tv:pk(${A})`, `pk(${A})`],
		[`l:pk(${A})`, `pk(${A})`],
		[`multi(2,${A},${B})`, `thresh(2,pk(${A}),pk(${B}))`],
		[`and_v(v:pk(${A}),and_v(v:pk(${B}),pk(${C})))`, `and(pk(${A}),pk(${B}),pk(${C}))`],
		[`or_d(pk(${A}),or_d(pk(${B}),pk(${C})))`, `or(pk(${A}),pk(${B}),pk(${C}))`],
		[`and_n(pk(${A}),older(1))`, `and(pk(${A}),older(1))`],
	])("lifts %s", (text, policy) => {
		expect(policyToString(liftFragment(parseFragment(text)))).toBe(policy);
	});
});

describe("semantics", () => {
	const policy = parsePolicy(`or(pk(${A}),and(pk(${B}),older(144)))`);

	it("evaluates against available capabilities", () => {
		expect(isPolicySatisfied(policy, { keys: [A] })).toBe(true);
		expect(isPolicySatisfied(policy, { keys: [B], sequence: 144 })).toBe(true);
		expect(isPolicySatisfied(policy, { keys: [B], sequence: 10 })).toBe(false);
		expect(isPolicySatisfied(policy, { keys: [B.toUpperCase()], sequence: 200 })).toBe(true);
	});

	it("counts a held key for its hash", () => {
		const pkh = parsePolicy(`pkh(${bytesToHex(keyHash(testKey(3)))})`);
		expect(isPolicySatisfied(pkh, { keys: [C] })).toBe(true);
		expect(isPolicySatisfied(pkh, { keys: [A] })).toBe(false);
	});

	it("checks thresholds and absolute locks", () => {
		const thresh = parsePolicy(`thresh(2,pk(${A}),pk(${B}),after(100))`);
		expect(isPolicySatisfied(thresh, { keys: [A], lockTime: 150 })).toBe(true);
		expect(isPolicySatisfied(thresh, { keys: [A], lockTime: 500_000_001 })).toBe(false);
	});

	it("matches preimages by digest", () => {
		const preimage = new Uint8Array(32).fill(7);
		const digest = bytesToHex(hashPreimage("sha256", preimage));
		const hashlock = parsePolicy(`and(pk(${A}),sha256(${digest}))`);
		expect(preimageDigests(hashlock, [preimage])).toEqual([digest]);
		expect(
			isPolicySatisfied(hashlock, { keys: [A], preimages: preimageDigests(hashlock, [preimage]) }),
		).toBe(true);
		expect(isPolicySatisfied(hashlock, { keys: [A] })).toBe(false);
	});

	it("lists leaves left to right", () => {
		expect(policyLeaves(policy).map((leaf) => leaf.kind)).toEqual(["key", "key", "older"]);
	});
});
