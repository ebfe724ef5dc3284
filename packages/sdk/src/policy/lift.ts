import { Fragment } from "../fragment/index.js";
import { Policy } from "./types.js";

const UNSATISFIABLE: Policy = { kind: "unsatisfiable" };
const TRIVIAL: Policy = { kind: "trivial" };

function and(subs: Policy[]): Policy {
	const flat = subs.flatMap((sub) => (sub.kind === "and" ? sub.subs : [sub]));
	if (flat.some((sub) => sub.kind === "unsatisfiable")) {
		return UNSATISFIABLE;
	}
	const kept = flat.filter((sub) => sub.kind !== "trivial");
	if (kept.length === 0) {
		return TRIVIAL;
	}
	return kept.length === 1 ? kept[0] : { kind: "and", subs: kept };
}

function or(subs: Policy[]): Policy {
	const flat = subs.flatMap((sub) =>
		sub.kind === "or" ? sub.branches.map((branch) => branch.policy) : [sub],
	);
	if (flat.some((sub) => sub.kind === "trivial")) {
		return TRIVIAL;
	}
	const kept = flat.filter((sub) => sub.kind !== "unsatisfiable");
	if (kept.length === 0) {
		return UNSATISFIABLE;
	}
	return kept.length === 1
		? kept[0]
		: { kind: "or", branches: kept.map((policy) => ({ weight: 1, policy })) };
}

/**
 * Recover the abstract policy a fragment enforces. Wrappers vanish,
 * `and_*` and `or_*` become `and` / `or`, `andor(a,b,c)` becomes
 * `or(and(a,b),c)` and `multi` becomes a threshold over keys. Nested
 * conjunctions and disjunctions are flattened and the constants `1` / `0`
 * are folded away.
 */
export function liftFragment(fragment: Fragment): Policy {
	const { node } = fragment;
	switch (node.kind) {
		case "pk_k":
			return { kind: "key", key: node.key };
		case "pk_h":
			return { kind: "key_hash", hash: node.hash };
		case "older":
		case "after":
			return { kind: node.kind, value: node.value };
		case "sha256":
		case "hash256":
		case "ripemd160":
		case "hash160":
			return { kind: "hash", fn: node.kind, digest: node.hash };
		case "true":
			return TRIVIAL;
		case "false":
			return UNSATISFIABLE;
		case "alt":
		case "swap":
		case "check":
		case "dupif":
		case "verify":
		case "nonzero":
		case "zero_not_equal":
			return liftFragment(node.sub);
		case "and_v":
		case "and_b":
			return and([liftFragment(node.left), liftFragment(node.right)]);
		case "or_b":
		case "or_c":
		case "or_d":
		case "or_i":
			return or([liftFragment(node.left), liftFragment(node.right)]);
		case "andor":
			return or([and([liftFragment(node.a), liftFragment(node.b)]), liftFragment(node.c)]);
		case "thresh":
			return { kind: "thresh", k: node.k, subs: node.subs.map(liftFragment) };
		case "multi":
			return {
				kind: "thresh",
				k: node.k,
				subs: node.keys.map((key): Policy => ({ kind: "key", key })),
			};
	}
}
