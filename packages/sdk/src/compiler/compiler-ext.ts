/**
 * Expected witness costs tracked by the compiler
 *
 * Unlike `ExtData`, which records worst-case sizes, these are expectations:
 * `satCost` is the expected satisfaction size given that the fragment is
 * satisfied, weighted by the branch probabilities the compiler assigned,
 * and `dissatCost` the size of its canonical dissatisfaction.
 */

import { Fragment } from "../fragment/index.js";
import { CostModel } from "./types.js";

/** Expected witness sizes of one candidate */
export interface CompilerExtData {
	/** Expected satisfaction size in bytes */
	satCost: number;
	/** Undefined when the fragment cannot be dissatisfied */
	dissatCost?: number;
}

/** `[P(left | parent satisfied), P(right | parent satisfied)]` */
export type BranchWeights = readonly [number, number];

function add(a: number | undefined, b: number | undefined): number | undefined {
	return a === undefined || b === undefined ? undefined : a + b;
}

function required(value: number | undefined, what: string): number {
	if (value === undefined) {
		throw new Error(`${what} has no dissatisfaction`);
	}
	return value;
}

/**
 * Costs of a leaf fragment.
 *
 * @throws Error for wrappers and combinators
 */
export function terminalExt(fragment: Fragment, model: CostModel): CompilerExtData {
	const { node } = fragment;
	switch (node.kind) {
		case "true":
			return { satCost: 0 };
		case "false":
			return { satCost: Number.MAX_VALUE, dissatCost: 0 };
		case "pk_k":
			return { satCost: model.signatureSize, dissatCost: 1 };
		case "pk_h":
			return {
				satCost: model.signatureSize + model.publicKeySize,
				dissatCost: 1 + model.publicKeySize,
			};
		case "multi":
			return { satCost: 1 + model.signatureSize * node.k, dissatCost: node.k + 1 };
		case "sha256":
		case "hash256":
		case "ripemd160":
		case "hash160":
			return { satCost: model.preimageSize, dissatCost: model.preimageSize };
		case "older":
		case "after":
			return { satCost: 0 };
		default:
			throw new Error(`${node.kind} is not a terminal`);
	}
}

/** A wrapper the compiler may put around any candidate */
export interface Cast {
	letter: string;
	build(sub: Fragment): Fragment;
	ext(sub: CompilerExtData): CompilerExtData;
}

const same = (sub: CompilerExtData): CompilerExtData => sub;

/** Every wrapper cast, with how it changes the expected costs */
export const CASTS: readonly Cast[] = [
	{ letter: "a", build: (sub) => Fragment.alt(sub), ext: same },
	{ letter: "s", build: (sub) => Fragment.swap(sub), ext: same },
	{ letter: "c", build: (sub) => Fragment.check(sub), ext: same },
	{
		letter: "d",
		build: (sub) => Fragment.dupIf(sub),
		ext: (sub) => ({ satCost: 2 + sub.satCost, dissatCost: 1 }),
	},
	{ letter: "v", build: (sub) => Fragment.verify(sub), ext: (sub) => ({ satCost: sub.satCost }) },
	{
		letter: "j",
		build: (sub) => Fragment.nonZero(sub),
		ext: (sub) => ({ satCost: sub.satCost, dissatCost: 1 }),
	},
	{ letter: "n", build: (sub) => Fragment.zeroNotEqual(sub), ext: same },
	{ letter: "t", build: (sub) => Fragment.t(sub), ext: (sub) => ({ satCost: sub.satCost }) },
	{
		letter: "u",
		build: (sub) => Fragment.u(sub),
		ext: (sub) => ({ satCost: 2 + sub.satCost, dissatCost: 1 }),
	},
	{
		letter: "l",
		build: (sub) => Fragment.l(sub),
		ext: (sub) => ({ satCost: 1 + sub.satCost, dissatCost: 2 }),
	},
];

/** Two-child combinators the compiler tries for `and` and `or` */
export type CompiledBinaryKind = "and_b" | "and_v" | "or_b" | "or_c" | "or_d" | "or_i";

/** Costs of `kind(left, right)` with the branch weights of an `or` */
export function binaryExt(
	kind: CompiledBinaryKind,
	left: CompilerExtData,
	right: CompilerExtData,
	[lw, rw]: BranchWeights,
): CompilerExtData {
	switch (kind) {
		case "and_b":
			return {
				satCost: left.satCost + right.satCost,
				dissatCost: add(left.dissatCost, right.dissatCost),
			};
		case "and_v":
			return { satCost: left.satCost + right.satCost };
		case "or_b": {
			const ld = required(left.dissatCost, "or_b left");
			const rd = required(right.dissatCost, "or_b right");
			return {
				satCost: lw * (left.satCost + rd) + rw * (right.satCost + ld),
				dissatCost: ld + rd,
			};
		}
		case "or_d": {
			const ld = required(left.dissatCost, "or_d left");
			return {
				satCost: lw * left.satCost + rw * (right.satCost + ld),
				dissatCost: add(ld, right.dissatCost),
			};
		}
		case "or_c": {
			const ld = required(left.dissatCost, "or_c left");
			return { satCost: lw * left.satCost + rw * (right.satCost + ld) };
		}
		case "or_i": {
			const options = [
				left.dissatCost === undefined ? undefined : 2 + left.dissatCost,
				right.dissatCost === undefined ? undefined : 1 + right.dissatCost,
			].filter((cost): cost is number => cost !== undefined);
			return {
				satCost: lw * (2 + left.satCost) + rw * (1 + right.satCost),
				dissatCost: options.length === 0 ? undefined : Math.min(...options),
			};
		}
	}
}

/** `andor(a, b, c)`, with `[P(a and b), P(c)]` as weights */
export function andOrExt(
	a: CompilerExtData,
	b: CompilerExtData,
	c: CompilerExtData,
	[aw, cw]: BranchWeights,
): CompilerExtData {
	const ad = required(a.dissatCost, "andor condition");
	return {
		satCost: aw * (a.satCost + b.satCost) + cw * (ad + c.satCost),
		dissatCost: add(ad, c.dissatCost),
	};
}

/**
 * A threshold where each child is satisfied with probability k/n.
 */
export function threshExt(k: number, subs: readonly CompilerExtData[]): CompilerExtData {
	const ratio = k / subs.length;
	let satCost = 0;
	let dissatCost = 0;
	for (const sub of subs) {
		satCost += sub.satCost;
		dissatCost += required(sub.dissatCost, "thresh child");
	}
	return { satCost: satCost * ratio + dissatCost * (1 - ratio), dissatCost };
}
