/**
 * Candidate sets
 *
 * For one (policy node, P(sat), P(dissat)) context the compiler keeps the
 * set of encodings no other encoding dominates. Encoding A dominates B when
 * A can stand in for B wherever B is used (same basic type, at least B's
 * properties, same `hasFreeVerify`) and ranks no worse.
 */

import { encodeFragment } from "../codec/index.js";
import { Fragment } from "../fragment/index.js";
import { FragmentTypeError } from "../typing/index.js";
import { compareBytes } from "../utils/index.js";
import { CASTS, CompilerExtData } from "./compiler-ext.js";
import { CostModel } from "./types.js";

export interface Candidate {
	fragment: Fragment;
	comp: CompilerExtData;
}

export interface ProbabilityContext {
	satProb: number;
	/** Undefined when the parent never needs this node dissatisfied */
	dissatProb?: number;
}

interface Ranked extends Candidate {
	cost: number;
}

/**
 * Weighted cost of a candidate in a context. A candidate that cannot be
 * dissatisfied costs infinity where a dissatisfaction is expected.
 */
export function candidateCost(
	candidate: Candidate,
	{ satProb, dissatProb }: ProbabilityContext,
	model: CostModel,
): number {
	const { fragment, comp } = candidate;
	let witness = comp.satCost * satProb;
	if (dissatProb !== undefined) {
		witness += comp.dissatCost === undefined ? Infinity : comp.dissatCost * dissatProb;
	}
	return model.scriptSizeWeight * fragment.ext.scriptSize + model.witnessWeight * witness;
}

/**
 * Order by cost, then worst-case satisfaction size, then encoding, then
 * text. Negative when `a` ranks better.
 */
function compareRank(a: Ranked, b: Ranked, encode: (fragment: Fragment) => Uint8Array): number {
	if (a.cost !== b.cost) {
		return a.cost < b.cost ? -1 : 1;
	}
	const aSat = a.fragment.ext.maxSatSize ?? Infinity;
	const bSat = b.fragment.ext.maxSatSize ?? Infinity;
	if (aSat !== bSat) {
		return aSat < bSat ? -1 : 1;
	}
	const byEncoding = compareBytes(encode(a.fragment), encode(b.fragment));
	if (byEncoding !== 0) {
		return byEncoding;
	}
	const aText = a.fragment.toString();
	const bText = b.fragment.toString();
	return aText < bText ? -1 : aText > bText ? 1 : 0;
}

// `a` can replace `b` wherever `b` is accepted
function canReplace(a: Fragment, b: Fragment): boolean {
	return a.type.isSubtypeOf(b.type) && a.ext.hasFreeVerify === b.ext.hasFreeVerify;
}

/**
 * Build a fragment, or return undefined when the composition is ill-typed.
 */
export function tryBuild(build: () => Fragment): Fragment | undefined {
	try {
		return build();
	} catch (error) {
		if (error instanceof FragmentTypeError) {
			return undefined;
		}
		throw error;
	}
}

export class CandidateSet {
	private entries: Ranked[] = [];

	constructor(
		readonly context: ProbabilityContext,
		private readonly model: CostModel,
		private readonly onExplore: () => void = () => undefined,
		/** Encodings already computed, shared by the sets of one compilation */
		private readonly encodings: Map<Fragment, Uint8Array> = new Map(),
	) {}

	get candidates(): readonly Candidate[] {
		return this.entries;
	}

	get size(): number {
		return this.entries.length;
	}

	private readonly encode = (fragment: Fragment): Uint8Array => {
		let encoded = this.encodings.get(fragment);
		if (encoded === undefined) {
			encoded = encodeFragment(fragment);
			this.encodings.set(fragment, encoded);
		}
		return encoded;
	};

	cost(candidate: Candidate): number {
		return candidateCost(candidate, this.context, this.model);
	}

	/**
	 * Insert a candidate unless it is malleable or dominated, evicting the
	 * candidates it dominates. Returns whether it was kept.
	 */
	insert(candidate: Candidate): boolean {
		this.onExplore();
		if (!candidate.fragment.type.nonMalleable) {
			return false;
		}
		const ranked: Ranked = { ...candidate, cost: this.cost(candidate) };
		const dominated = this.entries.some(
			(existing) =>
				canReplace(existing.fragment, ranked.fragment) && compareRank(existing, ranked, this.encode) <= 0,
		);
		if (dominated) {
			return false;
		}
		this.entries = this.entries.filter(
			(existing) =>
				!(canReplace(ranked.fragment, existing.fragment) && compareRank(ranked, existing, this.encode) <= 0),
		);
		this.entries.push(ranked);
		return true;
	}

	/**
	 * Insert a candidate and every wrapper cast of it that survives,
	 * breadth first.
	 */
	insertWithCasts(candidate: Candidate): void {
		if (!this.insert(candidate)) {
			return;
		}
		const queue: Candidate[] = [candidate];
		for (let current = queue.shift(); current !== undefined; current = queue.shift()) {
			for (const cast of CASTS) {
				const { fragment, comp } = current;
				const wrapped = tryBuild(() => cast.build(fragment));
				if (wrapped === undefined) {
					continue;
				}
				const next: Candidate = { fragment: wrapped, comp: cast.ext(comp) };
				if (this.insert(next)) {
					queue.push(next);
				}
			}
		}
	}

	/** Cheapest candidate matching the predicate */
	best(predicate: (fragment: Fragment) => boolean = () => true): Candidate | undefined {
		let best: Ranked | undefined;
		for (const entry of this.entries) {
			if (predicate(entry.fragment) && (best === undefined || compareRank(entry, best, this.encode) < 0)) {
				best = entry;
			}
		}
		return best;
	}
}
