/**
 * Satisfier
 *
 * Structural recursion producing, for every node, its best satisfaction
 * and its canonical dissatisfaction. Alternatives are chosen with
 * `minimum` (non-malleable) or `minimumMalleable`.
 */

import { Logger } from "@nestjs/common";

import { Fragment } from "../fragment/index.js";
import { PREIMAGE_LENGTH } from "../primitives/index.js";
import {
	EMPTY_PUSH,
	IMPOSSIBLE,
	ONE_PUSH,
	Satisfaction,
	UNAVAILABLE,
	WitnessStack,
	join,
	minimum,
	minimumMalleable,
	stack,
	witnessSize,
} from "./witness.js";
import { SatisfactionOracle, SatisfactionResult, SatisfyOptions } from "./types.js";

const HASH_DISSATISFACTION = new Uint8Array(PREIMAGE_LENGTH);

const noSig = (witness: WitnessStack): Satisfaction => ({ stack: witness, hasSig: false });

export class Satisfier {
	private readonly logger = new Logger(Satisfier.name);
	private readonly choose: (a: Satisfaction, b: Satisfaction) => Satisfaction;

	constructor(
		private readonly oracle: SatisfactionOracle,
		private readonly options: SatisfyOptions = {},
	) {
		this.choose = options.allowMalleable ? minimumMalleable : minimum;
	}

	satisfy(fragment: Fragment): SatisfactionResult {
		const { stack: witness } = this.sat(fragment);
		if (witness.kind !== "stack") {
			this.logger.verbose(`${fragment.toString()}: ${witness.kind}`);
			return { status: "unsatisfiable", reason: witness.kind };
		}
		const items = [...witness.items];
		return { status: "satisfied", witness: items, size: witnessSize(items) };
	}

	/**
	 * Best satisfaction of a node.
	 */
	sat(fragment: Fragment): Satisfaction {
		const { node } = fragment;
		switch (node.kind) {
			case "pk_k":
				return { stack: this.signature(node.key), hasSig: true };
			case "pk_h": {
				const key = this.oracle.lookupPublicKey?.(node.hash);
				if (key === undefined) {
					return { stack: IMPOSSIBLE, hasSig: true };
				}
				const sig = this.signature(key);
				return { stack: sig.kind === "stack" ? stack(...sig.items, key) : sig, hasSig: true };
			}
			case "older":
			case "after":
				return noSig(
					this.oracle.isTimelockSatisfied(node.kind, node.value) ? stack() : IMPOSSIBLE,
				);
			case "sha256":
			case "hash256":
			case "ripemd160":
			case "hash160": {
				const preimage = this.oracle.lookupPreimage(node.kind, node.hash);
				return noSig(preimage === undefined ? UNAVAILABLE : stack(preimage));
			}
			case "true":
				return noSig(stack());
			case "false":
				return noSig(IMPOSSIBLE);

			case "alt":
			case "swap":
			case "check":
			case "verify":
			case "nonzero":
			case "zero_not_equal":
				return this.sat(node.sub);
			case "dupif":
				return join(this.sat(node.sub), noSig(stack(ONE_PUSH)));

			case "and_v":
			case "and_b":
				return join(this.sat(node.right), this.sat(node.left));
			case "or_b": {
				const l = this.sat(node.left);
				const r = this.sat(node.right);
				return this.choose(
					join(r, this.dissat(node.left)),
					join(this.dissat(node.right), l),
				);
			}
			case "or_c":
			case "or_d":
				return this.choose(
					this.sat(node.left),
					join(this.sat(node.right), this.dissat(node.left)),
				);
			case "or_i":
				return this.choose(
					join(this.sat(node.left), noSig(stack(ONE_PUSH))),
					join(this.sat(node.right), noSig(stack(EMPTY_PUSH))),
				);
			case "andor":
				return this.choose(
					join(this.sat(node.b), this.sat(node.a)),
					join(this.sat(node.c), this.dissat(node.a)),
				);

			case "thresh":
				return this.threshold(node.k, node.subs);
			case "multi":
				return this.multisig(node.k, node.keys);
		}
	}

	/**
	 * Canonical dissatisfaction of a node.
	 */
	dissat(fragment: Fragment): Satisfaction {
		const { node } = fragment;
		switch (node.kind) {
			case "pk_k":
				return noSig(stack(EMPTY_PUSH));
			case "pk_h": {
				const key = this.oracle.lookupPublicKey?.(node.hash);
				return noSig(key === undefined ? UNAVAILABLE : stack(EMPTY_PUSH, key));
			}
			case "sha256":
			case "hash256":
			case "ripemd160":
			case "hash160":
				return noSig(stack(HASH_DISSATISFACTION));
			case "false":
				return noSig(stack());
			case "true":
			case "older":
			case "after":
			case "verify":
			case "or_c":
				return noSig(IMPOSSIBLE);

			case "alt":
			case "swap":
			case "check":
			case "zero_not_equal":
				return this.dissat(node.sub);
			case "dupif":
			case "nonzero":
				return noSig(stack(EMPTY_PUSH));

			case "and_v":
				return join(this.dissat(node.right), this.sat(node.left));
			case "and_b":
			case "or_b":
			case "or_d":
				return join(this.dissat(node.right), this.dissat(node.left));
			case "andor":
				return join(this.dissat(node.c), this.dissat(node.a));
			case "or_i":
				// Dissatisfactions need not be non-malleable
				return minimumMalleable(
					join(this.dissat(node.left), noSig(stack(ONE_PUSH))),
					join(this.dissat(node.right), noSig(stack(EMPTY_PUSH))),
				);

			case "thresh":
				return node.subs.reduce(
					(acc, sub) => join(this.dissat(sub), acc),
					noSig(stack()),
				);
			case "multi":
				return noSig(stack(...Array.from({ length: node.k + 1 }, () => EMPTY_PUSH)));
		}
	}

	private signature(key: Uint8Array): WitnessStack {
		const sig = this.oracle.lookupSignature(key);
		return sig === undefined ? IMPOSSIBLE : stack(sig);
	}

	private threshold(k: number, subs: readonly Fragment[]): Satisfaction {
		const sats = subs.map((sub) => this.sat(sub));
		const dissats = subs.map((sub) => this.dissat(sub));

		const weight = (i: number): number => {
			const sat = sats[i].stack;
			const dissat = dissats[i].stack;
			if (sat.kind !== "stack") {
				return Number.MAX_SAFE_INTEGER;
			}
			if (dissat.kind !== "stack") {
				return Number.MIN_SAFE_INTEGER;
			}
			return witnessSize(sat.items) - witnessSize(dissat.items);
		};
		const malleable = this.options.allowMalleable === true;
		// Array.prototype.sort is stable, so ties keep child order
		const order = subs
			.map((_, i) => i)
			.sort((a, b) => {
				const byAvailability =
					Number(sats[a].stack.kind !== "stack") - Number(sats[b].stack.kind !== "stack");
				if (byAvailability !== 0) {
					return byAvailability;
				}
				if (!malleable && sats[a].hasSig !== sats[b].hasSig) {
					return sats[a].hasSig ? 1 : -1;
				}
				return weight(a) - weight(b);
			});

		const chosen = new Set(order.slice(0, k));
		if (!malleable && k < subs.length) {
			const next = sats[order[k]];
			if (next.stack.kind === "stack" && !next.hasSig) {
				return noSig(UNAVAILABLE);
			}
		}
		return subs.reduce(
			(acc, _, i) => join(chosen.has(i) ? sats[i] : dissats[i], acc),
			noSig(stack()),
		);
	}

	private multisig(k: number, keys: readonly Uint8Array[]): Satisfaction {
		const sigs: Uint8Array[] = [];
		for (const key of keys) {
			const sig = this.oracle.lookupSignature(key);
			if (sig !== undefined) {
				sigs.push(sig);
			}
		}
		if (sigs.length < k) {
			return noSig(IMPOSSIBLE);
		}
		// Drop the largest surplus signatures, the later one on ties
		while (sigs.length > k) {
			let largest = 0;
			sigs.forEach((sig, i) => {
				if (sig.length >= sigs[largest].length) {
					largest = i;
				}
			});
			sigs.splice(largest, 1);
		}
		return { stack: stack(EMPTY_PUSH, ...sigs), hasSig: true };
	}
}

/**
 * Produce the witness for a fragment from what the oracle can provide.
 * Unsatisfiability is a result, not an error.
 */
export function satisfy(
	fragment: Fragment,
	oracle: SatisfactionOracle,
	options?: SatisfyOptions,
): SatisfactionResult {
	return new Satisfier(oracle, options).satisfy(fragment);
}
