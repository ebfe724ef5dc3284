/**
 * Witness lattice
 *
 * A partial witness is either a concrete stack (bottom to top), or one of
 * two failure states: `unavailable` (we cannot produce it, someone else
 * might) and `impossible` (nobody can). Alongside it travels whether the
 * witness contains a signature, which decides malleability between
 * alternatives.
 */

import { varIntSize } from "../utils/index.js";

export type WitnessStack =
	| { kind: "stack"; items: readonly Uint8Array[] }
	| { kind: "unavailable" }
	| { kind: "impossible" };

/** A witness together with whether it holds a signature */
export interface Satisfaction {
	stack: WitnessStack;
	hasSig: boolean;
}

/** No witness exists, whoever builds it */
export const IMPOSSIBLE: WitnessStack = { kind: "impossible" };
/** A witness may exist, but the oracle lacks what it needs */
export const UNAVAILABLE: WitnessStack = { kind: "unavailable" };

/** Empty push, read as false */
export const EMPTY_PUSH = new Uint8Array(0);
/** Push of `0x01`, read as true */
export const ONE_PUSH = Uint8Array.of(1);

/** Concrete stack of the given items, bottom first */
export function stack(...items: Uint8Array[]): WitnessStack {
	return { kind: "stack", items };
}

/**
 * Serialized size of stack items: each item's length prefix plus its bytes.
 */
export function witnessSize(items: readonly Uint8Array[]): number {
	return items.reduce((size, item) => size + varIntSize(item.length) + item.length, 0);
}

/** Stack `bottom` with `top` pushed above it */
export function combine(bottom: WitnessStack, top: WitnessStack): WitnessStack {
	if (bottom.kind === "impossible" || top.kind === "impossible") {
		return IMPOSSIBLE;
	}
	if (bottom.kind === "unavailable" || top.kind === "unavailable") {
		return UNAVAILABLE;
	}
	return { kind: "stack", items: [...bottom.items, ...top.items] };
}

/** Both parts of a conjunction; `top` is consumed first by the script */
export function join(bottom: Satisfaction, top: Satisfaction): Satisfaction {
	return { stack: combine(bottom.stack, top.stack), hasSig: bottom.hasSig || top.hasSig };
}

function size(stack: WitnessStack): number {
	return stack.kind === "stack" ? witnessSize(stack.items) : Infinity;
}

// If only one alternative is a stack, that one; if neither, `unavailable`
// over `impossible`
function onlyStack(a: Satisfaction, b: Satisfaction): Satisfaction | undefined {
	if (a.stack.kind === "stack" && b.stack.kind === "stack") {
		return undefined;
	}
	if (a.stack.kind === "stack") {
		return a;
	}
	if (b.stack.kind === "stack") {
		return b;
	}
	return a.stack.kind === "unavailable" ? a : b;
}

/**
 * Choose between two alternatives so that no third party could swap the
 * chosen witness for the other one.
 */
export function minimum(a: Satisfaction, b: Satisfaction): Satisfaction {
	const single = onlyStack(a, b);
	if (single !== undefined) {
		return single;
	}
	if (!a.hasSig && !b.hasSig) {
		return { stack: UNAVAILABLE, hasSig: false };
	}
	if (!a.hasSig) {
		return a;
	}
	if (!b.hasSig) {
		return b;
	}
	return size(a.stack) <= size(b.stack) ? a : b;
}

/** Cheapest of two alternatives, malleable or not */
export function minimumMalleable(a: Satisfaction, b: Satisfaction): Satisfaction {
	return onlyStack(a, b) ?? (size(a.stack) <= size(b.stack) ? a : b);
}
