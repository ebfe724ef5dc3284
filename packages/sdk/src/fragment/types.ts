/**
 * Fragment AST types
 */

import type { HashFunction, KeyHash, PublicKey } from "../primitives/index.js";
import type { Span } from "../utils/index.js";
import type { Fragment } from "./fragment.js";

export type WrapperKind =
	| "alt"
	| "swap"
	| "check"
	| "dupif"
	| "verify"
	| "nonzero"
	| "zero_not_equal";

export type BinaryKind = "and_v" | "and_b" | "or_b" | "or_c" | "or_d" | "or_i";

/**
 * One node of a fragment tree. Children are owned `Fragment`s so every
 * node in a tree already carries a derived type.
 */
export type FragmentNode =
	| { readonly kind: "pk_k"; readonly key: PublicKey }
	| { readonly kind: "pk_h"; readonly hash: KeyHash }
	| { readonly kind: "older" | "after"; readonly value: number }
	| { readonly kind: HashFunction; readonly hash: Uint8Array }
	| { readonly kind: "true" }
	| { readonly kind: "false" }
	| { readonly kind: WrapperKind; readonly sub: Fragment }
	| { readonly kind: BinaryKind; readonly left: Fragment; readonly right: Fragment }
	| { readonly kind: "andor"; readonly a: Fragment; readonly b: Fragment; readonly c: Fragment }
	| { readonly kind: "thresh"; readonly k: number; readonly subs: readonly Fragment[] }
	| { readonly kind: "multi"; readonly k: number; readonly keys: readonly PublicKey[] };

export type FragmentKind = FragmentNode["kind"];

/** Prefix letter of each wrapper in miniscript notation */
export const WRAPPER_LETTERS: Readonly<Record<WrapperKind, string>> = {
	alt: "a",
	swap: "s",
	check: "c",
	dupif: "d",
	verify: "v",
	nonzero: "j",
	zero_not_equal: "n",
};

export const MAX_MULTI_KEYS = 20;

export function isWrapperKind(kind: FragmentKind): kind is WrapperKind {
	return kind in WRAPPER_LETTERS;
}

export type FragmentParseErrorCode =
	| "SYNTAX"
	| "UNKNOWN_FRAGMENT"
	| "INVALID_ARGUMENT"
	| "TYPE_CHECK";

/**
 * Raised by `parseFragment` with the `[start, end)` span of the offending
 * token.
 */
export class FragmentParseError extends Error {
	constructor(
		message: string,
		public readonly code: FragmentParseErrorCode,
		public readonly span: Span,
		cause?: unknown,
	) {
		super(message, { cause });
		this.name = "FragmentParseError";
	}
}
