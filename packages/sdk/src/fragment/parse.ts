/**
 * Miniscript text parser
 *
 * Accepts the notation printed by `Fragment.toString()`: collapsed wrapper
 * prefixes (`sdv:older(1)`), the `pk`/`pkh`/`t:`/`u:`/`l:`/`and_n`
 * shorthands, hex keys and digests, and decimal numbers.
 */

import {
	HashFunction,
	PrimitiveError,
	isHashFunction,
} from "../primitives/index.js";
import { FragmentTypeError } from "../typing/index.js";
import {
	ExpressionCursor,
	ExpressionToken,
	Span,
	hexToBytes,
	isHex,
} from "../utils/index.js";
import { Fragment } from "./fragment.js";
import { FragmentParseError } from "./types.js";

const WRAPPERS: Readonly<Record<string, (sub: Fragment) => Fragment>> = {
	a: Fragment.alt,
	s: Fragment.swap,
	c: Fragment.check,
	d: Fragment.dupIf,
	v: Fragment.verify,
	j: Fragment.nonZero,
	n: Fragment.zeroNotEqual,
	t: Fragment.t,
	u: Fragment.u,
	l: Fragment.l,
};

const BINARY: Readonly<Record<string, (left: Fragment, right: Fragment) => Fragment>> = {
	and_v: Fragment.andV,
	and_b: Fragment.andB,
	and_n: Fragment.andN,
	or_b: Fragment.orB,
	or_c: Fragment.orC,
	or_d: Fragment.orD,
	or_i: Fragment.orI,
};

class FragmentParser {
	private readonly cursor: ExpressionCursor;

	constructor(text: string) {
		this.cursor = new ExpressionCursor(
			text,
			(message, span) => new FragmentParseError(message, "SYNTAX", span),
		);
	}

	parse(): Fragment {
		const fragment = this.expression();
		this.cursor.finish();
		return fragment;
	}

	private expression(): Fragment {
		const name = this.cursor.expect("name", "a fragment");
		if (this.cursor.accept(":")) {
			const letters = name.value;
			for (const letter of letters) {
				if (!(letter in WRAPPERS)) {
					throw new FragmentParseError(
						`Unknown wrapper "${letter}"`,
						"UNKNOWN_FRAGMENT",
						name.span,
					);
				}
			}
			const inner = this.expression();
			return this.build(name.span, () =>
				[...letters].reduceRight((sub, letter) => WRAPPERS[letter](sub), inner),
			);
		}
		return this.call(name);
	}

	private call(name: ExpressionToken): Fragment {
		const { value, span } = name;
		if (value === "0" || value === "1") {
			return value === "1" ? Fragment.true() : Fragment.false();
		}

		const binary = BINARY[value];
		if (binary !== undefined) {
			const args = this.cursor.argumentList(() => this.expression());
			this.arity(name, args.length, 2);
			return this.build(this.spanFrom(span), () => binary(args[0], args[1]));
		}

		switch (value) {
			case "pk":
			case "pk_k": {
				const key = this.singleHexArgument(name);
				const build = value === "pk" ? Fragment.pk : Fragment.pkK;
				return this.build(this.spanFrom(span), () => build(key));
			}
			case "pkh":
			case "pk_h": {
				const hash = this.singleHexArgument(name);
				const build = value === "pkh" ? Fragment.pkh : Fragment.pkH;
				return this.build(this.spanFrom(span), () => build(hash));
			}
			case "older":
			case "after": {
				const n = this.number(
					this.single(name, () => this.cursor.expect("name", "a number")),
				);
				const build = value === "older" ? Fragment.older : Fragment.after;
				return this.build(this.spanFrom(span), () => build(n));
			}
			case "andor": {
				const args = this.cursor.argumentList(() => this.expression());
				this.arity(name, args.length, 3);
				return this.build(this.spanFrom(span), () =>
					Fragment.andOr(args[0], args[1], args[2]),
				);
			}
			case "thresh": {
				this.cursor.expect("(");
				const k = this.number(this.cursor.expect("name", "a threshold"));
				const subs: Fragment[] = [];
				while (this.cursor.accept(",")) {
					subs.push(this.expression());
				}
				this.cursor.expect(")", '"," or ")"');
				return this.build(this.spanFrom(span), () => Fragment.thresh(k, subs));
			}
			case "multi": {
				this.cursor.expect("(");
				const k = this.number(this.cursor.expect("name", "a threshold"));
				const keys: Uint8Array[] = [];
				while (this.cursor.accept(",")) {
					keys.push(this.hex(this.cursor.expect("name", "a public key")));
				}
				this.cursor.expect(")", '"," or ")"');
				return this.build(this.spanFrom(span), () => Fragment.multi(k, keys));
			}
		}

		if (isHashFunction(value)) {
			const fn: HashFunction = value;
			const digest = this.singleHexArgument(name);
			return this.build(this.spanFrom(span), () => Fragment.hashLock(fn, digest));
		}

		throw new FragmentParseError(`Unknown fragment "${value}"`, "UNKNOWN_FRAGMENT", span);
	}

	/**
	 * Run a constructor, reporting type and value errors against `span`.
	 */
	private build(span: Span, construct: () => Fragment): Fragment {
		try {
			return construct();
		} catch (error) {
			if (error instanceof FragmentTypeError) {
				throw new FragmentParseError(error.message, "TYPE_CHECK", span, error);
			}
			if (error instanceof PrimitiveError) {
				throw new FragmentParseError(error.message, "INVALID_ARGUMENT", span, error);
			}
			throw error;
		}
	}

	private arity(name: ExpressionToken, found: number, expected: number): void {
		if (found !== expected) {
			throw new FragmentParseError(
				`${name.value} takes ${expected} argument${expected === 1 ? "" : "s"}, found ${found}`,
				"INVALID_ARGUMENT",
				this.spanFrom(name.span),
			);
		}
	}

	private single<T>(name: ExpressionToken, parseItem: () => T): T {
		const args = this.cursor.argumentList(parseItem);
		this.arity(name, args.length, 1);
		return args[0];
	}

	private singleHexArgument(name: ExpressionToken): Uint8Array {
		return this.hex(this.single(name, () => this.cursor.expect("name", "a hex string")));
	}

	private hex(token: ExpressionToken): Uint8Array {
		if (!isHex(token.value)) {
			throw new FragmentParseError(
				`Expected hex, found "${token.value}"`,
				"INVALID_ARGUMENT",
				token.span,
			);
		}
		return hexToBytes(token.value);
	}

	private number(token: ExpressionToken): number {
		const n = /^(0|[1-9][0-9]*)$/.test(token.value) ? Number(token.value) : NaN;
		if (!Number.isSafeInteger(n)) {
			throw new FragmentParseError(
				`Expected a decimal number, found "${token.value}"`,
				"INVALID_ARGUMENT",
				token.span,
			);
		}
		return n;
	}

	// From a call's name to the last consumed token
	private spanFrom(start: Span): Span {
		return { start: start.start, end: this.cursor.lastEnd() };
	}
}

/**
 * Parse miniscript notation into a typed fragment.
 *
 * @throws FragmentParseError with the span of the offending token or call
 */
export function parseFragment(text: string): Fragment {
	return new FragmentParser(text).parse();
}
