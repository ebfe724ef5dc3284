/**
 * Policy text parser
 *
 * Grammar: `pk(K)`, `pkh(H)`, `after(n)`, `older(n)`, `sha256(H)`,
 * `hash256(H)`, `ripemd160(H)`, `hash160(H)`, `and(P,P,...)`,
 * `or([w@]P,[w@]P,...)`, `thresh(k,P,...)`, `UNSATISFIABLE`, `TRIVIAL`.
 */

import { isHashFunction } from "../primitives/index.js";
import {
	ExpressionCursor,
	ExpressionToken,
	Span,
	hexToBytes,
	isHex,
} from "../utils/index.js";
import { Policy, PolicyError, PolicyParseError, WeightedPolicy } from "./types.js";
import { validatePolicy, validatePolicyNode } from "./validate.js";

class PolicyParser {
	private readonly cursor: ExpressionCursor;

	constructor(private readonly text: string) {
		this.cursor = new ExpressionCursor(
			text,
			(message, span) => new PolicyParseError(message, "SYNTAX", span),
		);
	}

	parse(): Policy {
		const policy = this.expression(this.cursor.expect("name", "a policy"));
		this.cursor.finish();
		return this.checked({ start: 0, end: this.text.length }, () => validatePolicy(policy));
	}

	private expression(name: ExpressionToken): Policy {
		const { value, span } = name;
		switch (value) {
			case "UNSATISFIABLE":
				return { kind: "unsatisfiable" };
			case "TRIVIAL":
				return { kind: "trivial" };
			case "pk":
				return this.node(span, { kind: "key", key: this.singleHex(name) });
			case "pkh":
				return this.node(span, { kind: "key_hash", hash: this.singleHex(name) });
			case "after":
			case "older": {
				const args = this.cursor.argumentList(() => this.cursor.expect("name", "a number"));
				this.arity(name, args.length);
				return this.node(span, { kind: value, value: this.number(args[0]) });
			}
			case "and": {
				const subs = this.cursor.argumentList(() => this.subPolicy());
				return this.node(span, { kind: "and", subs });
			}
			case "or": {
				const branches = this.cursor.argumentList(() => this.branch());
				return this.node(span, { kind: "or", branches });
			}
			case "thresh": {
				this.cursor.expect("(");
				const k = this.number(this.cursor.expect("name", "a threshold"));
				const subs: Policy[] = [];
				while (this.cursor.accept(",")) {
					subs.push(this.subPolicy());
				}
				this.cursor.expect(")", '"," or ")"');
				return this.node(span, { kind: "thresh", k, subs });
			}
		}
		if (isHashFunction(value)) {
			return this.node(span, { kind: "hash", fn: value, digest: this.singleHex(name) });
		}
		throw new PolicyParseError(`Unknown policy "${value}"`, "UNKNOWN_POLICY", span);
	}

	private subPolicy(): Policy {
		return this.expression(this.cursor.expect("name", "a policy"));
	}

	private branch(): WeightedPolicy {
		const first = this.cursor.expect("name", "a policy");
		if (this.cursor.accept("@")) {
			const weight = this.number(first);
			return { weight, policy: this.subPolicy() };
		}
		return { weight: 1, policy: this.expression(first) };
	}

	private node(start: Span, policy: Policy): Policy {
		return this.checked({ start: start.start, end: this.cursor.lastEnd() }, () => {
			validatePolicyNode(policy);
			return policy;
		});
	}

	private checked(span: Span, check: () => Policy): Policy {
		try {
			return check();
		} catch (error) {
			if (error instanceof PolicyError) {
				throw new PolicyParseError(error.message, "INVALID_ARGUMENT", span, error);
			}
			throw error;
		}
	}

	private arity(name: ExpressionToken, found: number): void {
		if (found !== 1) {
			throw new PolicyParseError(
				`${name.value} takes 1 argument, found ${found}`,
				"INVALID_ARGUMENT",
				{ start: name.span.start, end: this.cursor.lastEnd() },
			);
		}
	}

	private singleHex(name: ExpressionToken): Uint8Array {
		const args = this.cursor.argumentList(() => this.cursor.expect("name", "a hex string"));
		this.arity(name, args.length);
		const [token] = args;
		if (!isHex(token.value)) {
			throw new PolicyParseError(
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
			throw new PolicyParseError(
				`Expected a decimal number, found "${token.value}"`,
				"INVALID_ARGUMENT",
				token.span,
			);
		}
		return n;
	}
}

/**
 * Parse and validate a policy expression.
 *
 * @throws PolicyParseError with the span of the offending token or call
 */
export function parsePolicy(text: string): Policy {
	return new PolicyParser(text).parse();
}
