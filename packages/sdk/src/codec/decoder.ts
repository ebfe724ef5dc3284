/**
 * Script decoder
 *
 * A single non-backtracking shift/reduce pass over the token stream. Every
 * template is identified by its trailing opcodes, so tokens are consumed
 * from the end of the script towards its start. Pending work lives on an
 * explicit action stack; finished fragments live on a term stack.
 *
 * Sequences of fragments (`X Y Z`) are grouped right-associatively as
 * `and_v(X, and_v(Y, Z))`. Each sequence extends until a token that can only
 * precede a sequence: IF, NOTIF, ELSE, TOALTSTACK, SWAP or the start of the
 * script.
 */

import { Fragment, FragmentNode, MAX_MULTI_KEYS, WrapperKind } from "../fragment/index.js";
import { PrimitiveError } from "../primitives/index.js";
import { FragmentTypeError } from "../typing/index.js";
import { lexScript } from "./lexer.js";
import { OpTokenKind, ScriptDecodeError, Token, TokenKind } from "./types.js";

type Action =
	| { kind: "expression" }
	| { kind: "w_expression" }
	| { kind: "sequence_tail" }
	| { kind: "and_v" }
	| { kind: "wrap"; wrapper: WrapperKind }
	| { kind: "binary"; combinator: "and_b" | "or_b" | "or_c" | "or_d" | "or_i" }
	| { kind: "andor" }
	| { kind: "expect"; token: OpTokenKind; then: Action }
	| { kind: "endif" }
	| { kind: "else" }
	| { kind: "thresh"; k: number; count: number }
	| { kind: "thresh_end"; k: number; count: number };

const SEQUENCE_BOUNDARIES: ReadonlySet<TokenKind> = new Set<TokenKind>([
	"IF",
	"NOTIF",
	"ELSE",
	"TOALTSTACK",
	"SWAP",
]);

class ScriptDecoder {
	private readonly actions: Action[] = [];
	private readonly terms: Fragment[] = [];
	private remaining: number;

	constructor(private readonly tokens: Token[]) {
		this.remaining = tokens.length;
	}

	decode(): Fragment {
		this.sequence();
		for (let action = this.actions.pop(); action !== undefined; action = this.actions.pop()) {
			this.step(action);
		}
		if (this.remaining > 0) {
			const token = this.tokens[this.remaining - 1];
			throw new ScriptDecodeError(`Unexpected ${token.kind}`, "UNEXPECTED_TOKEN", token.offset);
		}
		const [fragment] = this.terms;
		if (fragment === undefined || this.terms.length !== 1) {
			throw new ScriptDecodeError("Script does not encode a single fragment", "UNEXPECTED_END", 0);
		}
		return fragment;
	}

	// Token access, from the end of the script

	private peek(): Token | undefined {
		return this.remaining > 0 ? this.tokens[this.remaining - 1] : undefined;
	}

	private next(): Token {
		const token = this.peek();
		if (token === undefined) {
			throw new ScriptDecodeError("Unexpected start of script", "UNEXPECTED_END", 0);
		}
		this.remaining--;
		return token;
	}

	private expect<K extends TokenKind>(kind: K): Token & { kind: K } {
		const token = this.next();
		if (!isKind(token, kind)) {
			throw new ScriptDecodeError(
				`Expected ${kind}, found ${token.kind}`,
				"UNEXPECTED_TOKEN",
				token.offset,
			);
		}
		return token;
	}

	private expectNum(value?: number): number {
		const token = this.expect("Num");
		if (value !== undefined && token.value !== value) {
			throw new ScriptDecodeError(
				`Expected ${value}, found ${token.value}`,
				"UNEXPECTED_TOKEN",
				token.offset,
			);
		}
		return token.value;
	}

	private atSequenceBoundary(): boolean {
		const token = this.peek();
		return token === undefined || SEQUENCE_BOUNDARIES.has(token.kind);
	}

	// Actions

	private push(...actions: Action[]): void {
		// Listed in execution order; the stack runs the last pushed first
		for (let i = actions.length - 1; i >= 0; i--) {
			this.actions.push(actions[i]);
		}
	}

	private sequence(): void {
		this.push({ kind: "expression" }, { kind: "sequence_tail" });
	}

	private step(action: Action): void {
		switch (action.kind) {
			case "expression":
				this.expression();
				return;
			case "w_expression":
				if (this.peek()?.kind === "FROMALTSTACK") {
					this.next();
					this.push(
						{ kind: "expression" },
						{ kind: "sequence_tail" },
						{ kind: "expect", token: "TOALTSTACK", then: { kind: "wrap", wrapper: "alt" } },
					);
				} else {
					this.push(
						{ kind: "expression" },
						{ kind: "sequence_tail" },
						{ kind: "expect", token: "SWAP", then: { kind: "wrap", wrapper: "swap" } },
					);
				}
				return;
			case "sequence_tail":
				if (!this.atSequenceBoundary()) {
					this.push({ kind: "expression" }, { kind: "and_v" }, { kind: "sequence_tail" });
				}
				return;
			case "and_v": {
				const left = this.pop();
				const right = this.pop();
				this.reduce({ kind: "and_v", left, right });
				return;
			}
			case "wrap":
				this.reduce({ kind: action.wrapper, sub: this.pop() });
				return;
			case "binary": {
				const left = this.pop();
				const right = this.pop();
				this.reduce({ kind: action.combinator, left, right });
				return;
			}
			case "andor": {
				const a = this.pop();
				const c = this.pop();
				const b = this.pop();
				this.reduce({ kind: "andor", a, b, c });
				return;
			}
			case "expect":
				this.expect(action.token);
				this.step(action.then);
				return;
			case "endif":
				this.endIf();
				return;
			case "else":
				this.afterElse();
				return;
			case "thresh":
				if (this.peek()?.kind === "ADD") {
					this.next();
					this.push({ kind: "w_expression" }, { ...action, count: action.count + 1 });
				} else {
					this.push({ kind: "expression" }, { kind: "thresh_end", k: action.k, count: action.count + 1 });
				}
				return;
			case "thresh_end": {
				const subs: Fragment[] = [];
				for (let i = 0; i < action.count; i++) {
					subs.push(this.pop());
				}
				this.reduce({ kind: "thresh", k: action.k, subs });
				return;
			}
		}
	}

	/**
	 * Shift the trailing tokens of one fragment and schedule its reduction.
	 */
	private expression(): void {
		const token = this.next();
		switch (token.kind) {
			case "Pubkey":
				this.reduce({ kind: "pk_k", key: token.data });
				return;
			case "CHECKSIG":
				this.push({ kind: "expression" }, { kind: "wrap", wrapper: "check" });
				return;
			case "VERIFY":
				if (this.peek()?.kind === "EQUAL") {
					this.next();
					this.equalTail(true);
				} else {
					this.push({ kind: "expression" }, { kind: "wrap", wrapper: "verify" });
				}
				return;
			case "EQUAL":
				this.equalTail(false);
				return;
			case "0NOTEQUAL":
				this.push({ kind: "expression" }, { kind: "wrap", wrapper: "zero_not_equal" });
				return;
			case "CHECKSEQUENCEVERIFY":
				this.reduce({ kind: "older", value: this.expectNum() });
				return;
			case "CHECKLOCKTIMEVERIFY":
				this.reduce({ kind: "after", value: this.expectNum() });
				return;
			case "CHECKMULTISIG": {
				const countToken = this.expect("Num");
				if (countToken.value > MAX_MULTI_KEYS) {
					throw new ScriptDecodeError(
						`CHECKMULTISIG with ${countToken.value} keys`,
						"TOO_MANY_KEYS",
						countToken.offset,
					);
				}
				const keys: Uint8Array[] = [];
				for (let i = 0; i < countToken.value; i++) {
					keys.unshift(this.expect("Pubkey").data);
				}
				this.reduce({ kind: "multi", k: this.expectNum(), keys });
				return;
			}
			case "Num":
				if (token.value === 0 || token.value === 1) {
					this.reduce({ kind: token.value === 1 ? "true" : "false" });
					return;
				}
				break;
			case "ENDIF":
				this.push({ kind: "expression" }, { kind: "sequence_tail" }, { kind: "endif" });
				return;
			case "BOOLAND":
				this.push({ kind: "w_expression" }, { kind: "expression" }, { kind: "binary", combinator: "and_b" });
				return;
			case "BOOLOR":
				this.push({ kind: "w_expression" }, { kind: "expression" }, { kind: "binary", combinator: "or_b" });
				return;
		}
		throw new ScriptDecodeError(`Unexpected ${token.kind}`, "UNEXPECTED_TOKEN", token.offset);
	}

	/**
	 * After `EQUAL` (or `EQUALVERIFY`): a hashlock, `pk_h` or a threshold.
	 */
	private equalTail(verify: boolean): void {
		const token = this.next();
		const wrapVerify = (): void => {
			if (verify) {
				this.push({ kind: "wrap", wrapper: "verify" });
			}
		};
		switch (token.kind) {
			case "Hash32": {
				const op = this.next();
				if (op.kind !== "SHA256" && op.kind !== "HASH256") {
					throw new ScriptDecodeError(`Unexpected ${op.kind}`, "UNEXPECTED_TOKEN", op.offset);
				}
				this.hashSizeCheck();
				wrapVerify();
				this.reduce({ kind: op.kind === "SHA256" ? "sha256" : "hash256", hash: token.data });
				return;
			}
			case "Hash20": {
				const op = this.next();
				if (op.kind === "HASH160" && verify && this.peek()?.kind === "DUP") {
					this.next();
					this.reduce({ kind: "pk_h", hash: token.data });
					return;
				}
				if (op.kind !== "RIPEMD160" && op.kind !== "HASH160") {
					throw new ScriptDecodeError(`Unexpected ${op.kind}`, "UNEXPECTED_TOKEN", op.offset);
				}
				this.hashSizeCheck();
				wrapVerify();
				this.reduce({ kind: op.kind === "HASH160" ? "hash160" : "ripemd160", hash: token.data });
				return;
			}
			case "Num":
				wrapVerify();
				this.push({ kind: "thresh", k: token.value, count: 0 });
				return;
		}
		throw new ScriptDecodeError(`Unexpected ${token.kind}`, "UNEXPECTED_TOKEN", token.offset);
	}

	// `SIZE 32 EQUALVERIFY` in front of every hashlock
	private hashSizeCheck(): void {
		this.expect("VERIFY");
		this.expect("EQUAL");
		this.expectNum(32);
		this.expect("SIZE");
	}

	/**
	 * After the last branch of an IF block: decide which template it closes.
	 */
	private endIf(): void {
		const token = this.next();
		switch (token.kind) {
			case "ELSE":
				this.push({ kind: "expression" }, { kind: "sequence_tail" }, { kind: "else" });
				return;
			case "IF": {
				const before = this.next();
				if (before.kind === "DUP") {
					this.push({ kind: "wrap", wrapper: "dupif" });
					return;
				}
				if (before.kind === "0NOTEQUAL") {
					this.expect("SIZE");
					this.push({ kind: "wrap", wrapper: "nonzero" });
					return;
				}
				throw new ScriptDecodeError(`Unexpected ${before.kind}`, "UNEXPECTED_TOKEN", before.offset);
			}
			case "NOTIF":
				if (this.peek()?.kind === "IFDUP") {
					this.next();
					this.push({ kind: "expression" }, { kind: "binary", combinator: "or_d" });
				} else {
					this.push({ kind: "expression" }, { kind: "binary", combinator: "or_c" });
				}
				return;
		}
		throw new ScriptDecodeError(`Unexpected ${token.kind}`, "UNEXPECTED_TOKEN", token.offset);
	}

	/**
	 * After the first branch of an IF/ELSE block: `or_i` or `andor`.
	 */
	private afterElse(): void {
		const token = this.next();
		if (token.kind === "IF") {
			this.step({ kind: "binary", combinator: "or_i" });
			return;
		}
		if (token.kind === "NOTIF") {
			this.push({ kind: "expression" }, { kind: "andor" });
			return;
		}
		throw new ScriptDecodeError(`Unexpected ${token.kind}`, "UNEXPECTED_TOKEN", token.offset);
	}

	private pop(): Fragment {
		const fragment = this.terms.pop();
		if (fragment === undefined) {
			throw new ScriptDecodeError("Missing operand", "UNEXPECTED_END", 0);
		}
		return fragment;
	}

	/** Offset of the token consumed last, which opens the node being reduced */
	private nodeStart(): number {
		const token = this.tokens[this.remaining];
		return token === undefined ? 0 : token.offset;
	}

	private reduce(node: FragmentNode): void {
		try {
			this.terms.push(Fragment.fromNode(node));
		} catch (error) {
			const offset = this.nodeStart();
			if (error instanceof FragmentTypeError) {
				throw new ScriptDecodeError(error.message, "TYPE_CHECK", offset, error);
			}
			if (error instanceof PrimitiveError) {
				throw new ScriptDecodeError(error.message, "INVALID_VALUE", offset, error);
			}
			throw error;
		}
	}
}

function isKind<K extends TokenKind>(token: Token, kind: K): token is Token & { kind: K } {
	return token.kind === kind;
}

/**
 * Decode script bytes into a typed fragment.
 *
 * @throws ScriptDecodeError for malformed, non-canonical or ill-typed scripts
 */
export function decodeScript(script: Uint8Array): Fragment {
	return new ScriptDecoder(lexScript(script)).decode();
}
