/**
 * Tokenizer shared by the miniscript and policy text parsers
 *
 * Both grammars are nested function-call expressions over identifiers,
 * `(`, `)`, `,`, `@` (policy weights) and `:` (wrapper prefixes).
 * Whitespace is insignificant.
 */

/** Half-open character range `[start, end)` into the parsed text */
export interface Span {
	start: number;
	end: number;
}

export type ExpressionTokenKind = "name" | "(" | ")" | "," | "@" | ":";

export interface ExpressionToken {
	kind: ExpressionTokenKind;
	value: string;
	span: Span;
}

export type SyntaxErrorFactory = (message: string, span: Span) => Error;

const PUNCTUATION: ReadonlySet<string> = new Set(["(", ")", ",", "@", ":"]);

function isPunctuation(char: string): char is Exclude<ExpressionTokenKind, "name"> {
	return PUNCTUATION.has(char);
}

function isNameChar(char: string): boolean {
	return /[A-Za-z0-9_]/.test(char);
}

export function tokenizeExpression(
	text: string,
	fail: SyntaxErrorFactory,
): ExpressionToken[] {
	const tokens: ExpressionToken[] = [];
	let i = 0;
	while (i < text.length) {
		const char = text[i];
		if (/\s/.test(char)) {
			i++;
			continue;
		}
		if (isPunctuation(char)) {
			tokens.push({ kind: char, value: char, span: { start: i, end: i + 1 } });
			i++;
			continue;
		}
		if (!isNameChar(char)) {
			throw fail(`Unexpected character "${char}"`, { start: i, end: i + 1 });
		}
		const start = i;
		while (i < text.length && isNameChar(text[i])) {
			i++;
		}
		tokens.push({
			kind: "name",
			value: text.slice(start, i),
			span: { start, end: i },
		});
	}
	return tokens;
}

/**
 * Forward cursor over expression tokens with span-carrying errors.
 */
export class ExpressionCursor {
	private position = 0;
	private readonly tokens: ExpressionToken[];

	constructor(
		private readonly text: string,
		private readonly fail: SyntaxErrorFactory,
	) {
		this.tokens = tokenizeExpression(text, fail);
	}

	get atEnd(): boolean {
		return this.position >= this.tokens.length;
	}

	peek(): ExpressionToken | undefined {
		return this.tokens[this.position];
	}

	next(): ExpressionToken {
		const token = this.tokens[this.position];
		if (token === undefined) {
			throw this.fail("Unexpected end of input", this.endSpan());
		}
		this.position++;
		return token;
	}

	expect(kind: ExpressionTokenKind, what?: string): ExpressionToken {
		const token = this.next();
		if (token.kind !== kind) {
			throw this.fail(
				`Expected ${what ?? `"${kind}"`}, found "${token.value}"`,
				token.span,
			);
		}
		return token;
	}

	/** Consume the token if it has the given kind */
	accept(kind: ExpressionTokenKind): ExpressionToken | undefined {
		const token = this.peek();
		if (token?.kind === kind) {
			this.position++;
			return token;
		}
		return undefined;
	}

	/**
	 * Parse `(item, item, ...)` after a function name.
	 */
	argumentList<T>(parseItem: () => T): T[] {
		this.expect("(");
		const items: T[] = [parseItem()];
		while (this.accept(",")) {
			items.push(parseItem());
		}
		this.expect(")", '"," or ")"');
		return items;
	}

	/** Fail unless every token was consumed */
	finish(): void {
		const token = this.peek();
		if (token !== undefined) {
			throw this.fail(`Unexpected trailing "${token.value}"`, token.span);
		}
	}

	/** End offset of the most recently consumed token */
	lastEnd(): number {
		const token = this.tokens[this.position - 1];
		return token === undefined ? 0 : token.span.end;
	}

	endSpan(): Span {
		return { start: this.text.length, end: this.text.length };
	}
}
