/**
 * Fragment types
 *
 * Every fragment carries one basic type and a set of boolean properties,
 * stored together as a bitset:
 *
 * - `B` base: consumes its inputs and pushes a nonzero (sat) or zero (dissat)
 * - `V` verify: consumes its inputs and pushes nothing, aborting on failure
 * - `K` key: pushes a public key for a later CHECKSIG
 * - `W` wrapped: like `B` but operates one element below the top of the stack
 *
 * Properties: `z` consumes nothing, `o` consumes exactly one element, `n`
 * top input is never empty when satisfied, `d` dissatisfiable, `u` pushes
 * exactly 1 on satisfaction, `e` expressive (unique dissatisfaction without
 * signatures), `f` forced (no dissatisfaction without a signature), `s` safe
 * (every satisfaction needs a signature), `m` non-malleable, `x` expensive
 * verify. `g`/`h`/`i`/`j` record relative-time, relative-height,
 * absolute-time and absolute-height locks; `k` holds when no branch mixes
 * heights and times.
 */

export type BasicType = "B" | "V" | "K" | "W";

const FLAG_ORDER = "BVKWzonduefsmxghijk";
const BASIC_TYPES: readonly BasicType[] = ["B", "V", "K", "W"];
const CORRECTNESS_AND_MALLEABILITY = "zonduefsm";

const FLAG_BITS: ReadonlyMap<string, number> = new Map(
	[...FLAG_ORDER].map((flag, index): [string, number] => [flag, 1 << index]),
);

function maskOf(flags: string): number {
	let mask = 0;
	for (const flag of flags) {
		const bit = FLAG_BITS.get(flag);
		if (bit === undefined) {
			throw new RangeError(`Unknown type flag "${flag}"`);
		}
		mask |= bit;
	}
	return mask;
}

/**
 * Immutable basic type + property set.
 *
 * The combinators mirror the set notation used to state the typing rules:
 * `x.has("Bdu")` is "x has all of B, d and u", `x.pick("ghij")` keeps only
 * those flags and `x.when(cond)` is empty unless `cond` holds.
 */
export class FragmentType {
	static readonly NONE = new FragmentType(0);

	private constructor(private readonly bits: number) {}

	static of(flags: string): FragmentType {
		return new FragmentType(maskOf(flags));
	}

	has(flags: string): boolean {
		const mask = maskOf(flags);
		return (this.bits & mask) === mask;
	}

	pick(flags: string): FragmentType {
		return new FragmentType(this.bits & maskOf(flags));
	}

	union(...others: FragmentType[]): FragmentType {
		return new FragmentType(
			others.reduce((bits, other) => bits | other.bits, this.bits),
		);
	}

	intersect(...others: FragmentType[]): FragmentType {
		return new FragmentType(
			others.reduce((bits, other) => bits & other.bits, this.bits),
		);
	}

	when(condition: boolean): FragmentType {
		return condition ? this : FragmentType.NONE;
	}

	get base(): BasicType | undefined {
		return BASIC_TYPES.find((basic) => this.has(basic));
	}

	get zeroArg(): boolean {
		return this.has("z");
	}
	get oneArg(): boolean {
		return this.has("o");
	}
	get nonZero(): boolean {
		return this.has("n");
	}
	get dissatisfiable(): boolean {
		return this.has("d");
	}
	get unit(): boolean {
		return this.has("u");
	}
	get expressive(): boolean {
		return this.has("e");
	}
	get forced(): boolean {
		return this.has("f");
	}
	get safe(): boolean {
		return this.has("s");
	}
	get nonMalleable(): boolean {
		return this.has("m");
	}
	get expensiveVerify(): boolean {
		return this.has("x");
	}
	get noTimelockMixing(): boolean {
		return this.has("k");
	}

	/**
	 * Whether a fragment of this type can stand wherever `other` is accepted:
	 * same basic type and at least the correctness/malleability properties.
	 */
	isSubtypeOf(other: FragmentType): boolean {
		if (this.base !== other.base) {
			return false;
		}
		const mask = maskOf(CORRECTNESS_AND_MALLEABILITY);
		return (other.bits & mask & ~this.bits) === 0;
	}

	equals(other: FragmentType): boolean {
		return this.bits === other.bits;
	}

	toString(): string {
		let out = "";
		for (const flag of FLAG_ORDER) {
			if (this.has(flag)) {
				out += flag;
			}
		}
		return out;
	}
}

export type FragmentTypeErrorCode =
	| "INVALID_CHILD"
	| "INVALID_THRESHOLD"
	| "INCONSISTENT_TYPE";

/**
 * Raised when a combinator is applied to children whose types it cannot
 * compose. `fragment` is the text of the rejected node.
 */
export class FragmentTypeError extends Error {
	constructor(
		public readonly reason: string,
		public readonly code: FragmentTypeErrorCode,
		public readonly fragment: string,
	) {
		super(`${fragment}: ${reason}`);
		this.name = "FragmentTypeError";
	}
}
