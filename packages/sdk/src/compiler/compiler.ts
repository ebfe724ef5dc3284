/**
 * Policy compiler
 *
 * Dynamic programming over the policy tree. Each sub-policy is compiled
 * under a (P(sat), P(dissat)) context into the set of encodings no other
 * encoding dominates; parents combine their children's sets with every
 * applicable combinator and keep what survives. Results are memoised per
 * (policy, context) for the duration of one `compile` call.
 */

import { Logger } from "@nestjs/common";

import { Fragment, MAX_MULTI_KEYS } from "../fragment/index.js";
import {
	Policy,
	PolicyError,
	parsePolicy,
	policyToString,
	validatePolicy,
} from "../policy/index.js";
import {
	Candidate,
	CandidateSet,
	ProbabilityContext,
	tryBuild,
} from "./candidates.js";
import {
	BranchWeights,
	CompiledBinaryKind,
	andOrExt,
	binaryExt,
	terminalExt,
	threshExt,
} from "./compiler-ext.js";
import { resolveCompilerConfig } from "./config.js";
import {
	CompilationResult,
	CompileError,
	CompilerConfig,
	ResolvedCompilerConfig,
} from "./types.js";

const BINARY_BUILDERS: Readonly<
	Record<CompiledBinaryKind, (left: Fragment, right: Fragment) => Fragment>
> = {
	and_b: (left, right) => Fragment.andB(left, right),
	and_v: (left, right) => Fragment.andV(left, right),
	or_b: (left, right) => Fragment.orB(left, right),
	or_c: (left, right) => Fragment.orC(left, right),
	or_d: (left, right) => Fragment.orD(left, right),
	or_i: (left, right) => Fragment.orI(left, right),
};

/**
 * Rewrite n-ary `and` / `or` as right-nested binary nodes. `or` weights of
 * the folded branches are summed so every branch keeps its share.
 */
export function binarizePolicy(policy: Policy): Policy {
	switch (policy.kind) {
		case "and": {
			const subs = policy.subs.map(binarizePolicy);
			return subs.reduceRight((acc, sub) => ({ kind: "and", subs: [sub, acc] }));
		}
		case "or": {
			const branches = policy.branches.map(({ weight, policy: sub }) => ({
				weight,
				policy: binarizePolicy(sub),
			}));
			return branches.reduceRight((acc, branch) => ({
				weight: branch.weight + acc.weight,
				policy: { kind: "or", branches: [branch, acc] },
			})).policy;
		}
		case "thresh":
			return { kind: "thresh", k: policy.k, subs: policy.subs.map(binarizePolicy) };
		default:
			return policy;
	}
}

/**
 * Chooses the cheapest well-typed, non-malleable encoding of a policy.
 *
 * @example
 * ```typescript
 * const compiler = new PolicyCompiler({ requireSafe: true });
 * const { fragment, cost } = compiler.compile(parsePolicy(text));
 * ```
 */
export class PolicyCompiler {
	private readonly logger = new Logger(PolicyCompiler.name);
	private readonly config: ResolvedCompilerConfig;

	constructor(config: CompilerConfig = {}) {
		this.config = resolveCompilerConfig(config);
	}

	/**
	 * @throws CompileError when no acceptable encoding exists
	 * @throws PolicyParseError when given text that does not parse
	 */
	compile(input: Policy | string): CompilationResult {
		const policy = typeof input === "string" ? parsePolicy(input) : this.validated(input);
		const text = policyToString(policy);
		const search = new CompilationSearch(this.config);
		const roots = search.compile(binarizePolicy(policy), { satProb: 1 });
		this.logger.debug(
			`Explored ${search.explored} candidates over ${search.contexts} contexts for ${text}`,
		);

		if (!roots.candidates.some(({ fragment }) => fragment.type.base === "B")) {
			throw new CompileError(`No well-typed encoding of ${text}`, "NO_CANDIDATE", {
				policy: text,
			});
		}
		const best = roots.best(
			({ type }) => type.base === "B" && (!this.config.requireSafe || type.safe),
		);
		if (best === undefined) {
			this.logger.warn(`Rejected ${text}: some spending path needs no signature`);
			throw new CompileError(
				`Every encoding of ${text} can be spent without a signature`,
				"NOT_SAFE",
				{ policy: text },
			);
		}
		const { fragment } = best;
		if (!fragment.type.noTimelockMixing) {
			throw new CompileError(
				`${text} combines height-based and time-based timelocks in one spending path`,
				"TIMELOCK_MIXING",
				{ policy: text },
			);
		}
		if (fragment.ext.scriptSize > this.config.maxScriptSize) {
			throw new CompileError(
				`Script of ${fragment.ext.scriptSize} bytes exceeds ${this.config.maxScriptSize}`,
				"SCRIPT_TOO_LARGE",
				{ scriptSize: fragment.ext.scriptSize, maxScriptSize: this.config.maxScriptSize },
			);
		}
		return { fragment, cost: roots.cost(best), candidatesExplored: search.explored };
	}

	private validated(policy: Policy): Policy {
		try {
			return validatePolicy(policy);
		} catch (error) {
			if (error instanceof PolicyError) {
				throw new CompileError(error.message, "INVALID_POLICY", { code: error.code }, error);
			}
			throw error;
		}
	}
}

/**
 * State of one compilation: the memo table and counters.
 */
class CompilationSearch {
	private readonly logger = new Logger(PolicyCompiler.name);
	private readonly memo = new Map<string, CandidateSet>();
	private readonly encodings = new Map<Fragment, Uint8Array>();
	explored = 0;

	constructor(private readonly config: ResolvedCompilerConfig) {}

	get contexts(): number {
		return this.memo.size;
	}

	compile(policy: Policy, context: ProbabilityContext): CandidateSet {
		const key = `${policyToString(policy)}|${context.satProb}|${context.dissatProb ?? "none"}`;
		const cached = this.memo.get(key);
		if (cached !== undefined) {
			return cached;
		}
		const set = new CandidateSet(
			context,
			this.config.costModel,
			() => {
				this.explored++;
			},
			this.encodings,
		);
		this.generate(policy, set);
		this.memo.set(key, set);
		this.logger.verbose(`${key}: ${set.size} candidates`);
		return set;
	}

	private generate(policy: Policy, set: CandidateSet): void {
		const { satProb, dissatProb } = set.context;
		switch (policy.kind) {
			case "unsatisfiable":
				return this.terminal(set, Fragment.false());
			case "trivial":
				return this.terminal(set, Fragment.true());
			case "key":
				return this.terminal(set, Fragment.pkK(policy.key));
			case "key_hash":
				return this.terminal(set, Fragment.pkH(policy.hash));
			case "older":
				return this.terminal(set, Fragment.older(policy.value));
			case "after":
				return this.terminal(set, Fragment.after(policy.value));
			case "hash":
				return this.terminal(set, Fragment.hashLock(policy.fn, policy.digest));

			case "and": {
				const [x, y] = pair(policy.subs);
				const left = this.compile(x, { satProb, dissatProb });
				const right = this.compile(y, { satProb, dissatProb });
				const leftNoDissat = this.compile(x, { satProb });
				const rightNoDissat = this.compile(y, { satProb });
				const zero = [this.falseCandidate()];

				this.binary(set, "and_b", left, right, [1, 1]);
				this.binary(set, "and_b", right, left, [1, 1]);
				this.binary(set, "and_v", left, right, [1, 1]);
				this.binary(set, "and_v", right, left, [1, 1]);
				this.andOr(set, left.candidates, rightNoDissat.candidates, zero, [1, 0]);
				this.andOr(set, right.candidates, leftNoDissat.candidates, zero, [1, 0]);
				return;
			}

			case "or":
				return this.disjunction(policy.branches, set);

			case "thresh":
				return this.threshold(policy.k, policy.subs, set);
		}
	}

	private disjunction(
		branches: Extract<Policy, { kind: "or" }>["branches"],
		set: CandidateSet,
	): void {
		const { satProb, dissatProb } = set.context;
		const [l, r] = pair(branches);
		const total = l.weight + r.weight;
		const lw = l.weight / total;
		const rw = r.weight / total;

		// andor(x, y, z) for or(and(x, y), z) in either position
		this.andOrFromConjunction(set, l.policy, r.policy, lw, rw);
		this.andOrFromConjunction(set, r.policy, l.policy, rw, lw);

		const dissatContexts = (otherWeight: number): (number | undefined)[] => [
			(dissatProb ?? 0) + otherWeight * satProb,
			otherWeight * satProb,
			dissatProb,
			undefined,
		];
		const lComp = dissatContexts(rw).map((d) =>
			this.compile(l.policy, { satProb: lw * satProb, dissatProb: d }),
		);
		const rComp = dissatContexts(lw).map((d) =>
			this.compile(r.policy, { satProb: rw * satProb, dissatProb: d }),
		);

		this.binary(set, "or_b", lComp[0], rComp[0], [lw, rw]);
		this.binary(set, "or_b", rComp[0], lComp[0], [rw, lw]);
		this.binary(set, "or_d", lComp[0], rComp[2], [lw, rw]);
		this.binary(set, "or_d", rComp[0], lComp[2], [rw, lw]);
		this.binary(set, "or_c", lComp[1], rComp[3], [lw, rw]);
		this.binary(set, "or_c", rComp[1], lComp[3], [rw, lw]);
		this.binary(set, "or_i", lComp[2], rComp[3], [lw, rw]);
		this.binary(set, "or_i", rComp[2], lComp[3], [rw, lw]);
		this.binary(set, "or_i", lComp[3], rComp[2], [lw, rw]);
		this.binary(set, "or_i", rComp[3], lComp[2], [rw, lw]);
	}

	private andOrFromConjunction(
		set: CandidateSet,
		conjunction: Policy,
		other: Policy,
		weight: number,
		otherWeight: number,
	): void {
		if (conjunction.kind !== "and") {
			return;
		}
		const { satProb, dissatProb } = set.context;
		const [x, y] = pair(conjunction.subs);
		const branchSat = weight * satProb;
		const branchDissat = (dissatProb ?? 0) + otherWeight * satProb;
		const a1 = this.compile(x, { satProb: branchSat, dissatProb: branchDissat });
		const a2 = this.compile(x, { satProb: branchSat });
		const b1 = this.compile(y, { satProb: branchSat, dissatProb: branchDissat });
		const b2 = this.compile(y, { satProb: branchSat });
		const c = this.compile(other, { satProb: otherWeight * satProb, dissatProb });

		this.andOr(set, a1.candidates, b2.candidates, c.candidates, [weight, otherWeight]);
		this.andOr(set, b1.candidates, a2.candidates, c.candidates, [weight, otherWeight]);
	}

	private threshold(k: number, subs: readonly Policy[], set: CandidateSet): void {
		const { satProb, dissatProb } = set.context;
		const n = subs.length;
		const ratio = k / n;
		const subContext: ProbabilityContext = {
			satProb: satProb * ratio,
			dissatProb: (dissatProb ?? 0) + (1 - ratio) * satProb,
		};

		const bests: { base: Candidate; wrapped: Candidate; gain: number }[] = [];
		for (const sub of subs) {
			const compiled = this.compile(sub, subContext);
			const base = compiled.best(({ type }) => type.has("Bdue"));
			const wrapped = compiled.best(({ type }) => type.has("Wdue"));
			if (base === undefined || wrapped === undefined) {
				break;
			}
			bests.push({ base, wrapped, gain: compiled.cost(base) - compiled.cost(wrapped) });
		}
		if (bests.length === n) {
			let first = 0;
			bests.forEach(({ gain }, i) => {
				if (gain < bests[first].gain) {
					first = i;
				}
			});
			const chosen = [bests[first].base, ...bests.filter((_, i) => i !== first).map((b) => b.wrapped)];
			const fragment = tryBuild(() => Fragment.thresh(k, chosen.map((c) => c.fragment)));
			if (fragment !== undefined) {
				set.insertWithCasts({ fragment, comp: threshExt(k, chosen.map((c) => c.comp)) });
			}
		}

		const keys = subs.flatMap((sub) => (sub.kind === "key" ? [sub.key] : []));
		if (keys.length === n && n <= MAX_MULTI_KEYS) {
			this.terminal(set, Fragment.multi(k, keys));
		}

		if (k === n) {
			const conjunction = subs.reduceRight((acc, sub) => ({ kind: "and", subs: [sub, acc] }));
			for (const candidate of this.compile(conjunction, set.context).candidates) {
				set.insert(candidate);
			}
		}
	}

	private terminal(set: CandidateSet, fragment: Fragment): void {
		set.insertWithCasts({ fragment, comp: terminalExt(fragment, this.config.costModel) });
	}

	private falseCandidate(): Candidate {
		const fragment = Fragment.false();
		return { fragment, comp: terminalExt(fragment, this.config.costModel) };
	}

	private binary(
		set: CandidateSet,
		kind: CompiledBinaryKind,
		left: CandidateSet,
		right: CandidateSet,
		weights: BranchWeights,
	): void {
		const build = BINARY_BUILDERS[kind];
		for (const l of left.candidates) {
			for (const r of right.candidates) {
				const fragment = tryBuild(() => build(l.fragment, r.fragment));
				if (fragment !== undefined) {
					set.insertWithCasts({ fragment, comp: binaryExt(kind, l.comp, r.comp, weights) });
				}
			}
		}
	}

	private andOr(
		set: CandidateSet,
		conditions: readonly Candidate[],
		thens: readonly Candidate[],
		elses: readonly Candidate[],
		weights: BranchWeights,
	): void {
		for (const a of conditions) {
			for (const b of thens) {
				for (const c of elses) {
					const fragment = tryBuild(() => Fragment.andOr(a.fragment, b.fragment, c.fragment));
					if (fragment !== undefined) {
						set.insertWithCasts({ fragment, comp: andOrExt(a.comp, b.comp, c.comp, weights) });
					}
				}
			}
		}
	}
}

function pair<T>(items: readonly T[]): [T, T] {
	if (items.length !== 2) {
		throw new Error(`Expected a binary node, found ${items.length} children`);
	}
	return [items[0], items[1]];
}

/**
 * Compile a policy (or its text) to the cheapest fragment.
 *
 * @throws CompileError when no acceptable encoding exists
 */
export function compilePolicy(policy: Policy | string, config?: CompilerConfig): Fragment {
	return new PolicyCompiler(config).compile(policy).fragment;
}
