/**
 * Compiler - abstract policy to cheapest typed fragment
 */

export type {
	CostModel,
	CompilerConfig,
	ResolvedCompilerConfig,
	CompilationResult,
	CompileErrorCode,
} from "./types.js";
export { CompileError } from "./types.js";

export {
	DEFAULT_COST_MODEL,
	DEFAULT_COMPILER_CONFIG,
	resolveCompilerConfig,
	validateCompilerConfig,
} from "./config.js";
export type { CompilerExtData, BranchWeights } from "./compiler-ext.js";
export type { Candidate, ProbabilityContext } from "./candidates.js";
export { CandidateSet, candidateCost } from "./candidates.js";
export { PolicyCompiler, compilePolicy, binarizePolicy } from "./compiler.js";
