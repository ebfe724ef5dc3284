/**
 * Policy compiler types
 */

import type { Fragment } from "../fragment/index.js";

/**
 * Weights and witness element sizes used to score candidate encodings.
 *
 * Cost of a candidate = scriptSizeWeight × script bytes
 *   + witnessWeight × (P(sat) × expected sat bytes + P(dissat) × dissat bytes)
 */
export interface CostModel {
	/** Serialized signature, including its length prefix (default 73) */
	signatureSize: number;
	/** Serialized compressed public key, including its length prefix (default 34) */
	publicKeySize: number;
	/** Serialized 32-byte preimage, including its length prefix (default 33) */
	preimageSize: number;
	/** Weight of one script byte (default 1) */
	scriptSizeWeight: number;
	/** Weight of one expected witness byte (default 1) */
	witnessWeight: number;
}

/**
 * Options accepted by `PolicyCompiler` and `compilePolicy`. Anything left
 * out takes the default.
 */
export interface CompilerConfig {
	costModel?: Partial<CostModel>;
	/** Reject results whose root is not safe (`s`): every spend needs a signature */
	requireSafe?: boolean;
	/** Largest acceptable script, in bytes (default 3600) */
	maxScriptSize?: number;
}

export interface ResolvedCompilerConfig {
	costModel: CostModel;
	requireSafe: boolean;
	maxScriptSize: number;
}

export interface CompilationResult {
	fragment: Fragment;
	/** Cost of `fragment` under the configured cost model */
	cost: number;
	/** Number of candidate encodings considered during the search */
	candidatesExplored: number;
}

export type CompileErrorCode =
	| "NO_CANDIDATE"
	| "NOT_SAFE"
	| "TIMELOCK_MIXING"
	| "SCRIPT_TOO_LARGE"
	| "INVALID_POLICY"
	| "INVALID_CONFIG";

export class CompileError extends Error {
	constructor(
		message: string,
		public readonly code: CompileErrorCode,
		public readonly details?: Record<string, unknown>,
		cause?: unknown,
	) {
		super(message, { cause });
		this.name = "CompileError";
	}
}
