import { CompileError, CompilerConfig, CostModel, ResolvedCompilerConfig } from "./types.js";

export const DEFAULT_COST_MODEL: Readonly<CostModel> = Object.freeze({
	signatureSize: 73,
	publicKeySize: 34,
	preimageSize: 33,
	scriptSizeWeight: 1,
	witnessWeight: 1,
});

export const DEFAULT_COMPILER_CONFIG: Readonly<ResolvedCompilerConfig> = Object.freeze({
	costModel: DEFAULT_COST_MODEL,
	requireSafe: false,
	maxScriptSize: 3600,
});

const COST_MODEL_FIELDS: readonly (keyof CostModel)[] = [
	"signatureSize",
	"publicKeySize",
	"preimageSize",
	"scriptSizeWeight",
	"witnessWeight",
];

/**
 * Merge options over the defaults and validate the result.
 *
 * @throws CompileError with code `INVALID_CONFIG`
 */
export function resolveCompilerConfig(config: CompilerConfig = {}): ResolvedCompilerConfig {
	const resolved: ResolvedCompilerConfig = {
		costModel: { ...DEFAULT_COST_MODEL, ...config.costModel },
		requireSafe: config.requireSafe ?? DEFAULT_COMPILER_CONFIG.requireSafe,
		maxScriptSize: config.maxScriptSize ?? DEFAULT_COMPILER_CONFIG.maxScriptSize,
	};
	validateCompilerConfig(resolved);
	return resolved;
}

/**
 * @throws CompileError with code `INVALID_CONFIG`
 */
export function validateCompilerConfig(config: ResolvedCompilerConfig): void {
	const errors: string[] = [];
	for (const name of COST_MODEL_FIELDS) {
		const value = config.costModel[name];
		if (!Number.isFinite(value) || value < 0) {
			errors.push(`costModel.${name} must be a finite non-negative number, got ${value}`);
		}
	}
	if (config.costModel.scriptSizeWeight === 0 && config.costModel.witnessWeight === 0) {
		errors.push("scriptSizeWeight and witnessWeight cannot both be 0");
	}
	if (!Number.isSafeInteger(config.maxScriptSize) || config.maxScriptSize < 1) {
		errors.push(`maxScriptSize must be a positive integer, got ${config.maxScriptSize}`);
	}
	if (errors.length > 0) {
		throw new CompileError(`Invalid compiler config: ${errors.join("; ")}`, "INVALID_CONFIG", {
			errors,
		});
	}
}
