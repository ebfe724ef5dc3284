/**
 * Spendscript SDK
 *
 * Typed miniscript fragments, their script encoding, a cost-guided policy
 * compiler and a witness satisfier.
 *
 * @example
 * ```typescript
 * import { compilePolicy, encodeFragment, createOracle, satisfy } from "@spendscript/sdk";
 *
 * const fragment = compilePolicy(`or(9@pk(${alice}),1@and(pk(${bob}),older(144)))`);
 * const script = encodeFragment(fragment);
 *
 * const result = satisfy(fragment, createOracle({ signatures: { [alice]: aliceSig } }));
 * if (result.status === "satisfied") {
 *   // result.witness is the stack to place before the script
 * }
 * ```
 */

// Primitives - keys, hashes and timelocks
export {
	type PublicKey,
	type KeyHash,
	type HashFunction,
	type TimelockKind,
	type PrimitiveErrorCode,
	PrimitiveError,
	PUBLIC_KEY_LENGTH,
	KEY_HASH_LENGTH,
	PREIMAGE_LENGTH,
	HASH_DIGEST_LENGTHS,
	HASH_FUNCTIONS,
	LOCKTIME_THRESHOLD,
	MAX_TIMELOCK_VALUE,
	isValidPublicKey,
	validatePublicKey,
	publicKeyFromHex,
	keyHash,
	isHashFunction,
	hashPreimage,
	isValidTimelock,
	isOlderSatisfied,
	isAfterSatisfied,
} from "./primitives/index.js";

// Typing - correctness and malleability properties
export {
	type BasicType,
	type FragmentTypeErrorCode,
	type ExtData,
	type SanityIssue,
	FragmentType,
	FragmentTypeError,
	MAX_STANDARD_SCRIPT_SIZE,
	deriveType,
	checkSanity,
} from "./typing/index.js";

// Fragment - the typed AST
export {
	type FragmentNode,
	type FragmentKind,
	type WrapperKind,
	type BinaryKind,
	type FragmentParseErrorCode,
	Fragment,
	FragmentParseError,
	parseFragment,
} from "./fragment/index.js";

// Codec - script bytes
export {
	type ScriptDecodeErrorCode,
	ScriptDecodeError,
	encodeFragment,
	decodeScript,
	lexScript,
	scriptToAsm,
} from "./codec/index.js";

// Policy - abstract spending conditions
export {
	type Policy,
	type PolicyKind,
	type WeightedPolicy,
	type AvailableCapabilities,
	type PolicyErrorCode,
	type PolicyParseErrorCode,
	PolicyError,
	PolicyParseError,
	parsePolicy,
	validatePolicy,
	policyToString,
	liftFragment,
	isPolicySatisfied,
	policyLeaves,
	preimageDigests,
} from "./policy/index.js";

// Compiler
export {
	type CostModel,
	type CompilerConfig,
	type CompilationResult,
	type CompileErrorCode,
	CompileError,
	DEFAULT_COST_MODEL,
	DEFAULT_COMPILER_CONFIG,
	validateCompilerConfig,
	PolicyCompiler,
	compilePolicy,
} from "./compiler/index.js";

// Satisfier
export {
	type SatisfactionOracle,
	type OracleData,
	type SatisfyOptions,
	type SatisfactionResult,
	type UnsatisfiableReason,
	type SatisfierErrorCode,
	SatisfierError,
	Satisfier,
	createOracle,
	combineOracles,
	satisfy,
	witnessSize,
} from "./satisfier/index.js";

// Interpreter
export {
	type TransactionChecker,
	type InterpreterErrorCode,
	type VerificationResult,
	type SatisfiedConstraint,
	ScriptExecutionError,
	verifyWitness,
} from "./interpreter/index.js";

// Utils
export { bytesToHex, hexToBytes, bytesEqual } from "./utils/index.js";
