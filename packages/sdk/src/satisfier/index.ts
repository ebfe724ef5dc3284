/**
 * Satisfier - witnesses from an oracle of signatures, preimages and timelocks
 */

export type {
	SatisfactionOracle,
	OracleData,
	SatisfyOptions,
	SatisfactionResult,
	UnsatisfiableReason,
	SatisfierErrorCode,
} from "./types.js";
export { SatisfierError } from "./types.js";

export { createOracle, combineOracles } from "./oracle.js";
export { Satisfier, satisfy } from "./satisfier.js";
export type { Satisfaction, WitnessStack } from "./witness.js";
export { witnessSize } from "./witness.js";
