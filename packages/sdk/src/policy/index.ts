/**
 * Policy - abstract spending conditions
 */

export type {
	Policy,
	PolicyKind,
	PolicyLeaf,
	WeightedPolicy,
	AvailableCapabilities,
	PolicyErrorCode,
	PolicyParseErrorCode,
} from "./types.js";
export { PolicyError, PolicyParseError } from "./types.js";

export { parsePolicy } from "./parser.js";
export { validatePolicy, validatePolicyNode } from "./validate.js";
export { policyToString } from "./display.js";
export { liftFragment } from "./lift.js";
export { isPolicySatisfied, policyLeaves, preimageDigests } from "./semantics.js";
