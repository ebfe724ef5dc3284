/**
 * Typing - basic types, properties and size data of fragments
 */

export type { BasicType, FragmentTypeErrorCode } from "./types.js";
export { FragmentType, FragmentTypeError } from "./types.js";

export { deriveType } from "./rules.js";

export type { ExtData } from "./ext-data.js";
export { computeExtData, WITNESS_SIZES } from "./ext-data.js";

export type { SanityIssue } from "./sanity.js";
export { checkSanity, MAX_STANDARD_SCRIPT_SIZE } from "./sanity.js";
