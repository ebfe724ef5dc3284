/**
 * Fragment - typed miniscript AST
 */

export type {
	FragmentNode,
	FragmentKind,
	WrapperKind,
	BinaryKind,
	FragmentParseErrorCode,
} from "./types.js";
export {
	FragmentParseError,
	WRAPPER_LETTERS,
	MAX_MULTI_KEYS,
	isWrapperKind,
} from "./types.js";

export { Fragment } from "./fragment.js";
export { parseFragment } from "./parse.js";
export { nodeToString } from "./display.js";
