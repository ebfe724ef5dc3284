export {
	bytesToHex,
	hexToBytes,
	isHex,
	bytesEqual,
	compareBytes,
} from "./encoding.js";

export {
	encodeScriptNum,
	decodeScriptNum,
	scriptNumSize,
	varIntSize,
} from "./script-num.js";

export type { ExpressionToken, ExpressionTokenKind, Span } from "./tokenizer.js";
export { tokenizeExpression, ExpressionCursor } from "./tokenizer.js";
