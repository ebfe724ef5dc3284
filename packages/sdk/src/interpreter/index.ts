/**
 * Interpreter - executes compiled scripts against witnesses
 */

export type {
	TransactionChecker,
	InterpreterErrorCode,
	VerificationResult,
	SatisfiedConstraint,
} from "./types.js";
export { ScriptExecutionError } from "./types.js";
export { verifyWitness } from "./interpreter.js";
