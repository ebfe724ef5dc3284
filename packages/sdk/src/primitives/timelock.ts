import {
	LOCKTIME_THRESHOLD,
	MAX_TIMELOCK_VALUE,
	PrimitiveError,
	SEQUENCE_LOCKTIME_DISABLE_FLAG,
	SEQUENCE_LOCKTIME_MASK,
	SEQUENCE_LOCKTIME_TYPE_FLAG,
	TimelockKind,
} from "./types.js";

/**
 * Whether a timelock is expressed in block heights (vs. wall-clock time).
 */
export function isHeightLock(kind: TimelockKind, value: number): boolean {
	return kind === "older"
		? (value & SEQUENCE_LOCKTIME_TYPE_FLAG) === 0
		: value < LOCKTIME_THRESHOLD;
}

export function isValidTimelock(value: number): boolean {
	return Number.isInteger(value) && value >= 1 && value <= MAX_TIMELOCK_VALUE;
}

export function validateTimelock(kind: TimelockKind, value: number): number {
	if (!isValidTimelock(value)) {
		throw new PrimitiveError(
			`Invalid ${kind} value ${value}: must be an integer in [1, ${MAX_TIMELOCK_VALUE}]`,
			"INVALID_TIMELOCK",
			{ kind, value },
		);
	}
	return value;
}

/**
 * Whether an input with the given nSequence satisfies `older(n)`.
 */
export function isOlderSatisfied(sequence: number, n: number): boolean {
	if ((sequence & SEQUENCE_LOCKTIME_DISABLE_FLAG) !== 0) {
		return false;
	}
	const mask = SEQUENCE_LOCKTIME_MASK | SEQUENCE_LOCKTIME_TYPE_FLAG;
	const maskedLock = n & mask;
	const maskedSequence = sequence & mask;
	// Height-based and time-based relative locks are not comparable
	if (
		(maskedLock < SEQUENCE_LOCKTIME_TYPE_FLAG) !==
		(maskedSequence < SEQUENCE_LOCKTIME_TYPE_FLAG)
	) {
		return false;
	}
	return maskedLock <= maskedSequence;
}

/**
 * Whether a transaction with the given nLockTime satisfies `after(n)`.
 */
export function isAfterSatisfied(lockTime: number, n: number): boolean {
	if ((n < LOCKTIME_THRESHOLD) !== (lockTime < LOCKTIME_THRESHOLD)) {
		return false;
	}
	return n <= lockTime;
}
