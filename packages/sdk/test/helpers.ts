import { PublicKey } from "../src/primitives/index.js";
import { SatisfactionOracle } from "../src/satisfier/index.js";
import { TransactionChecker } from "../src/interpreter/index.js";
import { bytesEqual, bytesToHex } from "../src/utils/index.js";

/** Compressed-format test key: 0x02 followed by 32 copies of `n` */
export function testKey(n: number): PublicKey {
	const key = new Uint8Array(33).fill(n);
	key[0] = 0x02;
	return key;
}

export function testKeyHex(n: number): string {
	return bytesToHex(testKey(n));
}

/**
 * A 72-byte stand-in signature that embeds the key it was "made" with, so
 * a checker can verify it without curve arithmetic.
 */
export function fakeSignature(key: PublicKey): Uint8Array {
	const signature = new Uint8Array(72);
	signature[0] = 0x30;
	signature.set(key, 1);
	signature.set(key, 34);
	signature[71] = 0x01;
	return signature;
}

export function isFakeSignatureFor(signature: Uint8Array, key: Uint8Array): boolean {
	return signature.length === 72 && bytesEqual(signature, fakeSignature(key));
}

/** Oracle backed by jest mocks; nothing is available unless configured. */
export function mockOracle(overrides: Partial<SatisfactionOracle> = {}) {
	const lookupSignature: SatisfactionOracle["lookupSignature"] =
		overrides.lookupSignature ?? (() => undefined);
	const lookupPublicKey: NonNullable<SatisfactionOracle["lookupPublicKey"]> =
		overrides.lookupPublicKey ?? (() => undefined);
	const lookupPreimage: SatisfactionOracle["lookupPreimage"] =
		overrides.lookupPreimage ?? (() => undefined);
	const isTimelockSatisfied: SatisfactionOracle["isTimelockSatisfied"] =
		overrides.isTimelockSatisfied ?? (() => false);
	return {
		lookupSignature: jest.fn(lookupSignature),
		lookupPublicKey: jest.fn(lookupPublicKey),
		lookupPreimage: jest.fn(lookupPreimage),
		isTimelockSatisfied: jest.fn(isTimelockSatisfied),
	};
}

/** Checker that accepts fake signatures and the given nSequence/nLockTime. */
export function fakeChecker(tx: { sequence?: number; lockTime?: number } = {}): TransactionChecker {
	return {
		checkSignature: (signature, key) => isFakeSignatureFor(signature, key),
		checkOlder: (value) => tx.sequence !== undefined && value <= tx.sequence,
		checkAfter: (value) => tx.lockTime !== undefined && value <= tx.lockTime,
	};
}
