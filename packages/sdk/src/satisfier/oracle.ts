import {
	HASH_FUNCTIONS,
	HashFunction,
	PrimitiveError,
	PublicKey,
	hashPreimage,
	isAfterSatisfied,
	isOlderSatisfied,
	keyHash,
	publicKeyFromHex,
	validatePreimage,
	validatePublicKey,
} from "../primitives/index.js";
import { bytesToHex } from "../utils/index.js";
import { OracleData, SatisfactionOracle, SatisfierError } from "./types.js";

function checked<T>(what: string, read: () => T): T {
	try {
		return read();
	} catch (error) {
		if (error instanceof PrimitiveError) {
			throw new SatisfierError(`Invalid ${what}: ${error.message}`, "INVALID_ORACLE_DATA", {
				cause: error.code,
			});
		}
		throw error;
	}
}

function checkTxField(name: string, value: number | undefined): void {
	if (value !== undefined && (!Number.isInteger(value) || value < 0 || value > 0xffffffff)) {
		throw new SatisfierError(`${name} must be a 32-bit unsigned integer`, "INVALID_ORACLE_DATA", {
			[name]: value,
		});
	}
}

/**
 * Map-backed oracle over signatures, preimages and transaction fields
 * known up front.
 *
 * @throws SatisfierError when a key or preimage is malformed
 */
export function createOracle(data: OracleData): SatisfactionOracle {
	const signatures = new Map<string, Uint8Array>();
	const keysByHash = new Map<string, PublicKey>();
	const addKey = (key: PublicKey): void => {
		keysByHash.set(bytesToHex(keyHash(key)), key);
	};

	const signed: Readonly<Record<string, Uint8Array>> = data.signatures ?? {};
	for (const [keyHex, signature] of Object.entries(signed)) {
		const key = checked("signature key", () => publicKeyFromHex(keyHex));
		signatures.set(bytesToHex(key), signature);
		addKey(key);
	}
	for (const key of data.publicKeys ?? []) {
		addKey(checked("public key", () => validatePublicKey(key)));
	}

	const preimages = new Map<string, Uint8Array>();
	for (const preimage of data.preimages ?? []) {
		checked("preimage", () => validatePreimage(preimage));
		for (const fn of HASH_FUNCTIONS) {
			preimages.set(`${fn}:${bytesToHex(hashPreimage(fn, preimage))}`, preimage);
		}
	}

	checkTxField("sequence", data.sequence);
	checkTxField("lockTime", data.lockTime);
	const { sequence, lockTime } = data;

	return {
		lookupSignature: (key) => signatures.get(bytesToHex(key)),
		lookupPublicKey: (hash) => keysByHash.get(bytesToHex(hash)),
		lookupPreimage: (fn: HashFunction, digest) => preimages.get(`${fn}:${bytesToHex(digest)}`),
		isTimelockSatisfied: (kind, value) =>
			kind === "older"
				? sequence !== undefined && isOlderSatisfied(sequence, value)
				: lockTime !== undefined && isAfterSatisfied(lockTime, value),
	};
}

/**
 * Oracle that asks each oracle in turn and takes the first answer. A
 * timelock counts as met when any oracle says so.
 */
export function combineOracles(...oracles: SatisfactionOracle[]): SatisfactionOracle {
	const first = <T>(ask: (oracle: SatisfactionOracle) => T | undefined): T | undefined => {
		for (const oracle of oracles) {
			const answer = ask(oracle);
			if (answer !== undefined) {
				return answer;
			}
		}
		return undefined;
	};
	return {
		lookupSignature: (key) => first((oracle) => oracle.lookupSignature(key)),
		lookupPublicKey: (hash) => first((oracle) => oracle.lookupPublicKey?.(hash)),
		lookupPreimage: (fn, digest) => first((oracle) => oracle.lookupPreimage(fn, digest)),
		isTimelockSatisfied: (kind, value) =>
			oracles.some((oracle) => oracle.isTimelockSatisfied(kind, value)),
	};
}
