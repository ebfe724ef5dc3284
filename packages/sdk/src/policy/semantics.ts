import {
	hashPreimage,
	isAfterSatisfied,
	isOlderSatisfied,
	keyHash,
} from "../primitives/index.js";
import { bytesToHex, hexToBytes } from "../utils/index.js";
import { AvailableCapabilities, Policy, PolicyLeaf } from "./types.js";

/**
 * Leaf conditions of a policy, left to right.
 */
export function policyLeaves(policy: Policy): PolicyLeaf[] {
	switch (policy.kind) {
		case "unsatisfiable":
		case "trivial":
			return [];
		case "and":
		case "thresh":
			return policy.subs.flatMap(policyLeaves);
		case "or":
			return policy.branches.flatMap(({ policy: sub }) => policyLeaves(sub));
		default:
			return [policy];
	}
}

interface CapabilitySet {
	keys: Set<string>;
	keyHashes: Set<string>;
	digests: Set<string>;
	sequence?: number;
	lockTime?: number;
}

function toCapabilitySet(available: AvailableCapabilities): CapabilitySet {
	const keys = new Set([...(available.keys ?? [])].map((key) => key.toLowerCase()));
	const keyHashes = new Set([...(available.keyHashes ?? [])].map((h) => h.toLowerCase()));
	for (const key of keys) {
		keyHashes.add(bytesToHex(keyHash(hexToBytes(key))));
	}
	return {
		keys,
		keyHashes,
		digests: new Set([...(available.preimages ?? [])].map((d) => d.toLowerCase())),
		sequence: available.sequence,
		lockTime: available.lockTime,
	};
}

function evaluate(policy: Policy, caps: CapabilitySet): boolean {
	switch (policy.kind) {
		case "unsatisfiable":
			return false;
		case "trivial":
			return true;
		case "key":
			return caps.keys.has(bytesToHex(policy.key));
		case "key_hash":
			return caps.keyHashes.has(bytesToHex(policy.hash));
		case "older":
			return caps.sequence !== undefined && isOlderSatisfied(caps.sequence, policy.value);
		case "after":
			return caps.lockTime !== undefined && isAfterSatisfied(caps.lockTime, policy.value);
		case "hash":
			return caps.digests.has(bytesToHex(policy.digest));
		case "and":
			return policy.subs.every((sub) => evaluate(sub, caps));
		case "or":
			return policy.branches.some(({ policy: sub }) => evaluate(sub, caps));
		case "thresh":
			return policy.subs.filter((sub) => evaluate(sub, caps)).length >= policy.k;
	}
}

/**
 * Whether a spender holding the given capabilities meets the policy.
 * Holding a key also counts for any `pkh` of that key.
 */
export function isPolicySatisfied(policy: Policy, available: AvailableCapabilities): boolean {
	return evaluate(policy, toCapabilitySet(available));
}

/**
 * Capabilities for `isPolicySatisfied` from known preimages, hashed under
 * every hashlock function the policy uses.
 */
export function preimageDigests(policy: Policy, preimages: readonly Uint8Array[]): string[] {
	const fns = new Set(
		policyLeaves(policy).flatMap((leaf) => (leaf.kind === "hash" ? [leaf.fn] : [])),
	);
	return [...fns].flatMap((fn) => preimages.map((p) => bytesToHex(hashPreimage(fn, p))));
}
