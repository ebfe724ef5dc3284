import {
	HASH_DIGEST_LENGTHS,
	KEY_HASH_LENGTH,
	isValidPublicKey,
	isValidTimelock,
	keyHash,
} from "../primitives/index.js";
import { bytesToHex } from "../utils/index.js";
import { Policy, PolicyError } from "./types.js";

/**
 * Check the constraints local to one policy node (children are not
 * visited).
 *
 * @throws PolicyError
 */
export function validatePolicyNode(policy: Policy): void {
	switch (policy.kind) {
		case "key":
			if (!isValidPublicKey(policy.key)) {
				throw new PolicyError("Invalid public key", "INVALID_KEY", {
					key: bytesToHex(policy.key),
				});
			}
			return;
		case "key_hash":
			if (policy.hash.length !== KEY_HASH_LENGTH) {
				throw new PolicyError(
					`Key hash must be ${KEY_HASH_LENGTH} bytes, got ${policy.hash.length}`,
					"INVALID_KEY",
				);
			}
			return;
		case "after":
		case "older":
			if (!isValidTimelock(policy.value)) {
				throw new PolicyError(
					`${policy.kind}(${policy.value}) is out of range`,
					"INVALID_TIMELOCK",
					{ value: policy.value },
				);
			}
			return;
		case "hash": {
			const expected = HASH_DIGEST_LENGTHS[policy.fn];
			if (policy.digest.length !== expected) {
				throw new PolicyError(
					`${policy.fn} digest must be ${expected} bytes, got ${policy.digest.length}`,
					"INVALID_DIGEST",
				);
			}
			return;
		}
		case "and":
			if (policy.subs.length < 2) {
				throw new PolicyError("and() needs at least two conditions", "INVALID_ARITY");
			}
			return;
		case "or":
			if (policy.branches.length < 2) {
				throw new PolicyError("or() needs at least two branches", "INVALID_ARITY");
			}
			for (const { weight } of policy.branches) {
				if (!Number.isSafeInteger(weight) || weight < 1) {
					throw new PolicyError(
						`Branch weight must be a positive integer, got ${weight}`,
						"INVALID_WEIGHT",
						{ weight },
					);
				}
			}
			return;
		case "thresh": {
			const n = policy.subs.length;
			if (n === 0) {
				throw new PolicyError("thresh() needs at least one condition", "INVALID_ARITY");
			}
			if (!Number.isSafeInteger(policy.k) || policy.k < 1 || policy.k > n) {
				throw new PolicyError(
					`Threshold ${policy.k} is not in [1, ${n}]`,
					"INVALID_THRESHOLD",
					{ k: policy.k, n },
				);
			}
			return;
		}
	}
}

function* nodes(policy: Policy): Generator<Policy> {
	yield policy;
	switch (policy.kind) {
		case "and":
		case "thresh":
			for (const sub of policy.subs) {
				yield* nodes(sub);
			}
			break;
		case "or":
			for (const branch of policy.branches) {
				yield* nodes(branch.policy);
			}
			break;
	}
}

/**
 * Validate a whole policy tree: every node's local constraints plus key
 * uniqueness across the tree. A key and a key hash of that key count as
 * the same key.
 *
 * @throws PolicyError
 */
export function validatePolicy(policy: Policy): Policy {
	const seen = new Set<string>();
	for (const node of nodes(policy)) {
		validatePolicyNode(node);
		if (node.kind === "key" || node.kind === "key_hash") {
			const written = bytesToHex(node.kind === "key" ? node.key : node.hash);
			// a key and its hash160 name the same signer
			const id = node.kind === "key" ? bytesToHex(keyHash(node.key)) : written;
			if (seen.has(id)) {
				throw new PolicyError(`Key ${written} is used more than once`, "DUPLICATE_KEY", { key: written });
			}
			seen.add(id);
		}
	}
	return policy;
}
