import type { Fragment } from "../fragment/fragment.js";
import { keyHash } from "../primitives/index.js";
import { bytesToHex } from "../utils/index.js";

/** Standardness limit on P2WSH witness scripts */
export const MAX_STANDARD_SCRIPT_SIZE = 3600;

export type SanityIssue =
	| "NOT_BASE"
	| "MALLEABLE"
	| "NOT_SAFE"
	| "TIMELOCK_MIXING"
	| "DUPLICATE_KEYS"
	| "SCRIPT_TOO_LARGE";

function hasDuplicateKeys(fragment: Fragment): boolean {
	const seen = new Set<string>();
	for (const { node: n } of fragment.walk()) {
		const hashes =
			n.kind === "pk_k"
				? [keyHash(n.key)]
				: n.kind === "pk_h"
					? [n.hash]
					: n.kind === "multi"
						? n.keys.map(keyHash)
						: [];
		for (const hash of hashes) {
			const id = bytesToHex(hash);
			if (seen.has(id)) {
				return true;
			}
			seen.add(id);
		}
	}
	return false;
}

/**
 * Checks a fragment intended as a complete witness script. Returns the
 * failed checks, empty when the fragment is sane.
 */
export function checkSanity(fragment: Fragment): SanityIssue[] {
	const issues: SanityIssue[] = [];
	const { type } = fragment;
	if (type.base !== "B") issues.push("NOT_BASE");
	if (!type.nonMalleable) issues.push("MALLEABLE");
	if (!type.safe) issues.push("NOT_SAFE");
	if (!type.noTimelockMixing) issues.push("TIMELOCK_MIXING");
	if (hasDuplicateKeys(fragment)) issues.push("DUPLICATE_KEYS");
	if (fragment.ext.scriptSize > MAX_STANDARD_SCRIPT_SIZE) {
		issues.push("SCRIPT_TOO_LARGE");
	}
	return issues;
}
