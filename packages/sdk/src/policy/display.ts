import { bytesToHex } from "../utils/index.js";
import { Policy } from "./types.js";

/**
 * Textual form of a policy, as accepted by `parsePolicy`. Branch weights
 * are printed only when they differ from 1.
 */
export function policyToString(policy: Policy): string {
	switch (policy.kind) {
		case "unsatisfiable":
			return "UNSATISFIABLE";
		case "trivial":
			return "TRIVIAL";
		case "key":
			return `pk(${bytesToHex(policy.key)})`;
		case "key_hash":
			return `pkh(${bytesToHex(policy.hash)})`;
		case "after":
		case "older":
			return `${policy.kind}(${policy.value})`;
		case "hash":
			return `${policy.fn}(${bytesToHex(policy.digest)})`;
		case "and":
			return `and(${policy.subs.map(policyToString).join(",")})`;
		case "or":
			return `or(${policy.branches
				.map(({ weight, policy: sub }) =>
					weight === 1 ? policyToString(sub) : `${weight}@${policyToString(sub)}`,
				)
				.join(",")})`;
		case "thresh":
			return `thresh(${[policy.k, ...policy.subs.map(policyToString)].join(",")})`;
	}
}
