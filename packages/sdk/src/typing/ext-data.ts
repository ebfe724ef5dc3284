/**
 * Extended fragment data
 *
 * Script size and worst-case witness sizes, computed once per node from the
 * children's data. Witness sizes are in serialized bytes: every stack
 * element counts its length prefix.
 */

import type { FragmentNode } from "../fragment/types.js";
import { scriptNumSize } from "../utils/index.js";

export interface ExtData {
	/** Encoded script length in bytes */
	scriptSize: number;
	/** Largest satisfaction witness, undefined when none exists */
	maxSatSize?: number;
	/** Largest canonical dissatisfaction witness, undefined when none exists */
	maxDissatSize?: number;
	/** Whether the script ends in EQUAL, CHECKSIG or CHECKMULTISIG */
	hasFreeVerify: boolean;
}

/** Serialized witness element sizes used by the worst-case estimates */
export const WITNESS_SIZES = {
	/** DER signature with sighash byte, plus length prefix */
	signature: 73,
	/** Compressed public key, plus length prefix */
	publicKey: 34,
	/** 32-byte hash preimage, plus length prefix */
	preimage: 33,
	/** Empty push */
	empty: 1,
	/** Push of the single byte 0x01 */
	one: 2,
} as const;

function sum(...sizes: (number | undefined)[]): number | undefined {
	let total = 0;
	for (const size of sizes) {
		if (size === undefined) {
			return undefined;
		}
		total += size;
	}
	return total;
}

function max(...sizes: (number | undefined)[]): number | undefined {
	const defined = sizes.filter((size): size is number => size !== undefined);
	return defined.length === 0 ? undefined : Math.max(...defined);
}

/**
 * Largest satisfaction of a threshold: pick which `k` children to satisfy
 * (the rest dissatisfied) so that the total is maximal.
 */
function thresholdMaxSat(k: number, subs: readonly ExtData[]): number | undefined {
	// best[j] = largest witness with exactly j satisfied children so far
	let best: (number | undefined)[] = [0];
	for (const sub of subs) {
		const next: (number | undefined)[] = [];
		for (let j = 0; j <= best.length; j++) {
			next[j] = max(
				j < best.length ? sum(best[j], sub.maxDissatSize) : undefined,
				j > 0 ? sum(best[j - 1], sub.maxSatSize) : undefined,
			);
		}
		best = next;
	}
	return best[k];
}

export function computeExtData(node: FragmentNode): ExtData {
	const { signature, publicKey, preimage, empty, one } = WITNESS_SIZES;
	switch (node.kind) {
		case "pk_k":
			return { scriptSize: 34, maxSatSize: signature, maxDissatSize: empty, hasFreeVerify: false };
		case "pk_h":
			return {
				scriptSize: 24,
				maxSatSize: signature + publicKey,
				maxDissatSize: empty + publicKey,
				hasFreeVerify: false,
			};
		case "older":
		case "after":
			return { scriptSize: scriptNumSize(node.value) + 1, maxSatSize: 0, hasFreeVerify: false };
		case "sha256":
		case "hash256":
			return { scriptSize: 39, maxSatSize: preimage, maxDissatSize: preimage, hasFreeVerify: true };
		case "ripemd160":
		case "hash160":
			return { scriptSize: 27, maxSatSize: preimage, maxDissatSize: preimage, hasFreeVerify: true };
		case "true":
			return { scriptSize: 1, maxSatSize: 0, hasFreeVerify: false };
		case "false":
			return { scriptSize: 1, maxDissatSize: 0, hasFreeVerify: false };

		case "alt": {
			const x = node.sub.ext;
			return { ...x, scriptSize: x.scriptSize + 2, hasFreeVerify: false };
		}
		case "swap": {
			const x = node.sub.ext;
			return { ...x, scriptSize: x.scriptSize + 1 };
		}
		case "check": {
			const x = node.sub.ext;
			return { ...x, scriptSize: x.scriptSize + 1, hasFreeVerify: true };
		}
		case "dupif": {
			const x = node.sub.ext;
			return {
				scriptSize: x.scriptSize + 3,
				maxSatSize: sum(x.maxSatSize, one),
				maxDissatSize: empty,
				hasFreeVerify: false,
			};
		}
		case "verify": {
			const x = node.sub.ext;
			return {
				scriptSize: x.scriptSize + (x.hasFreeVerify ? 0 : 1),
				maxSatSize: x.maxSatSize,
				hasFreeVerify: false,
			};
		}
		case "nonzero": {
			const x = node.sub.ext;
			return {
				scriptSize: x.scriptSize + 4,
				maxSatSize: x.maxSatSize,
				maxDissatSize: empty,
				hasFreeVerify: false,
			};
		}
		case "zero_not_equal": {
			const x = node.sub.ext;
			return { ...x, scriptSize: x.scriptSize + 1, hasFreeVerify: false };
		}

		case "and_v": {
			const x = node.left.ext;
			const y = node.right.ext;
			return {
				scriptSize: x.scriptSize + y.scriptSize,
				maxSatSize: sum(x.maxSatSize, y.maxSatSize),
				hasFreeVerify: y.hasFreeVerify,
			};
		}
		case "and_b": {
			const x = node.left.ext;
			const y = node.right.ext;
			return {
				scriptSize: x.scriptSize + y.scriptSize + 1,
				maxSatSize: sum(x.maxSatSize, y.maxSatSize),
				maxDissatSize: sum(x.maxDissatSize, y.maxDissatSize),
				hasFreeVerify: false,
			};
		}
		case "or_b": {
			const x = node.left.ext;
			const z = node.right.ext;
			return {
				scriptSize: x.scriptSize + z.scriptSize + 1,
				maxSatSize: max(sum(x.maxSatSize, z.maxDissatSize), sum(x.maxDissatSize, z.maxSatSize)),
				maxDissatSize: sum(x.maxDissatSize, z.maxDissatSize),
				hasFreeVerify: false,
			};
		}
		case "or_d": {
			const x = node.left.ext;
			const z = node.right.ext;
			return {
				scriptSize: x.scriptSize + z.scriptSize + 3,
				maxSatSize: max(x.maxSatSize, sum(x.maxDissatSize, z.maxSatSize)),
				maxDissatSize: sum(x.maxDissatSize, z.maxDissatSize),
				hasFreeVerify: false,
			};
		}
		case "or_c": {
			const x = node.left.ext;
			const z = node.right.ext;
			return {
				scriptSize: x.scriptSize + z.scriptSize + 2,
				maxSatSize: max(x.maxSatSize, sum(x.maxDissatSize, z.maxSatSize)),
				hasFreeVerify: false,
			};
		}
		case "or_i": {
			const x = node.left.ext;
			const z = node.right.ext;
			return {
				scriptSize: x.scriptSize + z.scriptSize + 3,
				maxSatSize: max(sum(x.maxSatSize, one), sum(z.maxSatSize, empty)),
				maxDissatSize: max(sum(x.maxDissatSize, one), sum(z.maxDissatSize, empty)),
				hasFreeVerify: false,
			};
		}
		case "andor": {
			const x = node.a.ext;
			const y = node.b.ext;
			const z = node.c.ext;
			return {
				scriptSize: x.scriptSize + y.scriptSize + z.scriptSize + 3,
				maxSatSize: max(sum(x.maxSatSize, y.maxSatSize), sum(x.maxDissatSize, z.maxSatSize)),
				maxDissatSize: sum(x.maxDissatSize, z.maxDissatSize),
				hasFreeVerify: false,
			};
		}
		case "thresh": {
			const subs = node.subs.map((sub) => sub.ext);
			return {
				scriptSize:
					subs.reduce((total, sub) => total + sub.scriptSize, 0) +
					(subs.length - 1) +
					scriptNumSize(node.k) +
					1,
				maxSatSize: thresholdMaxSat(node.k, subs),
				maxDissatSize: sum(...subs.map((sub) => sub.maxDissatSize)),
				hasFreeVerify: true,
			};
		}
		case "multi": {
			const n = node.keys.length;
			return {
				scriptSize: scriptNumSize(node.k) + 34 * n + scriptNumSize(n) + 1,
				maxSatSize: empty + signature * node.k,
				maxDissatSize: empty * (node.k + 1),
				hasFreeVerify: true,
			};
		}
	}
}
