/**
 * Fragment encoder
 *
 * One fixed opcode template per fragment kind, children encoded in place.
 * Serialization goes through `Script.encode`, which picks the minimal push
 * for data and numbers.
 */

import { Script } from "@scure/btc-signer";

import type { Fragment } from "../fragment/index.js";

type ScriptItem = Parameters<typeof Script.encode>[0][number];

const VERIFY_FORMS = {
	EQUAL: "EQUALVERIFY",
	CHECKSIG: "CHECKSIGVERIFY",
	CHECKMULTISIG: "CHECKMULTISIGVERIFY",
} as const;

function isFusible(item: ScriptItem | undefined): item is keyof typeof VERIFY_FORMS {
	return typeof item === "string" && item in VERIFY_FORMS;
}

const HASH_OPCODES = {
	sha256: "SHA256",
	hash256: "HASH256",
	ripemd160: "RIPEMD160",
	hash160: "HASH160",
} as const;

function emit(fragment: Fragment, out: ScriptItem[]): void {
	const { node } = fragment;
	switch (node.kind) {
		case "pk_k":
			out.push(node.key);
			return;
		case "pk_h":
			out.push("DUP", "HASH160", node.hash, "EQUALVERIFY");
			return;
		case "older":
			out.push(node.value, "CHECKSEQUENCEVERIFY");
			return;
		case "after":
			out.push(node.value, "CHECKLOCKTIMEVERIFY");
			return;
		case "sha256":
		case "hash256":
		case "ripemd160":
		case "hash160":
			out.push("SIZE", 32, "EQUALVERIFY", HASH_OPCODES[node.kind], node.hash, "EQUAL");
			return;
		case "true":
			out.push(1);
			return;
		case "false":
			out.push(0);
			return;

		case "alt":
			out.push("TOALTSTACK");
			emit(node.sub, out);
			out.push("FROMALTSTACK");
			return;
		case "swap":
			out.push("SWAP");
			emit(node.sub, out);
			return;
		case "check":
			emit(node.sub, out);
			out.push("CHECKSIG");
			return;
		case "dupif":
			out.push("DUP", "IF");
			emit(node.sub, out);
			out.push("ENDIF");
			return;
		case "verify": {
			emit(node.sub, out);
			if (!node.sub.ext.hasFreeVerify) {
				out.push("VERIFY");
				return;
			}
			const last = out[out.length - 1];
			if (!isFusible(last)) {
				throw new Error(`Cannot fuse VERIFY into ${String(last)}`);
			}
			out[out.length - 1] = VERIFY_FORMS[last];
			return;
		}
		case "nonzero":
			out.push("SIZE", "0NOTEQUAL", "IF");
			emit(node.sub, out);
			out.push("ENDIF");
			return;
		case "zero_not_equal":
			emit(node.sub, out);
			out.push("0NOTEQUAL");
			return;

		case "and_v":
			emit(node.left, out);
			emit(node.right, out);
			return;
		case "and_b":
			emit(node.left, out);
			emit(node.right, out);
			out.push("BOOLAND");
			return;
		case "or_b":
			emit(node.left, out);
			emit(node.right, out);
			out.push("BOOLOR");
			return;
		case "or_c":
			emit(node.left, out);
			out.push("NOTIF");
			emit(node.right, out);
			out.push("ENDIF");
			return;
		case "or_d":
			emit(node.left, out);
			out.push("IFDUP", "NOTIF");
			emit(node.right, out);
			out.push("ENDIF");
			return;
		case "or_i":
			out.push("IF");
			emit(node.left, out);
			out.push("ELSE");
			emit(node.right, out);
			out.push("ENDIF");
			return;
		case "andor":
			emit(node.a, out);
			out.push("NOTIF");
			emit(node.c, out);
			out.push("ELSE");
			emit(node.b, out);
			out.push("ENDIF");
			return;
		case "thresh":
			node.subs.forEach((sub, i) => {
				emit(sub, out);
				if (i > 0) {
					out.push("ADD");
				}
			});
			out.push(node.k, "EQUAL");
			return;
		case "multi":
			out.push(node.k, ...node.keys, node.keys.length, "CHECKMULTISIG");
			return;
	}
}

/**
 * Serialize a fragment to script bytes.
 */
export function encodeFragment(fragment: Fragment): Uint8Array {
	const items: ScriptItem[] = [];
	emit(fragment, items);
	return Script.encode(items);
}
