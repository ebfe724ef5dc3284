import { bytesToHex } from "../utils/index.js";
import { FragmentNode, WRAPPER_LETTERS } from "./types.js";

interface Rendered {
	prefix: string;
	body: string;
}

function wrap(letter: string, inner: FragmentNode): Rendered {
	const rendered = render(inner);
	return { prefix: letter + rendered.prefix, body: rendered.body };
}

function body(node: FragmentNode): string {
	switch (node.kind) {
		case "pk_k":
			return `pk_k(${bytesToHex(node.key)})`;
		case "pk_h":
		case "sha256":
		case "hash256":
		case "ripemd160":
		case "hash160":
			return `${node.kind}(${bytesToHex(node.hash)})`;
		case "older":
		case "after":
			return `${node.kind}(${node.value})`;
		case "true":
			return "1";
		case "false":
			return "0";
		case "alt":
		case "swap":
		case "check":
		case "dupif":
		case "verify":
		case "nonzero":
		case "zero_not_equal":
			return `${WRAPPER_LETTERS[node.kind]}:${node.sub.toString()}`;
		case "and_v":
		case "and_b":
		case "or_b":
		case "or_c":
		case "or_d":
		case "or_i":
			return `${node.kind}(${node.left.toString()},${node.right.toString()})`;
		case "andor":
			return `andor(${node.a.toString()},${node.b.toString()},${node.c.toString()})`;
		case "thresh":
			return `thresh(${[node.k, ...node.subs.map((sub) => sub.toString())].join(",")})`;
		case "multi":
			return `multi(${[node.k, ...node.keys.map(bytesToHex)].join(",")})`;
	}
}

// Collapse wrapper chains into one prefix and apply the shorthand aliases
function render(node: FragmentNode): Rendered {
	switch (node.kind) {
		case "check": {
			const inner = node.sub.node;
			if (inner.kind === "pk_k") {
				return { prefix: "", body: `pk(${bytesToHex(inner.key)})` };
			}
			if (inner.kind === "pk_h") {
				return { prefix: "", body: `pkh(${bytesToHex(inner.hash)})` };
			}
			return wrap("c", inner);
		}
		case "alt":
		case "swap":
		case "dupif":
		case "verify":
		case "nonzero":
		case "zero_not_equal":
			return wrap(WRAPPER_LETTERS[node.kind], node.sub.node);
		case "and_v":
			if (node.right.node.kind === "true") {
				return wrap("t", node.left.node);
			}
			break;
		case "or_i":
			if (node.right.node.kind === "false") {
				return wrap("u", node.left.node);
			}
			if (node.left.node.kind === "false") {
				return wrap("l", node.right.node);
			}
			break;
		case "andor":
			if (node.c.node.kind === "false") {
				return {
					prefix: "",
					body: `and_n(${node.a.toString()},${node.b.toString()})`,
				};
			}
			break;
	}
	return { prefix: "", body: body(node) };
}

/**
 * Miniscript notation of a node, with wrapper prefixes collapsed
 * (`sdv:older(1)`) and the `pk`, `pkh`, `t:`, `u:`, `l:` and `and_n`
 * shorthands applied.
 */
export function nodeToString(node: FragmentNode): string {
	const { prefix, body: text } = render(node);
	return prefix === "" ? text : `${prefix}:${text}`;
}
