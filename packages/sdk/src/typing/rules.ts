/**
 * Type derivation
 *
 * One composition rule per fragment kind. Each rule first checks the
 * children against the rule's preconditions, then derives the parent's
 * properties from the children's. The switch is exhaustive over
 * `FragmentKind`, so a new kind cannot compile without a rule.
 */

import { nodeToString } from "../fragment/display.js";
import { FragmentNode, MAX_MULTI_KEYS } from "../fragment/types.js";
import { isHeightLock } from "../primitives/index.js";
import { FragmentType, FragmentTypeError } from "./types.js";

const ty = (flags: string): FragmentType => FragmentType.of(flags);

class Preconditions {
	constructor(private readonly node: FragmentNode) {}

	require(child: FragmentType, flags: string, slot: string): void {
		if (!child.has(flags)) {
			this.fail(
				`${slot} must have type ${flags}, found ${child.toString() || "none"}`,
			);
		}
	}

	fail(reason: string, code: FragmentTypeError["code"] = "INVALID_CHILD"): never {
		throw new FragmentTypeError(reason, code, nodeToString(this.node));
	}
}

/**
 * Whether combining two branches in a conjunction mixes height and time
 * locks of the same kind.
 */
function mixesTimelocks(x: FragmentType, y: FragmentType): boolean {
	return (
		(x.has("g") && y.has("h")) ||
		(x.has("h") && y.has("g")) ||
		(x.has("i") && y.has("j")) ||
		(x.has("j") && y.has("i"))
	);
}

function conjunctionTimelocks(x: FragmentType, y: FragmentType): FragmentType {
	return x
		.union(y)
		.pick("ghij")
		.union(ty("k").when(x.intersect(y).has("k") && !mixesTimelocks(x, y)));
}

function disjunctionTimelocks(...branches: FragmentType[]): FragmentType {
	const [first, ...rest] = branches;
	return first
		.union(...rest)
		.pick("ghij")
		.union(first.intersect(...rest).pick("k"));
}

function timelockType(kind: "older" | "after", value: number): FragmentType {
	const height = isHeightLock(kind, value);
	const flag = kind === "older" ? (height ? "h" : "g") : height ? "j" : "i";
	return ty(`Bzfmxk${flag}`);
}

function deriveUnchecked(node: FragmentNode, pre: Preconditions): FragmentType {
	switch (node.kind) {
		case "pk_k":
			return ty("Konudemsxk");
		case "pk_h":
			return ty("Knudemsxk");
		case "older":
		case "after":
			return timelockType(node.kind, node.value);
		case "sha256":
		case "hash256":
		case "ripemd160":
		case "hash160":
			return ty("Bonudmk");
		case "true":
			return ty("Bzufmxk");
		case "false":
			return ty("Bzudemsxk");

		case "alt": {
			const x = node.sub.type;
			pre.require(x, "B", "a: child");
			return ty("W").union(x.pick("ghijk"), x.pick("udfems"), ty("x"));
		}
		case "swap": {
			const x = node.sub.type;
			pre.require(x, "Bo", "s: child");
			return ty("W").union(x.pick("ghijk"), x.pick("udfemsx"));
		}
		case "check": {
			const x = node.sub.type;
			pre.require(x, "K", "c: child");
			return ty("B").union(x.pick("ghijk"), x.pick("ondfem"), ty("us"));
		}
		case "dupif": {
			const x = node.sub.type;
			pre.require(x, "Vz", "d: child");
			// `u` only holds under MINIMALIF consensus rules (tapscript)
			return ty("Bond").union(
				ty("e").when(x.has("f")),
				x.pick("ghijk"),
				x.pick("ms"),
				ty("x"),
			);
		}
		case "verify": {
			const x = node.sub.type;
			pre.require(x, "B", "v: child");
			return ty("V").union(x.pick("ghijk"), x.pick("zonms"), ty("fx"));
		}
		case "nonzero": {
			const x = node.sub.type;
			pre.require(x, "Bn", "j: child");
			return ty("B").union(
				ty("e").when(x.has("f")),
				x.pick("ghijk"),
				x.pick("oums"),
				ty("ndx"),
			);
		}
		case "zero_not_equal": {
			const x = node.sub.type;
			pre.require(x, "B", "n: child");
			return x.pick("ghijk").union(x.pick("Bzondfems"), ty("ux"));
		}

		case "and_v": {
			const x = node.left.type;
			const y = node.right.type;
			pre.require(x, "V", "and_v left child");
			if (!(y.has("B") || y.has("K") || y.has("V"))) {
				pre.fail(`and_v right child must have type B, K or V, found ${y.toString()}`);
			}
			const xy = x.union(y);
			return y
				.pick("KVB")
				.union(
					x.pick("n"),
					y.pick("n").when(x.has("z")),
					xy.pick("o").when(xy.has("z")),
					x.intersect(y).pick("dmz"),
					xy.pick("s"),
					ty("f").when(y.has("f") || x.has("s")),
					y.pick("ux"),
					conjunctionTimelocks(x, y),
				);
		}
		case "and_b": {
			const x = node.left.type;
			const y = node.right.type;
			pre.require(x, "B", "and_b left child");
			pre.require(y, "W", "and_b right child");
			const xy = x.union(y);
			const both = x.intersect(y);
			return ty("B").union(
				xy.pick("o").when(xy.has("z")),
				x.pick("n"),
				y.pick("n").when(x.has("z")),
				both.pick("e").when(both.has("s")),
				both.pick("dzm"),
				ty("f").when(both.has("f") || x.has("sf") || y.has("sf")),
				xy.pick("s"),
				ty("ux"),
				conjunctionTimelocks(x, y),
			);
		}
		case "or_b": {
			const x = node.left.type;
			const y = node.right.type;
			pre.require(x, "Bd", "or_b left child");
			pre.require(y, "Wd", "or_b right child");
			const xy = x.union(y);
			const both = x.intersect(y);
			return ty("B").union(
				xy.pick("o").when(xy.has("z")),
				both.pick("m").when(xy.has("s") && both.has("e")),
				both.pick("zse"),
				ty("dux"),
				disjunctionTimelocks(x, y),
			);
		}
		case "or_d": {
			const x = node.left.type;
			const y = node.right.type;
			pre.require(x, "Bdu", "or_d left child");
			pre.require(y, "B", "or_d right child");
			const both = x.intersect(y);
			return ty("B").union(
				x.pick("o").when(y.has("z")),
				both.pick("m").when(x.has("e") && x.union(y).has("s")),
				both.pick("zes"),
				y.pick("ufd"),
				ty("x"),
				disjunctionTimelocks(x, y),
			);
		}
		case "or_c": {
			const x = node.left.type;
			const y = node.right.type;
			pre.require(x, "Bdu", "or_c left child");
			pre.require(y, "V", "or_c right child");
			const both = x.intersect(y);
			return ty("V").union(
				x.pick("o").when(y.has("z")),
				both.pick("m").when(x.has("e") && x.union(y).has("s")),
				both.pick("zs"),
				ty("fx"),
				disjunctionTimelocks(x, y),
			);
		}
		case "or_i": {
			const x = node.left.type;
			const y = node.right.type;
			const base = x.base;
			if (base === undefined || base === "W" || !y.has(base)) {
				pre.fail(
					`or_i children must share basic type B, K or V, found ${x.toString()} and ${y.toString()}`,
				);
			}
			const xy = x.union(y);
			const both = x.intersect(y);
			return both.pick("VBKufs").union(
				ty("o").when(both.has("z")),
				xy.pick("e").when(xy.has("f")),
				both.pick("m").when(xy.has("s")),
				xy.pick("d"),
				ty("x"),
				disjunctionTimelocks(x, y),
			);
		}
		case "andor": {
			const x = node.a.type;
			const y = node.b.type;
			const z = node.c.type;
			pre.require(x, "Bdu", "andor first child");
			const base = y.base;
			if (base === undefined || base === "W" || !z.has(base)) {
				pre.fail(
					`andor second and third children must share basic type B, K or V, found ${y.toString()} and ${z.toString()}`,
				);
			}
			const yz = y.intersect(z);
			const xOrYz = x.union(yz);
			const all = x.intersect(y, z);
			const sOrF = x.has("s") || y.has("f");
			const timelocks = x
				.union(y, z)
				.pick("ghij")
				.union(ty("k").when(all.has("k") && !mixesTimelocks(x, y)));
			return yz.pick("BKV").union(
				all.pick("z"),
				xOrYz.pick("o").when(xOrYz.has("z")),
				yz.pick("u"),
				z.pick("f").when(sOrF),
				z.pick("d"),
				z.pick("e").when(sOrF),
				all.pick("m").when(x.has("e") && x.union(y, z).has("s")),
				z.intersect(x.union(y)).pick("s"),
				ty("x"),
				timelocks,
			);
		}
		case "thresh": {
			const n = node.subs.length;
			if (!Number.isInteger(node.k) || node.k < 1 || node.k > n) {
				pre.fail(`threshold ${node.k} out of range [1, ${n}]`, "INVALID_THRESHOLD");
			}
			let allE = true;
			let allM = true;
			let args = 0;
			let safeCount = 0;
			let timelocks = ty("k");
			node.subs.forEach((sub, i) => {
				const t = sub.type;
				pre.require(t, i === 0 ? "Bdu" : "Wdu", `thresh child ${i}`);
				allE &&= t.has("e");
				allM &&= t.has("m");
				if (t.has("s")) safeCount++;
				args += t.has("z") ? 0 : t.has("o") ? 1 : 2;
				const keepsK =
					timelocks.intersect(t).has("k") &&
					(node.k <= 1 || !mixesTimelocks(timelocks, t));
				timelocks = timelocks.union(t).pick("ghij").union(ty("k").when(keepsK));
			});
			return ty("Bdu").union(
				ty("z").when(args === 0),
				ty("o").when(args === 1),
				ty("e").when(allE && safeCount === n),
				ty("m").when(allE && allM && safeCount >= n - node.k),
				ty("s").when(safeCount >= n - node.k + 1),
				timelocks,
			);
		}
		case "multi": {
			const n = node.keys.length;
			if (n < 1 || n > MAX_MULTI_KEYS) {
				pre.fail(`multi takes 1 to ${MAX_MULTI_KEYS} keys, found ${n}`, "INVALID_THRESHOLD");
			}
			if (!Number.isInteger(node.k) || node.k < 1 || node.k > n) {
				pre.fail(`threshold ${node.k} out of range [1, ${n}]`, "INVALID_THRESHOLD");
			}
			return ty("Bnudemsk");
		}
	}
}

/**
 * Rejects property combinations no valid fragment can have.
 */
function checkConsistency(t: FragmentType, pre: Preconditions): void {
	const basics = ["B", "V", "K", "W"].filter((b) => t.has(b)).length;
	if (basics !== 1) {
		pre.fail(`expected exactly one basic type, found ${t.toString() || "none"}`, "INCONSISTENT_TYPE");
	}
	const implications: [string, string, boolean][] = [
		["z", "o", false],
		["n", "z", false],
		["n", "W", false],
		["V", "d", false],
		["K", "u", true],
		["V", "u", false],
		["e", "f", false],
		["e", "d", true],
		["V", "e", false],
		["d", "f", false],
		["V", "f", true],
		["K", "s", true],
		["z", "m", true],
	];
	for (const [a, b, required] of implications) {
		if (t.has(a) && t.has(b) !== required) {
			pre.fail(
				`type ${t.toString()} has ${a} ${required ? "without" : "with"} ${b}`,
				"INCONSISTENT_TYPE",
			);
		}
	}
}

/**
 * Derive the type of a node from its children's types.
 *
 * @throws FragmentTypeError when the children cannot be composed
 */
export function deriveType(node: FragmentNode): FragmentType {
	const pre = new Preconditions(node);
	const derived = deriveUnchecked(node, pre);
	checkConsistency(derived, pre);
	return derived;
}
