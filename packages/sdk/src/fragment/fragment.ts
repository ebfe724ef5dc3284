/**
 * Fragment - an immutable, typed miniscript node
 *
 * The type and size data of a node are derived when it is constructed and
 * never change afterwards. Trees are built bottom-up from already-typed
 * children, so an ill-typed composition fails at the point it is made.
 *
 * @example
 * ```typescript
 * const htlc = Fragment.andOr(
 *   Fragment.pk(receiverKey),
 *   Fragment.andV(Fragment.verify(Fragment.hashLock("sha256", digest)), Fragment.true()),
 *   Fragment.andV(Fragment.verify(Fragment.pk(senderKey)), Fragment.older(144)),
 * );
 * htlc.type.nonMalleable; // true
 * ```
 */

import {
	HashFunction,
	KeyHash,
	PublicKey,
	validateDigest,
	validateKeyHash,
	validatePublicKey,
	validateTimelock,
} from "../primitives/index.js";
import {
	ExtData,
	FragmentType,
	SanityIssue,
	checkSanity,
	computeExtData,
	deriveType,
} from "../typing/index.js";
import { nodeToString } from "./display.js";
import { FragmentNode } from "./types.js";

function validateLeaf(node: FragmentNode): void {
	switch (node.kind) {
		case "pk_k":
			validatePublicKey(node.key);
			break;
		case "pk_h":
			validateKeyHash(node.hash);
			break;
		case "older":
		case "after":
			validateTimelock(node.kind, node.value);
			break;
		case "sha256":
		case "hash256":
		case "ripemd160":
		case "hash160":
			validateDigest(node.kind, node.hash);
			break;
		case "multi":
			node.keys.forEach(validatePublicKey);
			break;
	}
}

/** Frozen copy of a node, detached from the caller's arrays and bytes */
function ownNode(node: FragmentNode): FragmentNode {
	switch (node.kind) {
		case "pk_k":
			return Object.freeze({ kind: node.kind, key: node.key.slice() });
		case "pk_h":
			return Object.freeze({ kind: node.kind, hash: node.hash.slice() });
		case "sha256":
		case "hash256":
		case "ripemd160":
		case "hash160":
			return Object.freeze({ kind: node.kind, hash: node.hash.slice() });
		case "multi":
			return Object.freeze({
				kind: node.kind,
				k: node.k,
				keys: Object.freeze(node.keys.map((key) => key.slice())),
			});
		case "thresh":
			return Object.freeze({ kind: node.kind, k: node.k, subs: Object.freeze([...node.subs]) });
		default:
			return Object.freeze({ ...node });
	}
}

export class Fragment {
	readonly type: FragmentType;
	readonly ext: ExtData;
	private text?: string;

	readonly node: FragmentNode;

	private constructor(node: FragmentNode) {
		this.node = ownNode(node);
		validateLeaf(this.node);
		this.type = deriveType(this.node);
		this.ext = computeExtData(this.node);
	}

	/**
	 * Build a fragment from a node whose children are already fragments.
	 *
	 * @throws FragmentTypeError if the children cannot be composed
	 * @throws PrimitiveError if a key, digest or timelock is malformed
	 */
	static fromNode(node: FragmentNode): Fragment {
		return new Fragment(node);
	}

	// Terminals

	static pkK(key: PublicKey): Fragment {
		return new Fragment({ kind: "pk_k", key });
	}

	static pkH(hash: KeyHash): Fragment {
		return new Fragment({ kind: "pk_h", hash });
	}

	/** `c:pk_k(key)` */
	static pk(key: PublicKey): Fragment {
		return Fragment.check(Fragment.pkK(key));
	}

	/** `c:pk_h(hash)` */
	static pkh(hash: KeyHash): Fragment {
		return Fragment.check(Fragment.pkH(hash));
	}

	static older(value: number): Fragment {
		return new Fragment({ kind: "older", value });
	}

	static after(value: number): Fragment {
		return new Fragment({ kind: "after", value });
	}

	static hashLock(fn: HashFunction, digest: Uint8Array): Fragment {
		return new Fragment({ kind: fn, hash: digest });
	}

	static true(): Fragment {
		return new Fragment({ kind: "true" });
	}

	static false(): Fragment {
		return new Fragment({ kind: "false" });
	}

	// Wrappers

	static alt(sub: Fragment): Fragment {
		return new Fragment({ kind: "alt", sub });
	}

	static swap(sub: Fragment): Fragment {
		return new Fragment({ kind: "swap", sub });
	}

	static check(sub: Fragment): Fragment {
		return new Fragment({ kind: "check", sub });
	}

	static dupIf(sub: Fragment): Fragment {
		return new Fragment({ kind: "dupif", sub });
	}

	static verify(sub: Fragment): Fragment {
		return new Fragment({ kind: "verify", sub });
	}

	static nonZero(sub: Fragment): Fragment {
		return new Fragment({ kind: "nonzero", sub });
	}

	static zeroNotEqual(sub: Fragment): Fragment {
		return new Fragment({ kind: "zero_not_equal", sub });
	}

	/** `t:X` = `and_v(X,1)` */
	static t(sub: Fragment): Fragment {
		return Fragment.andV(sub, Fragment.true());
	}

	/** `u:X` = `or_i(X,0)` */
	static u(sub: Fragment): Fragment {
		return Fragment.orI(sub, Fragment.false());
	}

	/** `l:X` = `or_i(0,X)` */
	static l(sub: Fragment): Fragment {
		return Fragment.orI(Fragment.false(), sub);
	}

	// Combinators

	static andV(left: Fragment, right: Fragment): Fragment {
		return new Fragment({ kind: "and_v", left, right });
	}

	static andB(left: Fragment, right: Fragment): Fragment {
		return new Fragment({ kind: "and_b", left, right });
	}

	static orB(left: Fragment, right: Fragment): Fragment {
		return new Fragment({ kind: "or_b", left, right });
	}

	static orC(left: Fragment, right: Fragment): Fragment {
		return new Fragment({ kind: "or_c", left, right });
	}

	static orD(left: Fragment, right: Fragment): Fragment {
		return new Fragment({ kind: "or_d", left, right });
	}

	static orI(left: Fragment, right: Fragment): Fragment {
		return new Fragment({ kind: "or_i", left, right });
	}

	static andOr(a: Fragment, b: Fragment, c: Fragment): Fragment {
		return new Fragment({ kind: "andor", a, b, c });
	}

	/** `and_n(X,Y)` = `andor(X,Y,0)` */
	static andN(a: Fragment, b: Fragment): Fragment {
		return Fragment.andOr(a, b, Fragment.false());
	}

	static thresh(k: number, subs: readonly Fragment[]): Fragment {
		return new Fragment({ kind: "thresh", k, subs: [...subs] });
	}

	static multi(k: number, keys: readonly PublicKey[]): Fragment {
		return new Fragment({ kind: "multi", k, keys: [...keys] });
	}

	/**
	 * Direct children, in script order.
	 */
	children(): Fragment[] {
		const { node } = this;
		switch (node.kind) {
			case "alt":
			case "swap":
			case "check":
			case "dupif":
			case "verify":
			case "nonzero":
			case "zero_not_equal":
				return [node.sub];
			case "and_v":
			case "and_b":
			case "or_b":
			case "or_c":
			case "or_d":
			case "or_i":
				return [node.left, node.right];
			case "andor":
				return [node.a, node.b, node.c];
			case "thresh":
				return [...node.subs];
			default:
				return [];
		}
	}

	/**
	 * This fragment and all of its descendants, pre-order.
	 */
	*walk(): Generator<Fragment> {
		yield this;
		for (const child of this.children()) {
			yield* child.walk();
		}
	}

	/**
	 * Every public key in the tree, in script order (`pk_h` hashes excluded).
	 */
	keys(): PublicKey[] {
		const keys: PublicKey[] = [];
		for (const { node } of this.walk()) {
			if (node.kind === "pk_k") {
				keys.push(node.key);
			} else if (node.kind === "multi") {
				keys.push(...node.keys);
			}
		}
		return keys;
	}

	sanityIssues(): SanityIssue[] {
		return checkSanity(this);
	}

	isSane(): boolean {
		return this.sanityIssues().length === 0;
	}

	/** Structural equality */
	equals(other: Fragment): boolean {
		return this === other || this.toString() === other.toString();
	}

	toString(): string {
		if (this.text === undefined) {
			this.text = nodeToString(this.node);
		}
		return this.text;
	}
}
