/**
 * Witness verification
 *
 * Executes a witness script over a witness stack, for the opcodes the codec
 * emits only. Segwit v0 policy rules are enforced: MINIMALIF, NULLFAIL,
 * NULLDUMMY, minimal number encoding, clean stack and the 520-byte element
 * limit. A successful run lists the signature, hash and timelock checks
 * that passed.
 */

import { OP } from "@scure/btc-signer";

import { Instruction, MAX_PUSH_SIZE, ScriptDecodeError, readInstructions } from "../codec/index.js";
import { HashFunction, hashPreimage } from "../primitives/index.js";
import { bytesEqual, decodeScriptNum, encodeScriptNum } from "../utils/index.js";
import {
	InterpreterErrorCode,
	SatisfiedConstraint,
	ScriptExecutionError,
	TransactionChecker,
	VerificationResult,
} from "./types.js";

const MAX_MULTISIG_KEYS = 20;

const TRUE = Uint8Array.of(1);
const FALSE = new Uint8Array(0);

function castToBool(item: Uint8Array): boolean {
	for (let i = 0; i < item.length; i++) {
		if (item[i] !== 0) {
			// Negative zero is false
			return !(i === item.length - 1 && item[i] === 0x80);
		}
	}
	return false;
}

function encodeNum(value: number): Uint8Array {
	if (value >= 0) {
		return encodeScriptNum(value);
	}
	const magnitude = encodeScriptNum(-value);
	const out = Uint8Array.from(magnitude);
	if ((out[out.length - 1] & 0x80) !== 0) {
		return Uint8Array.from([...out, 0x80]);
	}
	out[out.length - 1] |= 0x80;
	return out;
}

const HASH_OPS = new Map<number, HashFunction>([
	[OP.SHA256, "sha256"],
	[OP.HASH256, "hash256"],
	[OP.RIPEMD160, "ripemd160"],
	[OP.HASH160, "hash160"],
]);

function parseScript(script: Uint8Array): Instruction[] {
	try {
		return readInstructions(script);
	} catch (error) {
		if (error instanceof ScriptDecodeError) {
			throw new ScriptExecutionError(error.message, "MALFORMED_SCRIPT");
		}
		throw error;
	}
}

// Last hash opcode run, so the EQUAL two instructions on can tell what it compared
interface HashStep {
	fn: HashFunction;
	input: Uint8Array;
	opIndex: number;
}

// A `pkh` key that matched its hash, waiting for the CHECKSIG right after
interface KeyHashStep {
	hash: Uint8Array;
	key: Uint8Array;
	opIndex: number;
}

class Machine {
	readonly satisfied: SatisfiedConstraint[] = [];
	private readonly stack: Uint8Array[];
	private readonly altStack: Uint8Array[] = [];
	private readonly conditions: boolean[] = [];
	private instructions: Instruction[] = [];
	private opIndex = 0;
	private hashed?: HashStep;
	private keyHash?: KeyHashStep;

	constructor(
		witness: readonly Uint8Array[],
		private readonly checker: TransactionChecker,
	) {
		this.stack = [...witness];
	}

	run(script: Uint8Array): void {
		const instructions = parseScript(script);
		this.instructions = instructions;
		instructions.forEach(({ opcode, data }, index) => {
			this.opIndex = index;
			const executing = this.conditions.every(Boolean);
			if (data !== undefined) {
				if (data.length > MAX_PUSH_SIZE) {
					this.fail("PUSH_SIZE", `Push of ${data.length} bytes`);
				}
				if (executing) {
					this.stack.push(data);
				}
				return;
			}
			if (executing || opcode === OP.IF || opcode === OP.NOTIF || opcode === OP.ELSE || opcode === OP.ENDIF) {
				this.step(opcode, executing);
			}
		});
		this.opIndex = instructions.length;
		if (this.conditions.length > 0) {
			this.fail("UNBALANCED_CONDITIONAL", "Missing ENDIF");
		}
		const top = this.stack[this.stack.length - 1];
		if (top === undefined || !castToBool(top)) {
			this.fail("EVAL_FALSE", "Script evaluated to false");
		}
		if (this.stack.length !== 1) {
			this.fail("CLEANSTACK", `${this.stack.length} items left on the stack`);
		}
	}

	private step(opcode: number, executing: boolean): void {
		if (opcode === OP.OP_0) {
			this.stack.push(FALSE);
			return;
		}
		if (opcode >= OP.OP_1 && opcode <= OP.OP_16) {
			this.stack.push(encodeScriptNum(opcode - OP.OP_1 + 1));
			return;
		}
		const hash = HASH_OPS.get(opcode);
		if (hash !== undefined) {
			const input = this.pop();
			this.hashed = { fn: hash, input, opIndex: this.opIndex };
			this.stack.push(hashPreimage(hash, input));
			return;
		}
		switch (opcode) {
			case OP.IF:
			case OP.NOTIF: {
				let branch = false;
				if (executing) {
					const condition = this.pop();
					if (condition.length > 1 || (condition.length === 1 && condition[0] !== 1)) {
						this.fail("MINIMALIF", "IF argument must be empty or 0x01");
					}
					branch = castToBool(condition) === (opcode === OP.IF);
				}
				this.conditions.push(branch);
				return;
			}
			case OP.ELSE: {
				const last = this.conditions.pop();
				if (last === undefined) {
					this.fail("UNBALANCED_CONDITIONAL", "ELSE without IF");
				}
				this.conditions.push(!last);
				return;
			}
			case OP.ENDIF:
				if (this.conditions.pop() === undefined) {
					this.fail("UNBALANCED_CONDITIONAL", "ENDIF without IF");
				}
				return;
			case OP.VERIFY:
				this.verify(castToBool(this.pop()), "VERIFY");
				return;
			case OP.TOALTSTACK:
				this.altStack.push(this.pop());
				return;
			case OP.FROMALTSTACK: {
				const item = this.altStack.pop();
				if (item === undefined) {
					this.fail("INVALID_ALTSTACK_OPERATION", "Alt stack is empty");
				}
				this.stack.push(item);
				return;
			}
			case OP.IFDUP: {
				const top = this.peek();
				if (castToBool(top)) {
					this.stack.push(top);
				}
				return;
			}
			case OP.DUP:
				this.stack.push(this.peek());
				return;
			case OP.SWAP: {
				const top = this.pop();
				const below = this.pop();
				this.stack.push(top, below);
				return;
			}
			case OP.SIZE:
				this.stack.push(encodeScriptNum(this.peek().length));
				return;
			case OP.EQUAL:
			case OP.EQUALVERIFY: {
				const expected = this.pop();
				const equal = bytesEqual(expected, this.pop());
				if (equal) {
					this.recordHashMatch(expected);
				}
				if (opcode === OP.EQUALVERIFY) {
					this.verify(equal, "EQUALVERIFY");
				} else {
					this.stack.push(equal ? TRUE : FALSE);
				}
				return;
			}
			case OP["0NOTEQUAL"]:
				this.stack.push(this.popNum() !== 0 ? TRUE : FALSE);
				return;
			case OP.ADD: {
				const b = this.popNum();
				const a = this.popNum();
				this.stack.push(encodeNum(a + b));
				return;
			}
			case OP.BOOLAND:
			case OP.BOOLOR: {
				const b = this.popNum() !== 0;
				const a = this.popNum() !== 0;
				const result = opcode === OP.BOOLAND ? a && b : a || b;
				this.stack.push(result ? TRUE : FALSE);
				return;
			}
			case OP.CHECKSIG:
			case OP.CHECKSIGVERIFY: {
				const key = this.pop();
				const signature = this.pop();
				const valid = signature.length > 0 && this.checker.checkSignature(signature, key);
				if (!valid && signature.length > 0) {
					this.fail("NULLFAIL", "Failed signature check with a non-empty signature");
				}
				if (valid) {
					this.recordSignature(key, signature);
				}
				if (opcode === OP.CHECKSIGVERIFY) {
					this.verify(valid, "CHECKSIGVERIFY");
				} else {
					this.stack.push(valid ? TRUE : FALSE);
				}
				return;
			}
			case OP.CHECKMULTISIG:
			case OP.CHECKMULTISIGVERIFY: {
				const valid = this.checkMultisig();
				if (opcode === OP.CHECKMULTISIGVERIFY) {
					this.verify(valid, "CHECKMULTISIGVERIFY");
				} else {
					this.stack.push(valid ? TRUE : FALSE);
				}
				return;
			}
			case OP.CHECKSEQUENCEVERIFY:
			case OP.CHECKLOCKTIMEVERIFY: {
				const value = this.num(this.peek(), 5);
				if (value < 0) {
					this.fail("NEGATIVE_LOCKTIME", `Negative timelock ${value}`);
				}
				const met =
					opcode === OP.CHECKSEQUENCEVERIFY
						? this.checker.checkOlder(value)
						: this.checker.checkAfter(value);
				if (!met) {
					this.fail("UNSATISFIED_LOCKTIME", `Timelock ${value} not met`);
				}
				this.satisfied.push({ kind: opcode === OP.CHECKSEQUENCEVERIFY ? "older" : "after", value });
				return;
			}
		}
		this.fail("BAD_OPCODE", `Unsupported opcode 0x${opcode.toString(16)}`);
	}

	private checkMultisig(): boolean {
		const keyCount = this.popNum();
		if (keyCount < 0 || keyCount > MAX_MULTISIG_KEYS) {
			this.fail("PUBKEY_COUNT", `${keyCount} keys`);
		}
		const keys = this.popMany(keyCount);
		const sigCount = this.popNum();
		if (sigCount < 0 || sigCount > keyCount) {
			this.fail("SIG_COUNT", `${sigCount} signatures for ${keyCount} keys`);
		}
		const signatures = this.popMany(sigCount);
		if (this.pop().length !== 0) {
			this.fail("SIG_NULLDUMMY", "CHECKMULTISIG dummy element must be empty");
		}

		let sig = 0;
		let key = 0;
		let valid = true;
		const matched: SatisfiedConstraint[] = [];
		while (valid && sig < signatures.length) {
			if (this.checker.checkSignature(signatures[sig], keys[key])) {
				matched.push({ kind: "public_key", key: keys[key], signature: signatures[sig] });
				sig++;
			}
			key++;
			if (signatures.length - sig > keys.length - key) {
				valid = false;
			}
		}
		if (!valid && signatures.some((s) => s.length > 0)) {
			this.fail("NULLFAIL", "Failed multisig check with a non-empty signature");
		}
		if (valid) {
			this.satisfied.push(...matched);
		}
		return valid;
	}

	// An EQUAL right after `<hash op> <digest>` checked a preimage, or a
	// key against its hash when the hash op follows a DUP.
	private recordHashMatch(digest: Uint8Array): void {
		const { hashed, opIndex } = this;
		if (hashed === undefined || hashed.opIndex !== opIndex - 2) {
			return;
		}
		if (hashed.fn === "hash160" && this.instructions[hashed.opIndex - 1]?.opcode === OP.DUP) {
			this.keyHash = { hash: digest, key: hashed.input, opIndex };
			return;
		}
		this.satisfied.push({ kind: "hash_lock", fn: hashed.fn, hash: digest, preimage: hashed.input });
	}

	private recordSignature(key: Uint8Array, signature: Uint8Array): void {
		const pending = this.keyHash;
		if (pending !== undefined && pending.opIndex === this.opIndex - 1 && bytesEqual(pending.key, key)) {
			this.satisfied.push({ kind: "key_hash", hash: pending.hash, key, signature });
			return;
		}
		this.satisfied.push({ kind: "public_key", key, signature });
	}

	// `count` items in the order they were pushed
	private popMany(count: number): Uint8Array[] {
		const items: Uint8Array[] = [];
		for (let i = 0; i < count; i++) {
			items.unshift(this.pop());
		}
		return items;
	}

	private verify(condition: boolean, code: InterpreterErrorCode): void {
		if (!condition) {
			this.fail(code, `${code} failed`);
		}
	}

	private pop(): Uint8Array {
		const item = this.stack.pop();
		if (item === undefined) {
			this.fail("INVALID_STACK_OPERATION", "Stack underflow");
		}
		return item;
	}

	private peek(): Uint8Array {
		const item = this.stack[this.stack.length - 1];
		if (item === undefined) {
			this.fail("INVALID_STACK_OPERATION", "Stack underflow");
		}
		return item;
	}

	private popNum(): number {
		return this.num(this.pop(), 4);
	}

	private num(item: Uint8Array, maxLength: number): number {
		if (item.length > maxLength) {
			this.fail("NUMBER_OVERFLOW", `${item.length}-byte number`);
		}
		const value = decodeScriptNum(item);
		if (value === undefined) {
			this.fail("MINIMALDATA", "Number is not minimally encoded");
		}
		return value;
	}

	private fail(code: InterpreterErrorCode, message: string): never {
		throw new ScriptExecutionError(message, code, this.opIndex);
	}
}

/**
 * Execute `script` over `witness` (bottom to top) and report whether it
 * succeeds, and if so which of its conditions the witness met.
 */
export function verifyWitness(
	script: Uint8Array,
	witness: readonly Uint8Array[],
	checker: TransactionChecker,
): VerificationResult {
	if (witness.some((item) => item.length > MAX_PUSH_SIZE)) {
		return { valid: false, error: "PUSH_SIZE" };
	}
	try {
		const machine = new Machine(witness, checker);
		machine.run(script);
		return { valid: true, satisfied: machine.satisfied };
	} catch (error) {
		if (error instanceof ScriptExecutionError) {
			return { valid: false, error: error.code, opIndex: error.opIndex };
		}
		throw error;
	}
}
