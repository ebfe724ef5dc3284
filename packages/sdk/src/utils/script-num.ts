/**
 * Script number helpers
 *
 * Script numbers are little-endian sign-magnitude byte strings. Only the
 * non-negative range used by thresholds and timelocks is produced here.
 */

/**
 * Minimal script-number encoding of a non-negative integer (empty for 0).
 */
export function encodeScriptNum(value: number): Uint8Array {
	if (!Number.isSafeInteger(value) || value < 0) {
		throw new RangeError(`Cannot encode ${value} as a script number`);
	}
	const out: number[] = [];
	let rest = value;
	while (rest > 0) {
		out.push(rest & 0xff);
		rest = Math.floor(rest / 256);
	}
	// Keep the sign bit clear
	if (out.length > 0 && (out[out.length - 1] & 0x80) !== 0) {
		out.push(0x00);
	}
	return Uint8Array.from(out);
}

/**
 * Decode a script number. Returns undefined if the encoding is not minimal.
 */
export function decodeScriptNum(bytes: Uint8Array): number | undefined {
	if (bytes.length === 0) {
		return 0;
	}
	const last = bytes[bytes.length - 1];
	if ((last & 0x7f) === 0) {
		if (bytes.length === 1 || (bytes[bytes.length - 2] & 0x80) === 0) {
			return undefined;
		}
	}
	let value = 0;
	for (let i = bytes.length - 1; i >= 0; i--) {
		const byte = i === bytes.length - 1 ? bytes[i] & 0x7f : bytes[i];
		value = value * 256 + byte;
	}
	return (last & 0x80) !== 0 ? -value : value;
}

/**
 * Size in bytes of the minimal push of a number (`OP_0`..`OP_16` count as one).
 */
export function scriptNumSize(value: number): number {
	if (value >= 0 && value <= 16) {
		return 1;
	}
	return 1 + encodeScriptNum(value).length;
}

/**
 * Size of a Bitcoin CompactSize (varint) prefix.
 */
export function varIntSize(value: number): number {
	if (value < 0xfd) return 1;
	if (value <= 0xffff) return 3;
	if (value <= 0xffffffff) return 5;
	return 9;
}
