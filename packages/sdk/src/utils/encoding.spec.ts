import { bytesEqual, bytesToHex, compareBytes, hexToBytes, isHex } from "./encoding.js";

describe("encoding", () => {
	it("converts hex in both directions, accepting upper case", () => {
		expect(hexToBytes("ABcd01")).toEqual(Uint8Array.of(0xab, 0xcd, 0x01));
		expect(bytesToHex(Uint8Array.of(0xab, 0xcd, 0x01))).toBe("abcd01");
	});

	it("recognizes even-length hex", () => {
		expect(isHex("00ff")).toBe(true);
		expect(isHex("")).toBe(true);
		expect(isHex("abc")).toBe(false);
		expect(isHex("zz")).toBe(false);
	});

	it("compares", () => {
		expect(bytesEqual(Uint8Array.of(1, 2), Uint8Array.of(1, 2))).toBe(true);
		expect(bytesEqual(Uint8Array.of(1, 2), Uint8Array.of(1))).toBe(false);
		expect(compareBytes(Uint8Array.of(1, 2), Uint8Array.of(1, 3))).toBeLessThan(0);
		expect(compareBytes(Uint8Array.of(1), Uint8Array.of(1, 0))).toBeLessThan(0);
		expect(compareBytes(Uint8Array.of(2), Uint8Array.of(1, 9))).toBeGreaterThan(0);
	});
});
