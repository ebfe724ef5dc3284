import { decodeScriptNum, encodeScriptNum, scriptNumSize, varIntSize } from "./script-num.js";

describe("script numbers", () => {
	it("encodes minimally with a clear sign bit", () => {
		expect(encodeScriptNum(0)).toEqual(new Uint8Array(0));
		expect(encodeScriptNum(127)).toEqual(Uint8Array.of(0x7f));
		expect(encodeScriptNum(128)).toEqual(Uint8Array.of(0x80, 0x00));
		expect(encodeScriptNum(256)).toEqual(Uint8Array.of(0x00, 0x01));
		expect(encodeScriptNum(0x7fffffff)).toEqual(Uint8Array.of(0xff, 0xff, 0xff, 0x7f));
	});

	it("refuses negative and fractional values", () => {
		expect(() => encodeScriptNum(-1)).toThrow(RangeError);
		expect(() => encodeScriptNum(1.5)).toThrow(RangeError);
	});

	it("decodes minimal encodings, including negatives", () => {
		expect(decodeScriptNum(new Uint8Array(0))).toBe(0);
		expect(decodeScriptNum(Uint8Array.of(0x80, 0x00))).toBe(128);
		expect(decodeScriptNum(Uint8Array.of(0x90, 0x00))).toBe(144);
		expect(decodeScriptNum(Uint8Array.of(0x81))).toBe(-1);
	});

	it("rejects padded encodings and negative zero", () => {
		expect(decodeScriptNum(Uint8Array.of(0x00))).toBeUndefined();
		expect(decodeScriptNum(Uint8Array.of(0x05, 0x00))).toBeUndefined();
		expect(decodeScriptNum(Uint8Array.of(0x80))).toBeUndefined();
	});

	it("sizes pushes and varints", () => {
		expect(scriptNumSize(16)).toBe(1);
		expect(scriptNumSize(17)).toBe(2);
		expect(scriptNumSize(144)).toBe(3);
		expect(varIntSize(252)).toBe(1);
		expect(varIntSize(253)).toBe(3);
		expect(varIntSize(0x10000)).toBe(5);
	});
});
