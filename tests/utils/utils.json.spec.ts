import "../setup";
import { decodeJson, encodeJson, isPlainObject } from "../../src/utils/json";
import { FormatError } from "../../src/errors";

describe("json utils", () => {
  it("round-trips values through UTF-8 bytes", () => {
    const value = { a: 1, b: ["x", null], c: "ü" };
    expect(decodeJson(encodeJson(value))).toEqual(value);
  });

  it("raises FormatError for bad UTF-8 or bad JSON", () => {
    expect(() => decodeJson(new Uint8Array([0xc3, 0x28]))).toThrow(new FormatError("Record is not valid UTF-8"));
    expect(() => decodeJson(encodeJson("x").subarray(1))).toThrow(new FormatError("Record is not valid JSON"));
  });

  it("recognizes plain objects only", () => {
    expect(isPlainObject({})).toBe(true);
    expect(isPlainObject(decodeJson(encodeJson({ a: 1 })))).toBe(true);
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(null)).toBe(false);
    expect(isPlainObject(new Date())).toBe(false);
  });
});
