import { FormatError } from "../errors";
import { utf8Decode, utf8Encode } from "./typedArray";

export function encodeJson(value: unknown): Uint8Array {
  return utf8Encode(JSON.stringify(value));
}

/**
 * Decodes UTF-8 JSON bytes. Invalid UTF-8 or JSON raises FormatError;
 * the result is untyped and must be validated by the caller.
 */
export function decodeJson(bytes: Uint8Array): unknown {
  let text: string;
  try {
    text = utf8Decode(bytes);
  } catch {
    throw new FormatError("Record is not valid UTF-8");
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new FormatError("Record is not valid JSON");
  }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    !!value &&
    typeof value === "object" &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}
