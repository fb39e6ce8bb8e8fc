import { VAULT_CONSTANTS } from "../constants";
import { ValidationError } from "../errors";
import { randomBytes } from "./EncryptionManager";

/**
 * Random password drawn uniformly from the generator alphabet. Bytes at or above the
 * largest multiple of the alphabet size are rejected so no character is favoured.
 */
export function generateStrongPassword(
  length: number = VAULT_CONSTANTS.PASSWORD_GENERATOR.LENGTH,
  alphabet: string = VAULT_CONSTANTS.PASSWORD_GENERATOR.ALPHABET
): string {
  if (!Number.isInteger(length) || length < 1) {
    throw new ValidationError("length must be a positive integer");
  }
  if (alphabet.length < 2 || alphabet.length > 256) {
    throw new ValidationError("alphabet must have between 2 and 256 characters");
  }

  const limit = 256 - (256 % alphabet.length);
  let out = "";
  while (out.length < length) {
    for (const b of randomBytes(length * 2)) {
      if (b >= limit) continue;
      out += alphabet.charAt(b % alphabet.length);
      if (out.length === length) break;
    }
  }
  return out;
}
