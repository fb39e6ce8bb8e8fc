import "../setup";
import { generateStrongPassword } from "../../src/crypto/PasswordGenerator";
import { VAULT_CONSTANTS } from "../../src/constants";
import { ValidationError } from "../../src/errors";

describe("generateStrongPassword", () => {
  const alphabet = VAULT_CONSTANTS.PASSWORD_GENERATOR.ALPHABET;

  it("defaults to 16 characters from the generator alphabet", () => {
    const pw = generateStrongPassword();
    expect(pw).toHaveLength(16);
    for (const ch of pw) expect(alphabet).toContain(ch);
  });

  it("honours a custom length and alphabet", () => {
    expect(generateStrongPassword(64)).toHaveLength(64);
    expect(generateStrongPassword(200, "ab")).toMatch(/^[ab]{200}$/);
  });

  it("does not repeat itself", () => {
    const seen = new Set(Array.from({ length: 20 }, () => generateStrongPassword()));
    expect(seen.size).toBe(20);
  });

  it("rejects bad lengths and alphabets", () => {
    expect(() => generateStrongPassword(0)).toThrow(ValidationError);
    expect(() => generateStrongPassword(2.5)).toThrow(ValidationError);
    expect(() => generateStrongPassword(8, "a")).toThrow(ValidationError);
  });
});
