import { describe, expect, it } from "vitest";
import { createFieldCipher } from "@/security/encryption";

describe("createFieldCipher", () => {
  it("round-trips a value", () => {
    const cipher = createFieldCipher("test-secret");
    const payload = cipher.encrypt("sk-ABCDEFGH1234");

    expect(payload.ciphertext).not.toContain("sk-ABCDEFGH1234");
    expect(cipher.decrypt(payload)).toBe("sk-ABCDEFGH1234");
  });

  it("uses a fresh iv for every encryption", () => {
    const cipher = createFieldCipher("test-secret");
    const first = cipher.encrypt("same value");
    const second = cipher.encrypt("same value");

    expect(first.iv).not.toBe(second.iv);
    expect(first.ciphertext).not.toBe(second.ciphertext);
  });

  it("refuses to decrypt with another secret", () => {
    const payload = createFieldCipher("test-secret").encrypt("sk-ABCDEFGH1234");
    expect(() => createFieldCipher("other-secret").decrypt(payload)).toThrow();
  });

  it("rejects an empty secret", () => {
    expect(() => createFieldCipher("")).toThrow("Field cipher secret must be non-empty.");
  });
});
