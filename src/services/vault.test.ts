import { describe, it, expect } from "vitest";
import { CredentialVault } from "./vault.js";

describe("CredentialVault", () => {
  const vault = new CredentialVault("test-secret");

  it("decrypts what it encrypted", () => {
    const sealed = vault.encrypt("signing-key-1");
    expect(vault.decrypt(sealed)).toBe("signing-key-1");
  });

  it("uses a fresh nonce for every encryption", () => {
    expect(vault.encrypt("same")).not.toBe(vault.encrypt("same"));
  });

  it("lays out nonce, ciphertext and tag as hex", () => {
    const sealed = vault.encrypt("abcd");
    // 12 nonce + 4 ciphertext + 16 tag bytes
    expect(sealed).toMatch(/^[0-9a-f]+$/);
    expect(sealed).toHaveLength((12 + 4 + 16) * 2);
  });

  it("rejects data sealed under another key", () => {
    const sealed = new CredentialVault("other-secret").encrypt("signing-key-1");
    expect(() => vault.decrypt(sealed)).toThrow();
  });

  it("rejects tampered ciphertext", () => {
    const sealed = vault.encrypt("signing-key-1");
    const flipped = (parseInt(sealed[30], 16) ^ 1).toString(16);
    const tampered = sealed.slice(0, 30) + flipped + sealed.slice(31);
    expect(() => vault.decrypt(tampered)).toThrow();
  });

  it("rejects truncated input", () => {
    expect(() => vault.decrypt("abcd")).toThrow("Ciphertext too short");
  });

  it("requires key material", () => {
    expect(() => new CredentialVault("")).toThrow();
  });
});
