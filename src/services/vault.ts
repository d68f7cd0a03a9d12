/**
 * Credential Vault — AES-256-GCM encryption of per-tenant signing secrets.
 *
 * Sealed layout (hex-encoded): nonce (12 bytes) | ciphertext | auth tag (16 bytes).
 * The key is derived once from ENCRYPTION_KEY and never changes for the
 * life of the process.
 */

import { createCipheriv, createDecipheriv, createHash, randomBytes } from "crypto";

const NONCE_BYTES = 12;
const TAG_BYTES = 16;

export class CredentialVault {
  private readonly key: Buffer;

  constructor(secret: string) {
    if (!secret) {
      throw new Error("Credential vault requires an encryption key");
    }
    this.key = createHash("sha256").update(secret, "utf-8").digest();
  }

  encrypt(plainText: string): string {
    const nonce = randomBytes(NONCE_BYTES);
    const cipher = createCipheriv("aes-256-gcm", this.key, nonce);
    const body = Buffer.concat([cipher.update(plainText, "utf-8"), cipher.final()]);
    return Buffer.concat([nonce, body, cipher.getAuthTag()]).toString("hex");
  }

  /**
   * Throws when the data is truncated, tampered with, or sealed under another key.
   */
  decrypt(sealedHex: string): string {
    const sealed = Buffer.from(sealedHex, "hex");
    if (sealed.length < NONCE_BYTES + TAG_BYTES) {
      throw new Error("Ciphertext too short");
    }

    const nonce = sealed.subarray(0, NONCE_BYTES);
    const tag = sealed.subarray(sealed.length - TAG_BYTES);
    const body = sealed.subarray(NONCE_BYTES, sealed.length - TAG_BYTES);

    const decipher = createDecipheriv("aes-256-gcm", this.key, nonce);
    decipher.setAuthTag(tag);
    return Buffer.concat([decipher.update(body), decipher.final()]).toString("utf-8");
  }
}
