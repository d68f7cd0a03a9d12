/**
 * HMAC signatures for outbound webhook deliveries.
 *
 * The signature covers the exact bytes on the wire and travels in the
 * x-hmac-signature header as lowercase hex. A missing header means the
 * tenant has no signing key, not that verification failed.
 */

import { createHmac, timingSafeEqual } from "crypto";

export const SIGNATURE_HEADER = "x-hmac-signature";

export function signPayload(body: string | Uint8Array, key: string): string {
  return createHmac("sha256", key).update(body).digest("hex");
}

export function verifySignature(body: string | Uint8Array, key: string, signature: string): boolean {
  const expected = Buffer.from(signPayload(body, key), "hex");
  const given = Buffer.from(signature, "hex");
  if (given.length !== expected.length) {
    return false;
  }
  return timingSafeEqual(expected, given);
}

/**
 * JSON with object keys in sorted order, so a field map signs the same way
 * regardless of insertion order.
 */
export function canonicalJson(fields: Record<string, string>): string {
  const sorted: Record<string, string> = {};
  for (const key of Object.keys(fields).sort()) {
    sorted[key] = fields[key];
  }
  return JSON.stringify(sorted);
}
