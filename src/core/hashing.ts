import { createHash } from "crypto";

const CROCKFORD_BASE32_ALPHABET = "0123456789ABCDEFGHJKMNPQRSTVWXYZ";

/** First 16 bytes of sha256 over `p1|p2|...|`. */
export function digestParts(parts: readonly string[]): Buffer {
  const h = createHash("sha256");
  for (const p of parts) h.update(p).update("|");
  return h.digest().subarray(0, 16);
}

export function encodeCrockfordBase32_128bits(bytes: Uint8Array): string {
  if (bytes.byteLength !== 16) throw new Error(`expected 16 bytes, got ${bytes.byteLength}`);
  let value = 0n;
  for (const b of bytes) value = (value << 8n) | BigInt(b);

  let out = "";
  for (let i = 0; i < 26; i++) {
    out = CROCKFORD_BASE32_ALPHABET[Number(value & 31n)] + out;
    value >>= 5n;
  }
  return out;
}
