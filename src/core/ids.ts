import { ulid } from "ulid";
import { digestParts, encodeCrockfordBase32_128bits } from "./hashing.js";

export type ScanId = `scan_${string}`;
export type FindingKey = `fnd_${string}`;

export function newScanId(): ScanId {
  return `scan_${ulid()}` as const;
}

export function deriveFindingKeyFromParts(parts: readonly string[]): FindingKey {
  return `fnd_${encodeCrockfordBase32_128bits(digestParts(parts))}` as const;
}
