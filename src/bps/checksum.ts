import { crc32, formatChecksum } from "../utils/hash.js";
import { BpsError } from "./errors.js";
import { readTrailer } from "./container.js";
import type { ChecksumMismatch } from "./types.js";

/** Compares the trailer checksums with the actual buffers. The patch checksum covers everything but its own 4 bytes. */
export function verifyChecksums(source: Uint8Array, target: Uint8Array, patch: Uint8Array): ChecksumMismatch[] {
  const trailer = readTrailer(patch);
  const actual = {
    sourceChecksum: crc32(source),
    targetChecksum: crc32(target),
    patchChecksum: crc32(patch.subarray(0, patch.length - 4))
  };
  const mismatches: ChecksumMismatch[] = [];
  for (const field of ["sourceChecksum", "targetChecksum", "patchChecksum"] as const) {
    if (trailer[field] !== actual[field]) {
      mismatches.push({ field, expected: trailer[field], actual: actual[field] });
    }
  }
  return mismatches;
}

export function assertChecksums(source: Uint8Array, target: Uint8Array, patch: Uint8Array): void {
  const [first] = verifyChecksums(source, target, patch);
  if (first) {
    throw new BpsError(
      "ChecksumMismatch",
      `${first.field} mismatch: expected ${formatChecksum(first.expected)}, got ${formatChecksum(first.actual)}`
    );
  }
}
