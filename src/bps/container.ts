import { BpsError } from "./errors.js";
import { readVlv } from "./vlv.js";
import type { BpsHeader, BpsTrailer, PatchDescription } from "./types.js";

export const BPS_MAGIC = Uint8Array.of(0x42, 0x50, 0x53, 0x31); // "BPS1"
export const TRAILER_SIZE = 12;
/** Magic, one byte for each of the three header values, and the trailer. */
export const MIN_PATCH_SIZE = BPS_MAGIC.length + 3 + TRAILER_SIZE;

function hasMagic(patch: Uint8Array): boolean {
  return BPS_MAGIC.every((byte, index) => patch[index] === byte);
}

export function parseContainer(patch: Uint8Array): BpsHeader {
  if (patch.length < MIN_PATCH_SIZE) {
    throw new BpsError("BadMagic", `Patch too small: ${patch.length} bytes, expected at least ${MIN_PATCH_SIZE}`);
  }
  if (!hasMagic(patch)) {
    throw new BpsError("BadMagic", "Invalid BPS patch: missing BPS1 marker");
  }

  const sourceSize = readVlv(patch, BPS_MAGIC.length);
  const targetSize = readVlv(patch, sourceSize.next);
  const metadataSize = readVlv(patch, targetSize.next);

  return {
    sourceSize: sourceSize.value,
    targetSize: targetSize.value,
    metadataSize: metadataSize.value,
    metadataStart: metadataSize.next,
    actionStreamStart: metadataSize.next + metadataSize.value,
    trailerStart: patch.length - TRAILER_SIZE
  };
}

export function readTrailer(patch: Uint8Array): BpsTrailer {
  if (patch.length < TRAILER_SIZE) {
    throw new BpsError("BadMagic", `Patch too small for checksum trailer: ${patch.length} bytes`);
  }
  const view = new DataView(patch.buffer, patch.byteOffset + patch.length - TRAILER_SIZE, TRAILER_SIZE);
  return {
    sourceChecksum: view.getUint32(0, true),
    targetChecksum: view.getUint32(4, true),
    patchChecksum: view.getUint32(8, true)
  };
}

export function describePatch(patch: Uint8Array): PatchDescription {
  const header = parseContainer(patch);
  const metadataEnd = Math.min(header.actionStreamStart, header.trailerStart);
  const metadata = Buffer.from(patch.subarray(header.metadataStart, Math.max(header.metadataStart, metadataEnd))).toString(
    "utf8"
  );
  return { header, trailer: readTrailer(patch), metadata };
}
