import { BpsError } from "./errors.js";

export interface DecodedValue {
  value: number;
  /** Offset of the byte immediately after the decoded value. */
  next: number;
}

/**
 * Decodes one variable-length value starting at `offset`.
 *
 * Seven bits per byte, least significant group first. The high bit marks the
 * last byte of the value, and the weight only grows on continuation bytes.
 */
export function readVlv(data: Uint8Array, offset: number): DecodedValue {
  let value = 0;
  let weight = 1;
  let pos = offset;
  for (;;) {
    if (pos >= data.length) {
      throw new BpsError("TruncatedValue", `Variable-length value at offset ${offset} runs past end of patch`);
    }
    const byte = data[pos];
    pos += 1;
    const low = byte & 0x7f;
    // Overlong zero groups push the weight to Infinity; they add nothing.
    if (low !== 0) {
      value += low * weight;
    }
    if (byte & 0x80) {
      break;
    }
    weight *= 128;
  }
  if (!Number.isSafeInteger(value)) {
    throw new BpsError("MalformedPatch", `Variable-length value at offset ${offset} is out of range`);
  }
  return { value, next: pos };
}

/** Maps an encoded relative offset: even values are forward, odd ones backward by one more. */
export function decodeSignedOffset(encoded: number): number {
  const magnitude = Math.floor(encoded / 2);
  return encoded % 2 === 1 ? -(magnitude + 1) : magnitude;
}

export function readSignedOffset(data: Uint8Array, offset: number): DecodedValue {
  const { value, next } = readVlv(data, offset);
  return { value: decodeSignedOffset(value), next };
}
