import { constants } from "node:buffer";
import { assertChecksums } from "./checksum.js";
import { parseContainer } from "./container.js";
import { BpsError } from "./errors.js";
import { readSignedOffset, readVlv } from "./vlv.js";
import type { ActionKind, ApplyBpsOptions } from "./types.js";

const ACTION_KINDS: readonly ActionKind[] = ["sourceRead", "targetRead", "sourceCopy", "targetCopy"];

export interface DecodedAction {
  kind: ActionKind;
  length: number;
}

/** Splits an action opcode: low two bits select the kind, the rest store `length - 1`. */
export function decodeAction(opcode: number): DecodedAction {
  return { kind: ACTION_KINDS[opcode % 4], length: Math.floor(opcode / 4) + 1 };
}

/**
 * Reconstructs the target described by a BPS1 patch.
 *
 * Reads outside the source, the patch or the already written target produce
 * zero bytes, and writes past the declared target size are dropped while the
 * cursors keep moving. Pass `strict` to turn size and checksum disagreements
 * into errors.
 */
export function applyBps(source: Uint8Array, patch: Uint8Array, options: ApplyBpsOptions = {}): Uint8Array {
  const header = parseContainer(patch);
  const strict = options.strict ?? false;
  if (strict && source.length !== header.sourceSize) {
    throw new BpsError("SizeMismatch", `Source size mismatch: expected ${header.sourceSize}, got ${source.length}`);
  }

  const maxTargetSize = options.maxTargetSize ?? constants.MAX_LENGTH;
  if (header.targetSize > maxTargetSize) {
    throw new BpsError("MalformedPatch", `Declared target size ${header.targetSize} exceeds limit of ${maxTargetSize} bytes`);
  }

  let target: Uint8Array;
  try {
    target = new Uint8Array(header.targetSize);
  } catch (err) {
    if (err instanceof RangeError) {
      throw new BpsError("MalformedPatch", `Cannot allocate target of ${header.targetSize} bytes: ${err.message}`);
    }
    throw err;
  }
  const maxIterations = options.maxIterations ?? patch.length * 2;
  let patchPos = header.actionStreamStart;
  let sourcePos = 0;
  let targetPos = 0;
  let iterations = 0;

  const readSource = (pos: number): number => (pos >= 0 && pos < source.length ? source[pos] : 0);
  const readPatch = (pos: number): number => (pos < patch.length ? patch[pos] : 0);
  // Bytes of an action of `length` that still land inside the target buffer.
  const writable = (length: number): number => Math.max(0, Math.min(length, target.length - targetPos));

  while (patchPos < header.trailerStart) {
    iterations += 1;
    if (iterations > maxIterations) {
      throw new BpsError("MalformedPatch", `Patch exceeded ${maxIterations} actions without reaching the checksum trailer`);
    }

    const opcode = readVlv(patch, patchPos);
    patchPos = opcode.next;
    const { kind, length } = decodeAction(opcode.value);
    const count = writable(length);

    switch (kind) {
      case "sourceRead": {
        for (let i = 0; i < count; i++) {
          target[targetPos + i] = readSource(sourcePos + i);
        }
        sourcePos += length;
        break;
      }
      case "targetRead": {
        for (let i = 0; i < count; i++) {
          target[targetPos + i] = readPatch(patchPos + i);
        }
        patchPos += length;
        break;
      }
      case "sourceCopy": {
        const relative = readSignedOffset(patch, patchPos);
        patchPos = relative.next;
        sourcePos += relative.value;
        for (let i = 0; i < count; i++) {
          target[targetPos + i] = readSource(sourcePos + i);
        }
        sourcePos += length;
        break;
      }
      case "targetCopy": {
        const relative = readSignedOffset(patch, patchPos);
        patchPos = relative.next;
        const copyFrom = targetPos + relative.value;
        // Byte by byte: the read position may catch up with bytes written by this same action.
        for (let i = 0; i < count; i++) {
          const from = copyFrom + i;
          const to = targetPos + i;
          target[to] = from >= 0 && from < to ? target[from] : 0;
        }
        break;
      }
    }
    targetPos += length;
  }

  if (strict) {
    if (targetPos !== header.targetSize) {
      throw new BpsError("SizeMismatch", `Actions wrote ${targetPos} bytes, expected ${header.targetSize}`);
    }
    assertChecksums(source, target, patch);
  }
  return target;
}
