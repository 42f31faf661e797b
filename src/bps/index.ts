export { applyBps, decodeAction } from "./apply.js";
export type { DecodedAction } from "./apply.js";
export { assertChecksums, verifyChecksums } from "./checksum.js";
export { BPS_MAGIC, MIN_PATCH_SIZE, TRAILER_SIZE, describePatch, parseContainer, readTrailer } from "./container.js";
export { BpsError, isBpsError } from "./errors.js";
export { decodeSignedOffset, readSignedOffset, readVlv } from "./vlv.js";
export type { DecodedValue } from "./vlv.js";
export type * from "./types.js";
