export type BpsErrorCode = "BadMagic" | "TruncatedValue" | "MalformedPatch" | "SizeMismatch" | "ChecksumMismatch";

export type ActionKind = "sourceRead" | "targetRead" | "sourceCopy" | "targetCopy";

export interface BpsHeader {
  sourceSize: number;
  targetSize: number;
  metadataSize: number;
  /** Offset of the first metadata byte. */
  metadataStart: number;
  /** Offset of the first action, right after the metadata block. */
  actionStreamStart: number;
  /** Offset of the 12-byte checksum trailer. */
  trailerStart: number;
}

export interface BpsTrailer {
  sourceChecksum: number;
  targetChecksum: number;
  patchChecksum: number;
}

export interface ChecksumMismatch {
  field: keyof BpsTrailer;
  expected: number;
  actual: number;
}

export interface ApplyBpsOptions {
  /**
   * Fail on size disagreements between header and buffers and on trailer
   * checksum mismatches instead of zero-filling silently.
   */
  strict?: boolean;
  /** Cap on decoded actions. Defaults to twice the patch length. */
  maxIterations?: number;
  /** Largest target the header may declare. Defaults to `buffer.constants.MAX_LENGTH`. */
  maxTargetSize?: number;
}

export interface PatchDescription {
  header: BpsHeader;
  trailer: BpsTrailer;
  metadata: string;
}
