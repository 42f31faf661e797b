import type { BpsErrorCode } from "./types.js";

export class BpsError extends Error {
  readonly code: BpsErrorCode;

  constructor(code: BpsErrorCode, message: string) {
    super(message);
    this.name = "BpsError";
    this.code = code;
  }
}

export function isBpsError(value: unknown): value is BpsError {
  return value instanceof BpsError;
}
