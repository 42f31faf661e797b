import type { DownloadedFile } from "./types.js";

export const MAX_DOWNLOAD_BYTES = 50 * 1024 * 1024;
export const MAX_URL_LENGTH = 2048;
const DOWNLOAD_TIMEOUT_MS = 60_000;

export type FetchLike = (url: string, init: { redirect: "follow"; signal: AbortSignal }) => Promise<Response>;

export interface DownloadOptions {
  fetchImpl?: FetchLike;
  maxBytes?: number;
  timeoutMs?: number;
}

export function validatePatchUrl(url: string): URL {
  if (url.length > MAX_URL_LENGTH) {
    throw new Error(`URL too long: ${url.length} characters, max ${MAX_URL_LENGTH}`);
  }
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new Error(`Invalid URL: ${url}`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`Invalid URL format, only http and https are allowed: ${url}`);
  }
  return parsed;
}

function formatLimit(bytes: number): string {
  return `${Math.floor(bytes / (1024 * 1024))}MB`;
}

export async function downloadPatch(url: string, options: DownloadOptions = {}): Promise<DownloadedFile> {
  validatePatchUrl(url);
  const fetchImpl = options.fetchImpl ?? fetch;
  const maxBytes = options.maxBytes ?? MAX_DOWNLOAD_BYTES;

  const response = await fetchImpl(url, {
    redirect: "follow",
    signal: AbortSignal.timeout(options.timeoutMs ?? DOWNLOAD_TIMEOUT_MS)
  });
  if (!response.ok) {
    throw new Error(`Download failed with HTTP ${response.status}: ${url}`);
  }
  const declared = Number(response.headers.get("content-length") ?? "0");
  if (declared > maxBytes) {
    throw new Error(`File too large (max ${formatLimit(maxBytes)})`);
  }

  const chunks: Uint8Array[] = [];
  let received = 0;
  if (response.body) {
    const reader = response.body.getReader();
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      received += value.byteLength;
      if (received > maxBytes) {
        await reader.cancel();
        throw new Error(`Download exceeded size limit (max ${formatLimit(maxBytes)})`);
      }
      chunks.push(value);
    }
  }

  return {
    url: response.url || url,
    contentType: response.headers.get("content-type") ?? "",
    data: new Uint8Array(Buffer.concat(chunks))
  };
}
