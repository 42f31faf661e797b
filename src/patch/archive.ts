import path from "node:path";
import fs from "node:fs/promises";
import { createTempDir, listFiles, removeDir } from "../utils/fs.js";
import { safeJoin } from "../utils/paths.js";
import { extractZip } from "../utils/zip.js";
import type { DownloadedFile, PatchBundle, PatchFile } from "./types.js";

const UNSUPPORTED_ARCHIVES = [".7z", ".rar", ".tar", ".gz", ".bz2"];
const README_NAMES = new Set(["readme", "readme.txt", "readme.md", "readme.txt.txt"]);
const README_EXTENSIONS = [".txt", ".md", ".text"];

export type PatchContainer = "bps" | "zip";

function urlExtension(url: string): string {
  return path.posix.extname(new URL(url).pathname).toLowerCase();
}

export function detectContainer(url: string, contentType: string): PatchContainer {
  const type = contentType.toLowerCase();
  const ext = urlExtension(url);
  if (type.includes("zip") || ext === ".zip") {
    return "zip";
  }
  if (type.includes("7z") || UNSUPPORTED_ARCHIVES.includes(ext)) {
    throw new Error(`Unsupported archive format: ${ext || type}`);
  }
  return "bps";
}

export function isReadmeName(fileName: string): boolean {
  const lower = path.posix.basename(fileName).toLowerCase();
  return README_NAMES.has(lower) || (lower.startsWith("readme") && README_EXTENSIONS.some((ext) => lower.endsWith(ext)));
}

export async function extractPatchesFromZip(zipPath: string): Promise<PatchBundle> {
  const tempDir = await createTempDir("bps-patcher-zip-");
  try {
    await extractZip(zipPath, tempDir);
    const files = await listFiles(tempDir, ["**/*"]);

    const patches: PatchFile[] = [];
    for (const relPath of files.filter((file) => file.toLowerCase().endsWith(".bps"))) {
      patches.push({ name: relPath, data: new Uint8Array(await fs.readFile(safeJoin(tempDir, relPath))) });
    }
    if (patches.length === 0) {
      throw new Error("No BPS file found in ZIP archive");
    }

    const readmePath = files.find(isReadmeName);
    const readme = readmePath ? await fs.readFile(safeJoin(tempDir, readmePath), "utf8") : undefined;
    return { patches, readme };
  } finally {
    await removeDir(tempDir);
  }
}

function downloadName(url: string): string {
  const base = path.posix.basename(new URL(url).pathname);
  return base || "patch.bps";
}

/** Turns a downloaded file into the patches it carries. */
export async function unpackDownload(file: DownloadedFile): Promise<PatchBundle> {
  if (detectContainer(file.url, file.contentType) === "bps") {
    return { patches: [{ name: downloadName(file.url), data: file.data }] };
  }
  const tempDir = await createTempDir("bps-patcher-download-");
  try {
    const zipPath = path.join(tempDir, "download.zip");
    await fs.writeFile(zipPath, file.data);
    return await extractPatchesFromZip(zipPath);
  } finally {
    await removeDir(tempDir);
  }
}
