import path from "node:path";
import { createWriteStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import type { Readable } from "node:stream";
import * as yauzl from "yauzl";
import { ensureDir } from "./fs.js";
import { safeJoin, toPosixPath } from "./paths.js";

function openZip(zipPath: string): Promise<yauzl.ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.open(zipPath, { lazyEntries: true }, (err, zipfile) => {
      if (err || !zipfile) {
        reject(err ?? new Error(`Unable to open zip: ${zipPath}`));
        return;
      }
      resolve(zipfile);
    });
  });
}

function openEntry(zipfile: yauzl.ZipFile, entry: yauzl.Entry): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zipfile.openReadStream(entry, (err, stream) => {
      if (err || !stream) {
        reject(err ?? new Error(`Unable to read entry ${entry.fileName}`));
        return;
      }
      resolve(stream);
    });
  });
}

/** Writes one entry below `outDir`; directory entries only create the directory. */
async function extractEntry(zipfile: yauzl.ZipFile, entry: yauzl.Entry, outDir: string): Promise<void> {
  const entryName = toPosixPath(entry.fileName);
  if (entryName.endsWith("/")) {
    await ensureDir(safeJoin(outDir, entryName.slice(0, -1)));
    return;
  }
  const destPath = safeJoin(outDir, entryName);
  await ensureDir(path.dirname(destPath));
  await pipeline(await openEntry(zipfile, entry), createWriteStream(destPath));
}

/** Extracts every entry of `zipPath` into `outDir`, one entry at a time. */
export async function extractZip(zipPath: string, outDir: string): Promise<void> {
  await ensureDir(outDir);
  const zipfile = await openZip(zipPath);
  try {
    await new Promise<void>((resolve, reject) => {
      zipfile.on("entry", (entry: yauzl.Entry) => {
        extractEntry(zipfile, entry, outDir)
          .then(() => zipfile.readEntry())
          .catch(reject);
      });
      zipfile.once("end", () => resolve());
      zipfile.once("error", reject);
      zipfile.readEntry();
    });
  } finally {
    zipfile.close();
  }
}
