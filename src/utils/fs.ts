import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import fg from "fast-glob";
import { safeJoin, toPosixPath } from "./paths.js";

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function assertFile(filePath: string, label: string): Promise<void> {
  let stat;
  try {
    stat = await fs.stat(filePath);
  } catch {
    throw new Error(`${label} does not exist: ${filePath}`);
  }
  if (!stat.isFile()) {
    throw new Error(`${label} is not a file: ${filePath}`);
  }
}

export async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await fs.access(targetPath);
    return true;
  } catch {
    return false;
  }
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, "utf8");
  return JSON.parse(raw);
}

export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  const payload = `${JSON.stringify(data, null, 2)}\n`;
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, payload, "utf8");
}

/** Regular files under `rootDir` matching `patterns`, as sorted posix paths. Symlinks are rejected. */
export async function listFiles(rootDir: string, patterns: string[]): Promise<string[]> {
  const entries = await fg(patterns, {
    cwd: rootDir,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    caseSensitiveMatch: false,
    unique: true
  });
  const files: string[] = [];
  for (const entry of entries) {
    const relPath = toPosixPath(entry);
    const stat = await fs.lstat(safeJoin(rootDir, relPath));
    if (stat.isSymbolicLink()) {
      throw new Error(`Symlinks are not allowed: ${relPath}`);
    }
    if (stat.isFile()) {
      files.push(relPath);
    }
  }
  files.sort();
  return files;
}

export async function createTempDir(prefix: string): Promise<string> {
  const base = path.join(os.tmpdir(), prefix);
  return fs.mkdtemp(base);
}

export async function removeDir(targetPath: string): Promise<void> {
  await fs.rm(targetPath, { recursive: true, force: true });
}
