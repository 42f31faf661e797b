import path from "node:path";

const MAX_NAME_LENGTH = 100;

export function toPosixPath(inputPath: string): string {
  return inputPath.split(path.win32.sep).join(path.posix.sep);
}

/** Why `relPath` cannot be used below a root directory, or undefined when it can. */
function unsafeReason(relPath: string): string | undefined {
  const posixPath = toPosixPath(relPath);
  if (posixPath.includes("\0")) {
    return "Invalid path contains null byte";
  }
  if (posixPath === "" || posixPath === ".") {
    return "Empty paths are not allowed";
  }
  if (path.posix.isAbsolute(posixPath)) {
    return "Absolute paths are not allowed";
  }
  if (/^[a-zA-Z]:/.test(posixPath)) {
    return "Drive paths are not allowed";
  }
  const segments = posixPath.split("/");
  if (segments.includes("..")) {
    return "Path traversal is not allowed";
  }
  if (segments.some((segment) => segment === "")) {
    return "Invalid path segment";
  }
  return undefined;
}

export function ensureSafeRelPath(relPath: string): void {
  const reason = unsafeReason(relPath);
  if (reason) {
    throw new Error(`${reason}: ${relPath}`);
  }
}

/** Resolves an archive or output path below `rootDir`, refusing anything that lands outside it. */
export function safeJoin(rootDir: string, relPosixPath: string): string {
  ensureSafeRelPath(relPosixPath);
  const root = path.resolve(rootDir);
  const resolved = path.resolve(root, ...toPosixPath(relPosixPath).split("/"));
  if (resolved !== root && !resolved.startsWith(root + path.sep)) {
    throw new Error(`Path escapes root: ${relPosixPath}`);
  }
  return resolved;
}

/** Keeps letters, digits, spaces, `-`, `_` and `.`; falls back when nothing is left. */
export function sanitizeName(name: string, fallback: string): string {
  const cleaned = Array.from(name)
    .filter((char) => /[\p{L}\p{N} ._-]/u.test(char))
    .join("")
    .slice(0, MAX_NAME_LENGTH)
    .trim();
  if (!cleaned || /^\.+$/.test(cleaned)) {
    return fallback;
  }
  return cleaned;
}
