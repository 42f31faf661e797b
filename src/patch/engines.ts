import path from "node:path";
import fs from "node:fs/promises";
import { execFile } from "node:child_process";
import { applyBps } from "../bps/apply.js";
import type { ApplyBpsOptions } from "../bps/types.js";
import type { EngineName } from "../config.js";
import { createTempDir, pathExists, removeDir } from "../utils/fs.js";

const FLIPS_TIMEOUT_MS = 30_000;
const FLIPS_NAMES = ["flips", "flips.exe"];

export interface PatchEngine {
  readonly name: string;
  apply(source: Uint8Array, patch: Uint8Array): Promise<Uint8Array>;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: string[], timeoutMs: number) => Promise<CommandResult>;

export const execFileRunner: CommandRunner = (command, args, timeoutMs) =>
  new Promise((resolve, reject) => {
    execFile(command, args, { timeout: timeoutMs, windowsHide: true }, (err, stdout, stderr) => {
      if (!err) {
        resolve({ exitCode: 0, stdout, stderr });
      } else if (typeof err.code === "number") {
        resolve({ exitCode: err.code, stdout, stderr });
      } else if (err.killed) {
        reject(new Error(`${path.basename(command)} timed out after ${timeoutMs} ms`));
      } else {
        reject(err);
      }
    });
  });

export function createBuiltinEngine(options: ApplyBpsOptions = {}): PatchEngine {
  return {
    name: "builtin",
    apply: async (source, patch) => applyBps(source, patch, options)
  };
}

function describeFailure(flipsPath: string, result: CommandResult | undefined, cause: unknown): string {
  let message = `${path.basename(flipsPath)} produced no output`;
  if (result) {
    message += ` (exit code ${result.exitCode})`;
    if (result.stderr.trim()) {
      message += `: ${result.stderr.trim()}`;
    }
  } else if (cause instanceof Error) {
    message += `: ${cause.message}`;
  }
  return message;
}

/** Delegates to an external flips binary through temporary files. */
export function createFlipsEngine(flipsPath: string, runner: CommandRunner = execFileRunner): PatchEngine {
  return {
    name: "flips",
    async apply(source, patch) {
      const tempDir = await createTempDir("bps-patcher-flips-");
      try {
        const sourcePath = path.join(tempDir, "source.bin");
        const patchPath = path.join(tempDir, "patch.bps");
        const outputPath = path.join(tempDir, "output.bin");
        await fs.writeFile(sourcePath, source);
        await fs.writeFile(patchPath, patch);

        let result: CommandResult | undefined;
        let firstError: unknown;
        try {
          result = await runner(flipsPath, ["-a", patchPath, sourcePath, outputPath], FLIPS_TIMEOUT_MS);
        } catch (err) {
          firstError = err;
        }
        // Older builds only accept the long form of the flag.
        if (!result || (result.exitCode !== 0 && !(await pathExists(outputPath)))) {
          result = await runner(flipsPath, ["--apply", patchPath, sourcePath, outputPath], FLIPS_TIMEOUT_MS);
        }
        // A non-zero exit code with an output file still counts, as flips warns through its exit code.
        if (!(await pathExists(outputPath))) {
          throw new Error(describeFailure(flipsPath, result, firstError));
        }
        return new Uint8Array(await fs.readFile(outputPath));
      } finally {
        await removeDir(tempDir);
      }
    }
  };
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/** Looks for flips at the configured path, then on PATH. */
export async function findFlips(configuredPath?: string, searchPath = process.env.PATH ?? ""): Promise<string | undefined> {
  if (configuredPath && (await isFile(configuredPath))) {
    return path.resolve(configuredPath);
  }
  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) {
      continue;
    }
    for (const name of FLIPS_NAMES) {
      const candidate = path.join(dir, name);
      if (await isFile(candidate)) {
        return candidate;
      }
    }
  }
  return undefined;
}

export interface ResolveEngineOptions {
  flipsPath?: string;
  strict?: boolean;
  searchPath?: string;
  runner?: CommandRunner;
}

/** `auto` prefers flips when it can be found and falls back to the builtin engine. */
export async function resolveEngine(preference: EngineName, options: ResolveEngineOptions = {}): Promise<PatchEngine> {
  const builtin = createBuiltinEngine({ strict: options.strict });
  if (preference === "builtin") {
    return builtin;
  }
  const flips = await findFlips(options.flipsPath, options.searchPath);
  if (flips) {
    return createFlipsEngine(flips, options.runner);
  }
  if (preference === "flips") {
    throw new Error("flips not found: set flipsPath or add flips to PATH");
  }
  return builtin;
}
