import path from "node:path";
import fs from "node:fs/promises";
import type { PatcherConfig } from "../config.js";
import { assertFile, ensureDir } from "../utils/fs.js";
import type { Launcher } from "../utils/launch.js";
import { safeJoin, sanitizeName } from "../utils/paths.js";
import { unpackDownload } from "./archive.js";
import { downloadPatch, validatePatchUrl } from "./download.js";
import type { FetchLike } from "./download.js";
import { resolveEngine } from "./engines.js";
import type { PatchEngine } from "./engines.js";
import type { PatchFile, PatchRequest, PatchResult } from "./types.js";

interface ApplyFileOptions {
  rom: string;
  patch: string;
  output: string;
  engine: PatchEngine;
}

export interface PipelineDeps {
  fetchImpl?: FetchLike;
  engine?: PatchEngine;
  launch?: Launcher;
}

async function runEngine(engine: PatchEngine, rom: Uint8Array, patch: PatchFile): Promise<Uint8Array> {
  try {
    return await engine.apply(rom, patch.data);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to apply ${patch.name} with ${engine.name}: ${message}`, { cause: err });
  }
}

export async function applyPatchFile(options: ApplyFileOptions): Promise<number> {
  const rom = path.resolve(options.rom);
  const patch = path.resolve(options.patch);
  const output = path.resolve(options.output);
  await assertFile(rom, "ROM");
  await assertFile(patch, "Patch");

  const [romData, patchData] = await Promise.all([fs.readFile(rom), fs.readFile(patch)]);
  const patched = await runEngine(options.engine, romData, { name: path.basename(patch), data: patchData });
  await ensureDir(path.dirname(output));
  await fs.writeFile(output, patched);
  return patched.length;
}

/**
 * One file name per patch. Several patches get their archive path appended, with folders joined
 * by `_`, and a numeric suffix settles whatever still collides.
 */
function outputFileNames(title: string, patches: PatchFile[], ext: string): string[] {
  if (patches.length === 1) {
    return [`${title}${ext}`];
  }
  const used = new Set<string>();
  return patches.map((patch) => {
    const withoutExt = patch.name.slice(0, patch.name.length - path.posix.extname(patch.name).length);
    const stem = `${title} - ${sanitizeName(withoutExt.split("/").join("_"), "patch")}`;
    let name = `${stem}${ext}`;
    for (let n = 2; used.has(name.toLowerCase()); n++) {
      name = `${stem} (${n})${ext}`;
    }
    used.add(name.toLowerCase());
    return name;
  });
}

/** Downloads a patch or patch archive, applies it to the configured base ROM and writes the results. */
export async function patchFromUrl(config: PatcherConfig, request: PatchRequest, deps: PipelineDeps = {}): Promise<PatchResult> {
  validatePatchUrl(request.url);
  if (!config.baseRomPath) {
    throw new Error("Base ROM is not set: run `config set baseRomPath <file>`");
  }
  await assertFile(config.baseRomPath, "Base ROM");
  if (!config.outputDir) {
    throw new Error("Output directory is not set: run `config set outputDir <dir>`");
  }

  const title = sanitizeName(request.title ?? "level", "level");
  const download = await downloadPatch(request.url, { fetchImpl: deps.fetchImpl });
  const bundle = await unpackDownload(download);
  const rom = await fs.readFile(config.baseRomPath);
  const engine = deps.engine ?? (await resolveEngine(config.engine, { flipsPath: config.flipsPath, strict: config.strict }));

  const outputDir = path.resolve(config.outputDir);
  await ensureDir(outputDir);
  const ext = path.extname(config.baseRomPath) || ".bin";
  const names = outputFileNames(title, bundle.patches, ext);
  const outputs: string[] = [];
  for (const [index, patch] of bundle.patches.entries()) {
    const patched = await runEngine(engine, rom, patch);
    const outputPath = safeJoin(outputDir, names[index]);
    await fs.writeFile(outputPath, patched);
    outputs.push(outputPath);
  }

  let launched = false;
  if (config.emulatorPath && deps.launch) {
    await deps.launch(config.emulatorPath, outputs[0]);
    launched = true;
  }

  return {
    engine: engine.name,
    outputs,
    readme: config.showReadme ? bundle.readme : undefined,
    launched
  };
}
