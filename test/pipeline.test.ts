import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import fs from "node:fs/promises";
import os from "node:os";
import { BpsError } from "../src/bps/errors.js";
import { DEFAULT_CONFIG } from "../src/config.js";
import type { PatcherConfig } from "../src/config.js";
import { applyPatchFile, patchFromUrl } from "../src/patch/apply.js";
import type { FetchLike } from "../src/patch/download.js";
import { createBuiltinEngine } from "../src/patch/engines.js";
import { buildPatch, writeZip } from "./helpers/bps.js";

async function withWorkspace(fn: (dir: string, config: PatcherConfig) => Promise<void>): Promise<void> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "bps-patcher-pipeline-"));
  try {
    const baseRomPath = path.join(dir, "base.smc");
    await fs.writeFile(baseRomPath, Uint8Array.of(1, 2, 3, 4));
    await fn(dir, { ...DEFAULT_CONFIG, baseRomPath, outputDir: path.join(dir, "out") });
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

function serve(data: Uint8Array, contentType: string): FetchLike {
  return async () => new Response(data, { headers: { "content-type": contentType } });
}

const levelPatch = buildPatch({
  sourceSize: 4,
  targetSize: 4,
  actions: [
    { kind: "sourceRead", length: 2 },
    { kind: "targetRead", bytes: [9, 9] }
  ]
});

test("applyPatchFile patches one ROM file into another", async () => {
  await withWorkspace(async (dir, config) => {
    const patchPath = path.join(dir, "level.bps");
    const output = path.join(dir, "result", "level.smc");
    await fs.writeFile(patchPath, levelPatch);
    const size = await applyPatchFile({
      rom: config.baseRomPath ?? "",
      patch: patchPath,
      output,
      engine: createBuiltinEngine()
    });
    assert.equal(size, 4);
    assert.deepEqual(new Uint8Array(await fs.readFile(output)), Uint8Array.of(1, 2, 9, 9));
  });
});

test("applyPatchFile reports a missing patch file", async () => {
  await withWorkspace(async (dir, config) => {
    const patchPath = path.join(dir, "missing.bps");
    await assert.rejects(
      applyPatchFile({ rom: config.baseRomPath ?? "", patch: patchPath, output: path.join(dir, "o.smc"), engine: createBuiltinEngine() }),
      { message: `Patch does not exist: ${patchPath}` }
    );
  });
});

test("patchFromUrl downloads, applies and names the output after the title", async () => {
  await withWorkspace(async (dir, config) => {
    const result = await patchFromUrl(
      config,
      { url: "https://levels.test/level.bps", title: "My Level!" },
      { fetchImpl: serve(levelPatch, "application/octet-stream"), engine: createBuiltinEngine() }
    );
    const expected = path.join(dir, "out", "My Level.smc");
    assert.deepEqual(result, { engine: "builtin", outputs: [expected], readme: undefined, launched: false });
    assert.deepEqual(new Uint8Array(await fs.readFile(expected)), Uint8Array.of(1, 2, 9, 9));
  });
});

test("patchFromUrl writes one output per patch in an archive", async () => {
  await withWorkspace(async (dir, config) => {
    const zipPath = path.join(dir, "pack.zip");
    const other = buildPatch({ sourceSize: 4, targetSize: 1, actions: [{ kind: "targetRead", bytes: [5] }] });
    await writeZip(zipPath, { "a.bps": levelPatch, "b.bps": other, "readme.md": "# Pack" });
    const zip = new Uint8Array(await fs.readFile(zipPath));

    const result = await patchFromUrl(
      config,
      { url: "https://levels.test/pack.zip", title: "Pack" },
      { fetchImpl: serve(zip, "application/zip"), engine: createBuiltinEngine() }
    );
    const outA = path.join(dir, "out", "Pack - a.smc");
    const outB = path.join(dir, "out", "Pack - b.smc");
    assert.deepEqual(result.outputs, [outA, outB]);
    assert.equal(result.readme, "# Pack");
    assert.deepEqual(new Uint8Array(await fs.readFile(outB)), Uint8Array.of(5));
  });
});

test("patchFromUrl leaves out the readme when it is switched off", async () => {
  await withWorkspace(async (dir, config) => {
    const zipPath = path.join(dir, "pack.zip");
    await writeZip(zipPath, { "a.bps": levelPatch, "readme.txt": "hidden" });
    const result = await patchFromUrl(
      { ...config, showReadme: false },
      { url: "https://levels.test/pack.zip" },
      { fetchImpl: serve(new Uint8Array(await fs.readFile(zipPath)), "application/zip"), engine: createBuiltinEngine() }
    );
    assert.equal(result.readme, undefined);
    assert.deepEqual(result.outputs, [path.join(dir, "out", "level.smc")]);
  });
});

test("patchFromUrl launches the emulator when one is configured", async () => {
  await withWorkspace(async (_dir, config) => {
    const launches: string[][] = [];
    const result = await patchFromUrl(
      { ...config, emulatorPath: "/opt/emulator" },
      { url: "https://levels.test/level.bps", title: "run" },
      {
        fetchImpl: serve(levelPatch, "application/octet-stream"),
        engine: createBuiltinEngine(),
        launch: async (program, file) => {
          launches.push([program, file]);
        }
      }
    );
    assert.equal(result.launched, true);
    assert.deepEqual(launches, [["/opt/emulator", result.outputs[0]]]);
  });
});

test("patchFromUrl requires a base ROM", async () => {
  await withWorkspace(async (_dir, config) => {
    const { baseRomPath: _unused, ...rest } = config;
    await assert.rejects(patchFromUrl(rest, { url: "https://levels.test/level.bps" }), /Base ROM is not set/);
  });
});

test("patchFromUrl names the patch and engine when applying fails", async () => {
  await withWorkspace(async (_dir, config) => {
    const garbage = Uint8Array.from(Buffer.from("definitely not a patch"));
    await assert.rejects(
      patchFromUrl(
        config,
        { url: "https://levels.test/level.bps" },
        { fetchImpl: serve(garbage, "application/octet-stream"), engine: createBuiltinEngine() }
      ),
      (err: unknown) =>
        err instanceof Error &&
        err.message.startsWith("Failed to apply level.bps with builtin: ") &&
        err.cause instanceof BpsError &&
        err.cause.code === "BadMagic"
    );
  });
});

test("patchFromUrl keeps same-named patches from different folders apart", async () => {
  await withWorkspace(async (dir, config) => {
    const zipPath = path.join(dir, "pack.zip");
    const other = buildPatch({ sourceSize: 4, targetSize: 1, actions: [{ kind: "targetRead", bytes: [5] }] });
    await writeZip(zipPath, { "a/x.bps": levelPatch, "b/x.bps": other });
    const result = await patchFromUrl(
      config,
      { url: "https://levels.test/pack.zip", title: "Pack" },
      { fetchImpl: serve(new Uint8Array(await fs.readFile(zipPath)), "application/zip"), engine: createBuiltinEngine() }
    );
    const outA = path.join(dir, "out", "Pack - a_x.smc");
    const outB = path.join(dir, "out", "Pack - b_x.smc");
    assert.deepEqual(result.outputs, [outA, outB]);
    assert.deepEqual(new Uint8Array(await fs.readFile(outA)), Uint8Array.of(1, 2, 9, 9));
    assert.deepEqual(new Uint8Array(await fs.readFile(outB)), Uint8Array.of(5));
  });
});

test("patchFromUrl numbers patches whose cleaned names collide", async () => {
  await withWorkspace(async (dir, config) => {
    const zipPath = path.join(dir, "pack.zip");
    await writeZip(zipPath, { "x!.bps": levelPatch, "x.bps": levelPatch });
    const result = await patchFromUrl(
      config,
      { url: "https://levels.test/pack.zip", title: "Pack" },
      { fetchImpl: serve(new Uint8Array(await fs.readFile(zipPath)), "application/zip"), engine: createBuiltinEngine() }
    );
    assert.deepEqual(result.outputs, [path.join(dir, "out", "Pack - x.smc"), path.join(dir, "out", "Pack - x (2).smc")]);
  });
});

test("patchFromUrl falls back to the default title when nothing usable is left", async () => {
  await withWorkspace(async (dir, config) => {
    const result = await patchFromUrl(
      config,
      { url: "https://levels.test/level.bps", title: "???" },
      { fetchImpl: serve(levelPatch, "application/octet-stream"), engine: createBuiltinEngine() }
    );
    assert.deepEqual(result.outputs, [path.join(dir, "out", "level.smc")]);
  });
});
