import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import fs from "node:fs/promises";
import os from "node:os";
import { detectContainer, extractPatchesFromZip, isReadmeName, unpackDownload } from "../src/patch/archive.js";
import { writeZip } from "./helpers/bps.js";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "bps-patcher-archive-"));
  try {
    await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

test("detects zip archives by content type or extension", () => {
  assert.equal(detectContainer("https://files.test/pack.zip", ""), "zip");
  assert.equal(detectContainer("https://files.test/download?id=4", "application/zip"), "zip");
  assert.equal(detectContainer("https://files.test/level.bps", "application/octet-stream"), "bps");
  assert.throws(() => detectContainer("https://files.test/level.7z", ""), /Unsupported archive format: \.7z/);
});

test("recognizes readme file names", () => {
  assert.equal(isReadmeName("docs/ReadMe.md"), true);
  assert.equal(isReadmeName("readme"), true);
  assert.equal(isReadmeName("readme_first.text"), true);
  assert.equal(isReadmeName("notes.txt"), false);
  assert.equal(isReadmeName("readme.pdf"), false);
});

test("extracts patches and the readme from a zip", async () => {
  await withTempDir(async (dir) => {
    const zipPath = path.join(dir, "pack.zip");
    await writeZip(zipPath, {
      "hack/level.bps": Uint8Array.of(1, 2, 3),
      "README.txt": "hello readme",
      "notes.txt": "not a readme"
    });
    const bundle = await extractPatchesFromZip(zipPath);
    assert.deepEqual(bundle, {
      patches: [{ name: "hack/level.bps", data: Uint8Array.of(1, 2, 3) }],
      readme: "hello readme"
    });
  });
});

test("returns every patch in path order", async () => {
  await withTempDir(async (dir) => {
    const zipPath = path.join(dir, "pack.zip");
    await writeZip(zipPath, { "b.bps": Uint8Array.of(2), "A.BPS": Uint8Array.of(1) });
    const bundle = await extractPatchesFromZip(zipPath);
    assert.deepEqual(
      bundle.patches.map((patch) => patch.name),
      ["A.BPS", "b.bps"]
    );
    assert.equal(bundle.readme, undefined);
  });
});

test("fails when the archive holds no patch", async () => {
  await withTempDir(async (dir) => {
    const zipPath = path.join(dir, "pack.zip");
    await writeZip(zipPath, { "readme.txt": "nothing here" });
    await assert.rejects(extractPatchesFromZip(zipPath), { message: "No BPS file found in ZIP archive" });
  });
});

test("a raw download is a single patch named after the URL", async () => {
  const data = Uint8Array.of(0x42, 0x50, 0x53, 0x31);
  const bundle = await unpackDownload({
    url: "https://files.test/files/level.bps?dl=1",
    contentType: "application/octet-stream",
    data
  });
  assert.deepEqual(bundle, { patches: [{ name: "level.bps", data }] });
});

test("a zip download is unpacked", async () => {
  await withTempDir(async (dir) => {
    const zipPath = path.join(dir, "pack.zip");
    await writeZip(zipPath, { "level.bps": Uint8Array.of(9) });
    const bundle = await unpackDownload({
      url: "https://files.test/get",
      contentType: "application/x-zip-compressed",
      data: new Uint8Array(await fs.readFile(zipPath))
    });
    assert.deepEqual(bundle.patches, [{ name: "level.bps", data: Uint8Array.of(9) }]);
  });
});
