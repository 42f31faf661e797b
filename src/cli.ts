#!/usr/bin/env node
import path from "node:path";
import fs from "node:fs/promises";
import { Command } from "commander";
import { describePatch } from "./bps/container.js";
import { defaultConfigPath, isEngineName, loadConfig, saveConfig, setConfigValue } from "./config.js";
import type { EngineName, PatcherConfig } from "./config.js";
import { applyPatchFile, patchFromUrl } from "./patch/apply.js";
import { resolveEngine } from "./patch/engines.js";
import { createPatchServer, listen } from "./server.js";
import { formatChecksum } from "./utils/hash.js";
import { launchEmulator } from "./utils/launch.js";

const program = new Command();

program
  .name("bps-patcher")
  .description("Apply BPS patches to ROM images, from files or from URLs handed over by a web page.")
  .version("0.1.0")
  .option("--config <file>", "Settings file", defaultConfigPath());

function configPath(): string {
  const opts = program.opts<{ config: string }>();
  return path.resolve(opts.config);
}

async function run(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  }
}

function parseEngine(value: string | undefined, config: PatcherConfig): EngineName {
  if (value === undefined) {
    return config.engine;
  }
  if (!isEngineName(value)) {
    throw new Error(`Unknown engine: ${value} (expected auto, builtin or flips)`);
  }
  return value;
}

function printReadme(readme: string | undefined): void {
  if (readme) {
    console.log("\n--- README ---");
    console.log(readme.trimEnd());
  }
}

program
  .command("apply")
  .description("Apply a BPS patch file to a ROM file.")
  .requiredOption("--rom <file>", "Source ROM")
  .requiredOption("--patch <file.bps>", "BPS patch")
  .requiredOption("--out <file>", "Patched output file")
  .option("--engine <name>", "auto, builtin or flips")
  .option("--strict", "Fail on size or checksum mismatches")
  .option("--launch", "Open the result in the configured emulator")
  .action((opts: { rom: string; patch: string; out: string; engine?: string; strict?: boolean; launch?: boolean }) =>
    run(async () => {
      const config = await loadConfig(configPath());
      const engine = await resolveEngine(parseEngine(opts.engine, config), {
        flipsPath: config.flipsPath,
        strict: opts.strict ?? config.strict
      });
      const size = await applyPatchFile({ rom: opts.rom, patch: opts.patch, output: opts.out, engine });
      console.log(`Patched ${size} bytes with ${engine.name} engine into ${opts.out}`);
      if (opts.launch) {
        if (!config.emulatorPath) {
          throw new Error("Emulator is not set: run `config set emulatorPath <file>`");
        }
        await launchEmulator(config.emulatorPath, opts.out);
        console.log(`Launched: ${opts.out}`);
      }
    })
  );

program
  .command("info")
  .description("Show the header, metadata and checksums of a BPS patch.")
  .requiredOption("--patch <file.bps>", "BPS patch")
  .action((opts: { patch: string }) =>
    run(async () => {
      const { header, trailer, metadata } = describePatch(await fs.readFile(opts.patch));
      console.log(`Source size:    ${header.sourceSize}`);
      console.log(`Target size:    ${header.targetSize}`);
      console.log(`Metadata size:  ${header.metadataSize}`);
      console.log(`Actions start:  ${header.actionStreamStart}`);
      console.log(`Source CRC32:   ${formatChecksum(trailer.sourceChecksum)}`);
      console.log(`Target CRC32:   ${formatChecksum(trailer.targetChecksum)}`);
      console.log(`Patch CRC32:    ${formatChecksum(trailer.patchChecksum)}`);
      if (metadata) {
        console.log(`Metadata:\n${metadata}`);
      }
    })
  );

program
  .command("fetch")
  .description("Download a patch or zip archive of patches and apply it to the configured base ROM.")
  .argument("<url>", "http or https URL of a .bps or .zip file")
  .option("--title <name>", "Name of the patched ROM", "level")
  .option("--launch", "Open the result in the configured emulator")
  .action((url: string, opts: { title: string; launch?: boolean }) =>
    run(async () => {
      const config = await loadConfig(configPath());
      console.log(`Downloading ${url}`);
      const result = await patchFromUrl(config, { url, title: opts.title }, { launch: opts.launch ? launchEmulator : undefined });
      for (const output of result.outputs) {
        console.log(`Patch applied with ${result.engine} engine, saved to ${output}`);
      }
      printReadme(result.readme);
    })
  );

program
  .command("serve")
  .description("Listen on localhost for patch requests from a web page.")
  .option("--port <n>", "Port to listen on")
  .action((opts: { port?: string }) =>
    run(async () => {
      const config = await loadConfig(configPath());
      const port = opts.port === undefined ? config.port : Number(opts.port);
      if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new Error(`Invalid port: ${opts.port}`);
      }
      const server = createPatchServer({
        onPatchRequest: async (request) => {
          console.log(`Patch request: ${request.url}`);
          // Settings are re-read so that `config set` takes effect without a restart.
          const current = await loadConfig(configPath());
          const launch = current.emulatorPath ? launchEmulator : undefined;
          const result = await patchFromUrl(current, request, { launch });
          for (const output of result.outputs) {
            console.log(`Patch applied! Saved to ${output}`);
          }
          printReadme(result.readme);
        },
        onError: (err, request) => {
          console.error(`Failed to apply patch from ${request.url}: ${err instanceof Error ? err.message : err}`);
        }
      });
      const address = await listen(server, port);
      console.log(`Server running on http://localhost:${address.port}`);
    })
  );

const configCommand = program.command("config").description("Show or change saved settings.");

configCommand
  .command("show")
  .description("Print the effective settings.")
  .action(() =>
    run(async () => {
      const file = configPath();
      console.log(`# ${file}`);
      console.log(JSON.stringify(await loadConfig(file), null, 2));
    })
  );

configCommand
  .command("set")
  .description("Change one setting; an empty value clears a path.")
  .argument("<key>", "baseRomPath, outputDir, emulatorPath, flipsPath, engine, strict, showReadme or port")
  .argument("<value>", "New value")
  .action((key: string, value: string) =>
    run(async () => {
      const file = configPath();
      const config = setConfigValue(await loadConfig(file), key, value);
      await saveConfig(file, config);
      console.log(`Saved ${key} to ${file}`);
    })
  );

await program.parseAsync(process.argv);
