export * from "./bps/index.js";
export { DEFAULT_CONFIG, defaultConfigPath, loadConfig, saveConfig, setConfigValue, validateConfig } from "./config.js";
export type { ConfigKey, EngineName, PatcherConfig } from "./config.js";
export { applyPatchFile, patchFromUrl } from "./patch/apply.js";
export type { PipelineDeps } from "./patch/apply.js";
export { detectContainer, extractPatchesFromZip, unpackDownload } from "./patch/archive.js";
export { downloadPatch, validatePatchUrl } from "./patch/download.js";
export type { DownloadOptions, FetchLike } from "./patch/download.js";
export { createBuiltinEngine, createFlipsEngine, findFlips, resolveEngine } from "./patch/engines.js";
export type { CommandResult, CommandRunner, PatchEngine } from "./patch/engines.js";
export type * from "./patch/types.js";
export { createPatchServer, listen, parsePatchRequest } from "./server.js";
export type { PatchServerOptions } from "./server.js";
export { crc32 } from "./utils/hash.js";
export { launchEmulator } from "./utils/launch.js";
