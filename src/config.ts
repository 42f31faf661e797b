import path from "node:path";
import os from "node:os";
import { pathExists, readJsonFile, writeJsonFile } from "./utils/fs.js";

export type EngineName = "auto" | "builtin" | "flips";

export interface PatcherConfig {
  baseRomPath?: string;
  outputDir?: string;
  emulatorPath?: string;
  flipsPath?: string;
  engine: EngineName;
  strict: boolean;
  showReadme: boolean;
  port: number;
}

export type ConfigKey = keyof PatcherConfig;

export const DEFAULT_PORT = 8765;

export const DEFAULT_CONFIG: Readonly<PatcherConfig> = {
  engine: "auto",
  strict: false,
  showReadme: true,
  port: DEFAULT_PORT
};

const PATH_KEYS = ["baseRomPath", "outputDir", "emulatorPath", "flipsPath"] as const;
const CONFIG_KEYS: readonly ConfigKey[] = [...PATH_KEYS, "engine", "strict", "showReadme", "port"];

export function defaultConfigPath(): string {
  return path.join(os.homedir(), ".bps-patcher", "config.json");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isEngineName(value: unknown): value is EngineName {
  return value === "auto" || value === "builtin" || value === "flips";
}

export function isConfigKey(value: string): value is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(value);
}

function isPort(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 1 && value <= 65535;
}

export function validateConfig(raw: unknown): PatcherConfig {
  if (!isRecord(raw)) {
    throw new Error("Invalid config: expected object");
  }
  const config: PatcherConfig = { ...DEFAULT_CONFIG };
  for (const key of PATH_KEYS) {
    const value = raw[key];
    if (value === undefined || value === null || value === "") {
      continue;
    }
    if (typeof value !== "string") {
      throw new Error(`Invalid config ${key}: expected string`);
    }
    config[key] = value;
  }
  if (raw.engine !== undefined) {
    if (!isEngineName(raw.engine)) {
      throw new Error(`Invalid config engine: expected auto, builtin or flips`);
    }
    config.engine = raw.engine;
  }
  for (const key of ["strict", "showReadme"] as const) {
    const value = raw[key];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== "boolean") {
      throw new Error(`Invalid config ${key}: expected boolean`);
    }
    config[key] = value;
  }
  if (raw.port !== undefined) {
    if (!isPort(raw.port)) {
      throw new Error("Invalid config port: expected integer between 1 and 65535");
    }
    config.port = raw.port;
  }
  return config;
}

export async function loadConfig(configPath: string): Promise<PatcherConfig> {
  if (!(await pathExists(configPath))) {
    return { ...DEFAULT_CONFIG };
  }
  let raw: unknown;
  try {
    raw = await readJsonFile(configPath);
  } catch {
    throw new Error(`Config file is not valid JSON: ${configPath}`);
  }
  return validateConfig(raw);
}

export async function saveConfig(configPath: string, config: PatcherConfig): Promise<void> {
  await writeJsonFile(configPath, config);
}

function parseBoolean(key: ConfigKey, value: string): boolean {
  if (value === "true") {
    return true;
  }
  if (value === "false") {
    return false;
  }
  throw new Error(`Invalid value for ${key}: expected true or false`);
}

/** Returns a copy of `config` with one field parsed from its command-line text form. Empty text clears a path. */
export function setConfigValue(config: PatcherConfig, key: string, value: string): PatcherConfig {
  if (!isConfigKey(key)) {
    throw new Error(`Unknown config key: ${key}`);
  }
  const next: PatcherConfig = { ...config };
  switch (key) {
    case "engine":
      if (!isEngineName(value)) {
        throw new Error(`Invalid value for engine: ${value}`);
      }
      next.engine = value;
      break;
    case "strict":
    case "showReadme":
      next[key] = parseBoolean(key, value);
      break;
    case "port": {
      const port = Number(value);
      if (!isPort(port)) {
        throw new Error(`Invalid value for port: ${value}`);
      }
      next.port = port;
      break;
    }
    default:
      if (value === "") {
        delete next[key];
      } else {
        next[key] = path.resolve(value);
      }
  }
  return next;
}
