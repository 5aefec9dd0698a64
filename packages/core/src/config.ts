import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import TOML, { type JsonMap } from "@iarna/toml";
import type { AppConfig, DecodeConfig, PollConfig, SourceMarkersConfig, WatchConfig } from "@steplog/contracts";
import { SteplogError, errorMessage } from "./errors.js";
import { createSubsystemLogger } from "./logging.js";
import { asRecord } from "./utils.js";

const log = createSubsystemLogger("core/config");

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), ".steplog", "config.toml");

export const DEFAULT_CONFIG: AppConfig = {
  poll: {
    intervalMs: 2500,
    progressEvery: 10,
    interactivePreload: false,
  },
  decode: {
    concurrency: 4,
    recordCacheSize: 32,
  },
  sources: {
    eventMarker: ".tfevents",
    recordMarker: ".tfrecords",
  },
  watch: {
    enabled: true,
    debounceMs: 200,
  },
};

export interface PartialAppConfigInput {
  poll?: Partial<PollConfig>;
  decode?: Partial<DecodeConfig>;
  sources?: Partial<SourceMarkersConfig>;
  watch?: Partial<WatchConfig>;
}

function toFiniteNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function positiveIntOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric <= 0) return fallback;
  return Math.max(1, Math.round(numeric));
}

function booleanOrDefault(value: unknown, fallback: boolean): boolean {
  return typeof value === "boolean" ? value : fallback;
}

function markerOrDefault(value: unknown, fallback: string): string {
  return typeof value === "string" && value.trim() ? value.trim() : fallback;
}

function mergePoll(input: Record<string, unknown>): PollConfig {
  const defaults = DEFAULT_CONFIG.poll;
  return {
    intervalMs: positiveIntOrDefault(input.intervalMs, defaults.intervalMs),
    progressEvery: positiveIntOrDefault(input.progressEvery, defaults.progressEvery),
    interactivePreload: booleanOrDefault(input.interactivePreload, defaults.interactivePreload),
  };
}

function mergeDecode(input: Record<string, unknown>): DecodeConfig {
  const defaults = DEFAULT_CONFIG.decode;
  return {
    concurrency: positiveIntOrDefault(input.concurrency, defaults.concurrency),
    recordCacheSize: positiveIntOrDefault(input.recordCacheSize, defaults.recordCacheSize),
  };
}

function mergeSources(input: Record<string, unknown>): SourceMarkersConfig {
  const defaults = DEFAULT_CONFIG.sources;
  return {
    eventMarker: markerOrDefault(input.eventMarker, defaults.eventMarker),
    recordMarker: markerOrDefault(input.recordMarker, defaults.recordMarker),
  };
}

function mergeWatch(input: Record<string, unknown>): WatchConfig {
  const defaults = DEFAULT_CONFIG.watch;
  return {
    enabled: booleanOrDefault(input.enabled, defaults.enabled),
    debounceMs: positiveIntOrDefault(input.debounceMs, defaults.debounceMs),
  };
}

/** Normalises any parsed value (TOML, JSON, partial config) into a full config. */
export function configFrom(value: unknown): AppConfig {
  const root = asRecord(value);
  return {
    poll: mergePoll(asRecord(root.poll)),
    decode: mergeDecode(asRecord(root.decode)),
    sources: mergeSources(asRecord(root.sources)),
    watch: mergeWatch(asRecord(root.watch)),
  };
}

export function mergeConfig(input?: PartialAppConfigInput): AppConfig {
  return configFrom(input);
}

export async function loadConfig(configPath = DEFAULT_CONFIG_PATH): Promise<AppConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, "utf8");
  } catch {
    return mergeConfig();
  }
  try {
    return configFrom(TOML.parse(raw));
  } catch (error) {
    log.warn("ignoring unreadable config file", { path: configPath, error: errorMessage(error) });
    return mergeConfig();
  }
}

export async function saveConfig(config: AppConfig, configPath = DEFAULT_CONFIG_PATH): Promise<void> {
  const dir = path.dirname(configPath);
  await mkdir(dir, { recursive: true });
  const content = TOML.stringify(config as unknown as JsonMap);
  await writeFile(configPath, content, "utf8");
}

const CONFIG_KEYS = {
  "poll.intervalMs": "number",
  "poll.progressEvery": "number",
  "poll.interactivePreload": "boolean",
  "decode.concurrency": "number",
  "decode.recordCacheSize": "number",
  "sources.eventMarker": "string",
  "sources.recordMarker": "string",
  "watch.enabled": "boolean",
  "watch.debounceMs": "number",
} as const;

export type ConfigKey = keyof typeof CONFIG_KEYS;

export function isConfigKey(key: string): key is ConfigKey {
  return key in CONFIG_KEYS;
}

export function configKeys(): ConfigKey[] {
  return Object.keys(CONFIG_KEYS).filter(isConfigKey);
}

/**
 * Returns a copy of `config` with one dotted key replaced. The raw text is
 * parsed by the key's type and the result normalised through `mergeConfig`.
 */
export function setConfigValue(config: AppConfig, key: string, rawValue: string): AppConfig {
  if (!isConfigKey(key)) {
    throw new SteplogError(`Unknown config key: ${key}`);
  }
  let value: string | number | boolean;
  const kind = CONFIG_KEYS[key];
  if (kind === "number") {
    value = Number(rawValue);
    if (!Number.isFinite(value)) throw new SteplogError(`Expected a number for ${key}, got ${rawValue}`);
  } else if (kind === "boolean") {
    if (rawValue !== "true" && rawValue !== "false") throw new SteplogError(`Expected true or false for ${key}`);
    value = rawValue === "true";
  } else {
    value = rawValue;
  }

  const [section = "", field = ""] = key.split(".");
  const input = asRecord(JSON.parse(JSON.stringify(config)));
  const target = asRecord(input[section]);
  target[field] = value;
  input[section] = target;
  return configFrom(input);
}
