import fs from "fs";
import path from "path";
import type { RgbColor } from "./domain/commands/Command";

export interface CycleConfig {
  intervalMs: number;
  colors: RgbColor[];
}

export interface AppConfig {
  /** Friendly alias -> device display name or identifier. */
  aliases?: Record<string, string>;
  cycle?: Partial<CycleConfig>;
}

export const DEFAULT_CYCLE: CycleConfig = {
  intervalMs: 200,
  colors: [
    [255, 0, 0],
    [0, 0, 255],
  ],
};

const DEFAULT_CONFIG_FILENAMES = ["sengled.config.json", "config.json"];

export interface LoadedConfig {
  config: AppConfig;
  path?: string;
}

export function loadConfig(configPath?: string): LoadedConfig {
  const searchPaths = configPath
    ? [configPath]
    : DEFAULT_CONFIG_FILENAMES.map((name) => path.resolve(process.cwd(), name));

  for (const candidate of searchPaths) {
    try {
      const resolved = path.resolve(candidate);
      if (!fs.existsSync(resolved)) continue;
      const raw = fs.readFileSync(resolved, "utf8");
      const parsed: unknown = JSON.parse(raw);
      return { config: normalizeConfig(parsed), path: resolved };
    } catch (err) {
      console.warn(`Failed to load config from ${candidate}:`, err);
    }
  }

  return { config: {} };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isColor(value: unknown): value is RgbColor {
  return (
    Array.isArray(value) &&
    value.length === 3 &&
    value.every((channel) => Number.isInteger(channel) && channel >= 0 && channel <= 255)
  );
}

export function normalizeConfig(input: unknown): AppConfig {
  const out: AppConfig = {};
  if (!isRecord(input)) return out;

  if (isRecord(input.aliases)) {
    const aliases: Record<string, string> = {};
    for (const [alias, target] of Object.entries(input.aliases)) {
      if (typeof target === "string" && target.trim().length > 0) {
        aliases[alias] = target.trim();
        continue;
      }
      console.warn(`Invalid alias "${alias}"; expected a device name or identifier string.`);
    }
    out.aliases = aliases;
  }

  if (isRecord(input.cycle)) {
    const cycle: Partial<CycleConfig> = {};
    const { intervalMs, colors } = input.cycle;
    if (typeof intervalMs === "number" && Number.isFinite(intervalMs) && intervalMs > 0) {
      cycle.intervalMs = intervalMs;
    }
    if (Array.isArray(colors)) {
      const valid = colors.filter(isColor);
      if (valid.length !== colors.length) {
        console.warn("Ignoring cycle colors that are not [r, g, b] triplets of 0-255.");
      }
      if (valid.length) cycle.colors = valid;
    }
    out.cycle = cycle;
  }

  return out;
}

export function resolveAlias(config: AppConfig, name: string): string {
  const trimmed = name.trim();
  return config.aliases?.[trimmed] ?? trimmed;
}

export function resolveCycle(config: AppConfig): CycleConfig {
  return {
    intervalMs: config.cycle?.intervalMs ?? DEFAULT_CYCLE.intervalMs,
    colors: config.cycle?.colors ?? DEFAULT_CYCLE.colors,
  };
}
