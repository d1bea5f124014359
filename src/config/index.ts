import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { appConfigSchema } from "./schema";
import type { AppConfig, SourceConfig } from "./schema";
import type { RefreshSettings } from "../pipeline/orchestrator";

export function loadConfig(configPath: string): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read config file at ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to parse YAML in ${configPath}: ${message}`);
  }

  // an empty file means "all defaults"
  const result = appConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`invalid configuration in ${configPath}:\n${issues}`);
  }

  return result.data;
}

export function refreshSettingsFromConfig(config: AppConfig): RefreshSettings {
  return {
    maxConcurrency: config.refresh.maxConcurrency,
    feedMaxItems: config.feed.maxItems,
    discoveryRecheckMs: config.discovery.recheckHours * 60 * 60 * 1000,
    extraction: config.extraction,
    normalize: { trackingParams: config.normalize.trackingParams },
  };
}

export type { AppConfig, SourceConfig };
