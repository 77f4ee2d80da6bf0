import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type {
  SiteBuildConfig,
  PartialSiteBuildConfig,
  ConfigError,
} from "../types";
import {
  SiteBuildConfigSchema,
  PartialSiteBuildConfigSchema,
} from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// OS-specific paths from env-paths (XDG base directories on Linux)
const paths = envPaths("mdsite", { suffix: "" });

function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<SiteBuildConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return SiteBuildConfigSchema.parse(JSON.parse(content));
}

async function loadPartialConfig(
  configPath: string,
): Promise<PartialSiteBuildConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialSiteBuildConfigSchema.parse(JSON.parse(content));
}

async function loadUserConfig(): Promise<PartialSiteBuildConfig | null> {
  const userConfigPath = getUserConfigPath();

  if (!existsSync(userConfigPath)) {
    return null;
  }

  return loadPartialConfig(userConfigPath);
}

/**
 * Deep merge a partial layer over a complete config
 */
export function mergeConfig(
  base: SiteBuildConfig,
  override: PartialSiteBuildConfig,
): SiteBuildConfig {
  return {
    input: override.input ?? base.input,
    output: override.output ?? base.output,
    templates:
      override.templates === undefined ? base.templates : override.templates,
    site: { ...base.site, ...override.site },
    files: { ...base.files, ...override.files },
    markdown: { ...base.markdown, ...override.markdown },
    embed: { ...base.embed, ...override.embed },
    feed: { ...base.feed, ...override.feed },
    index: { ...base.index, ...override.index },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: SiteBuildConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A layer that fails to load or validate is skipped and reported
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  try {
    const userConfig = await loadUserConfig();
    if (userConfig) config = mergeConfig(config, userConfig);
  } catch (error) {
    errors.push({ path: getUserConfigPath(), error });
  }

  if (custom) {
    try {
      const customConfig = await loadPartialConfig(custom);
      config = mergeConfig(config, customConfig);
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
