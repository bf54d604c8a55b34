import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type { BuildConfig, ConfigError, PartialBuildConfig } from "../types";
import { BuildConfigSchema, PartialBuildConfigSchema } from "../types";
import { fileExists } from "./file-exists";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// OS-specific paths (XDG base directories on Linux)
const paths = envPaths("mdblog", { suffix: "" });

function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<BuildConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return BuildConfigSchema.parse(JSON.parse(content));
}

async function loadPartialConfig(path: string): Promise<PartialBuildConfig> {
  const content = await readFile(path, "utf-8");
  return PartialBuildConfigSchema.parse(JSON.parse(content));
}

async function loadUserConfig(): Promise<PartialBuildConfig | null> {
  const userConfigPath = getUserConfigPath();

  if (!(await fileExists(userConfigPath))) {
    return null;
  }

  return loadPartialConfig(userConfigPath);
}

export function mergeConfig(
  base: BuildConfig,
  override: PartialBuildConfig,
): BuildConfig {
  return {
    input: { ...base.input, ...override.input },
    output: { ...base.output, ...override.output },
    style: { ...base.style, ...override.style },
    site: { ...base.site, ...override.site },
    templates: { ...base.templates, ...override.templates },
    markdown: { ...base.markdown, ...override.markdown },
    titles: { ...base.titles, ...override.titles },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: BuildConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
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
