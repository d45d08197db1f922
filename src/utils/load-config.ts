import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import {
  BuildConfigSchema,
  PartialBuildConfigSchema,
  type BuildConfig,
  type ConfigError,
  type PartialBuildConfig,
} from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const paths = envPaths("handbook-epub", { suffix: "" });

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

async function loadPartialConfig(configPath: string): Promise<PartialBuildConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialBuildConfigSchema.parse(JSON.parse(content));
}

async function loadUserConfig(): Promise<PartialBuildConfig | null> {
  const userConfigPath = getUserConfigPath();

  if (!existsSync(userConfigPath)) {
    return null;
  }

  return loadPartialConfig(userConfigPath);
}

/**
 * Merge an override into a full config
 * Nested groups merge key by key; the section list is replaced whole.
 */
export function mergeConfig(
  base: BuildConfig,
  override: PartialBuildConfig,
): BuildConfig {
  return {
    ...base,
    ...override,
    content: { ...base.content, ...override.content },
    navigation: { ...base.navigation, ...override.navigation },
    sections: override.sections ?? base.sections,
    book: { ...base.book, ...override.book },
    markdown: { ...base.markdown, ...override.markdown },
    links: { ...base.links, ...override.links },
    cover: {
      ...base.cover,
      ...override.cover,
      palette: { ...base.cover.palette, ...override.cover?.palette },
    },
    templates: { ...base.templates, ...override.templates },
    git: { ...base.git, ...override.git },
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
 * An override that fails to load or validate is reported and skipped.
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
