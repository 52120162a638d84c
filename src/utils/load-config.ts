import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import { fileExists } from "./file-exists";
import type { AppConfig, PartialAppConfig } from "../types";
import { AppConfigSchema, PartialAppConfigSchema } from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const paths = envPaths("issue-images", { suffix: "" });

export interface ConfigError {
  path: string;
  error: unknown;
}

export interface LoadConfigResult {
  config: AppConfig;
  errors: ConfigError[];
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<AppConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return AppConfigSchema.parse(JSON.parse(content));
}

async function loadPartialConfig(path: string): Promise<PartialAppConfig> {
  const content = await readFile(path, "utf-8");
  return PartialAppConfigSchema.parse(JSON.parse(content));
}

export function mergeConfig(base: AppConfig, override: PartialAppConfig): AppConfig {
  return {
    download: { ...base.download, ...override.download },
    github: { ...base.github, ...override.github },
    output: { ...base.output, ...override.output },
    logging: { ...base.logging, ...override.logging },
  };
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 */
export async function loadConfig(
  custom?: string,
  userConfigPath: string = getUserConfigPath(),
): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  if (await fileExists(userConfigPath, "file")) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
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
  return join(paths.config, "config.json");
}
