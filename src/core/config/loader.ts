import * as path from 'node:path';
import { ConfigSchema, type GeneratorConfig } from './schema.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { fileExists } from '../../utils/file-system.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

export const DEFAULT_CONFIG_PATH = '.csproj-forge.yaml';

/** Values supplied on the command line, taking precedence over the file. */
export interface ConfigOverrides {
  templateRoot?: string;
  registry?: string;
}

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): GeneratorConfig {
  return ConfigSchema.parse({});
}

/**
 * Load configuration for a project root.
 * Falls back to defaults if the file doesn't exist.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string,
  overrides: ConfigOverrides = {}
): Promise<GeneratorConfig> {
  const fullPath = path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);

  let config: GeneratorConfig;
  if (await fileExists(fullPath)) {
    try {
      config = await loadYamlWithSchema(fullPath, ConfigSchema);
    } catch (error) {
      if (error instanceof Error) {
        throw new ConfigError(
          ErrorCodes.CONFIG_LOAD_ERROR,
          `Failed to load config from ${fullPath}: ${error.message}`,
          { path: fullPath, originalError: error.message }
        );
      }
      throw error;
    }
  } else if (configPath) {
    throw new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, `Config file not found: ${fullPath}`, {
      path: fullPath,
    });
  } else {
    config = getDefaultConfig();
  }

  return {
    ...config,
    templateRoot: overrides.templateRoot ?? config.templateRoot,
    registry: overrides.registry ?? config.registry,
  };
}

/**
 * Project-relative registry path for a configuration.
 */
export function getRegistryPath(config: GeneratorConfig): string {
  return config.registry ?? `${config.templateRoot}/registry.yaml`;
}

/**
 * Project-relative directory holding the descriptor templates.
 */
export function getTemplatesDir(config: GeneratorConfig): string {
  return `${config.templateRoot}/templates`;
}
