/**
 * Configuration Manager for dish-dev
 *
 * Resolves the settings the command table is built from:
 * - Built-in defaults (the stack as shipped)
 * - Project config (.dish-dev.yaml in the project directory, or --config)
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import * as yaml from 'yaml';
import { z } from 'zod';
import type { DevStackConfig, DevStackConfigFile, LoadConfigOptions, LoadedConfig } from '../../types/config.js';
import type { Logger } from '../../types/output.js';
import { ConfigurationError } from '../../utils/error-handler.js';

export const CONFIG_FILE_NAMES = ['.dish-dev.yaml', '.dish-dev.yml'] as const;

/**
 * Zod schemas for configuration validation
 */
const nonEmpty = z.string().min(1);

const ComposeConfigSchema = z
  .object({
    fullFile: nonEmpty,
  })
  .partial()
  .strict();

const ContainersConfigSchema = z
  .object({
    backend: nonEmpty,
    backendShell: nonEmpty,
    postgres: nonEmpty,
  })
  .partial()
  .strict();

const DatabaseConfigSchema = z
  .object({
    user: nonEmpty,
    name: nonEmpty,
  })
  .partial()
  .strict();

const EndpointsConfigSchema = z
  .object({
    postgres: nonEmpty,
    pgAdmin: nonEmpty,
    pgAdminLogin: nonEmpty,
    backend: nonEmpty,
    frontend: nonEmpty,
  })
  .partial()
  .strict();

const DevStackConfigFileSchema = z
  .object({
    compose: ComposeConfigSchema.optional(),
    containers: ContainersConfigSchema.optional(),
    database: DatabaseConfigSchema.optional(),
    endpoints: EndpointsConfigSchema.optional(),
  })
  .strict();

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Omit<DevStackConfig, 'projectDir'> = {
  compose: {
    fullFile: 'docker-compose.full.yml',
  },
  containers: {
    backend: 'dish_backend',
    backendShell: '/bin/bash',
    postgres: 'dish_postgres',
  },
  database: {
    user: 'dish_user',
    name: 'dish_db',
  },
  endpoints: {
    postgres: 'localhost:5432',
    pgAdmin: 'http://localhost:5050',
    pgAdminLogin: 'admin@dish.local / admin',
    backend: 'http://localhost:8000',
    frontend: 'http://localhost:3000',
  },
};

export function defaultConfig(projectDir: string): DevStackConfig {
  return mergeConfig(projectDir, {});
}

/**
 * Lay a config file over the defaults (file wins, section by section)
 */
export function mergeConfig(projectDir: string, override: DevStackConfigFile): DevStackConfig {
  return {
    projectDir,
    compose: { ...DEFAULT_CONFIG.compose, ...override.compose },
    containers: { ...DEFAULT_CONFIG.containers, ...override.containers },
    database: { ...DEFAULT_CONFIG.database, ...override.database },
    endpoints: { ...DEFAULT_CONFIG.endpoints, ...override.endpoints },
  };
}

export class ConfigManager {
  constructor(private readonly logger: Logger) {}

  async load(options: LoadConfigOptions): Promise<LoadedConfig> {
    // docker would otherwise fail to spawn there and be reported as missing
    if (!(await fs.pathExists(options.projectDir))) {
      throw new ConfigurationError(`Project directory not found: ${options.projectDir}`, {
        projectDir: options.projectDir,
      });
    }

    const configPath = options.configPath ?? (await this.findConfigFile(options.projectDir));

    if (!configPath) {
      this.logger.debug(`No config file in ${options.projectDir}, using defaults`);
      return { config: defaultConfig(options.projectDir) };
    }

    const file = await this.readConfigFile(configPath);
    this.logger.debug(`Loaded config from ${configPath}`);

    return {
      config: mergeConfig(options.projectDir, file),
      source: configPath,
    };
  }

  /**
   * Find the first config file present in the project directory
   */
  async findConfigFile(projectDir: string): Promise<string | undefined> {
    const found: string[] = [];

    for (const name of CONFIG_FILE_NAMES) {
      const candidate = path.join(projectDir, name);
      if (await fs.pathExists(candidate)) {
        found.push(candidate);
      }
    }

    if (found.length > 1) {
      this.logger.warn(`Both ${CONFIG_FILE_NAMES.join(' and ')} exist in ${projectDir}, using ${found[0]}`);
    }

    return found[0];
  }

  private async readConfigFile(configPath: string): Promise<DevStackConfigFile> {
    if (!(await fs.pathExists(configPath))) {
      throw new ConfigurationError(`Config file not found: ${configPath}`, { configPath });
    }

    const content = await fs.readFile(configPath, 'utf-8');

    let parsed: unknown;
    try {
      parsed = yaml.parse(content);
    } catch (error) {
      throw new ConfigurationError(
        `Invalid YAML in ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
        { configPath }
      );
    }

    // An empty file parses to null
    const result = DevStackConfigFileSchema.safeParse(parsed ?? {});
    if (!result.success) {
      const issues = result.error.errors.map((e) =>
        e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message
      );
      throw new ConfigurationError(`Invalid configuration in ${configPath}: ${issues.join(', ')}`, {
        configPath,
      });
    }

    return result.data;
  }
}
