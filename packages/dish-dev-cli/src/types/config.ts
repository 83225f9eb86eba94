/**
 * Configuration Type Definitions
 */

export interface ComposeConfig {
  // The default stack has no entry: compose finds its own docker-compose.yml
  fullFile: string;
}

export interface ContainersConfig {
  backend: string;
  backendShell: string;
  postgres: string;
}

export interface DatabaseConfig {
  user: string;
  name: string;
}

/**
 * Addresses printed after a stack comes up
 */
export interface EndpointsConfig {
  postgres: string;
  pgAdmin: string;
  pgAdminLogin: string;
  backend: string;
  frontend: string;
}

export interface DevStackConfig {
  projectDir: string;
  compose: ComposeConfig;
  containers: ContainersConfig;
  database: DatabaseConfig;
  endpoints: EndpointsConfig;
}

/**
 * Shape of a .dish-dev.yaml file: every section and key optional
 */
export type DevStackConfigFile = {
  [K in Exclude<keyof DevStackConfig, 'projectDir'>]?: Partial<DevStackConfig[K]>;
};

export interface LoadConfigOptions {
  projectDir: string;
  configPath?: string;
}

export interface LoadedConfig {
  config: DevStackConfig;
  source?: string;
}
