export interface ConfigDefault {
  key: string;
  value: string;
  comment?: string;
  /** Credential keys: never echoed by the wizard. */
  secret?: boolean;
}

export interface RuntimeInstallerConfig {
  url: string;
  /** File name the download is saved under inside the temporary directory. */
  fileName: string;
  /** Command to run; `{file}` is replaced by the downloaded artifact path. */
  command: string;
  args: string[];
}

export interface RuntimeConfig {
  command: string;
  versionArgs: string[];
  minVersion: string;
  installer: RuntimeInstallerConfig;
}

export interface EnvironmentConfig {
  path: string;
  packages: string[];
}

export interface EmailConfig {
  probeTimeoutMs: number;
}

export interface ServiceConfig {
  /** Command relative to the isolated environment's bin directory, or absolute. */
  command: string;
  args: string[];
  logFile: string;
  defaultPort: number;
}

/**
 * Everything a component needs, passed in explicitly instead of read from
 * the process's working directory or environment.
 */
export interface BootstrapConfig {
  root: string;
  envFile: string;
  platform: NodeJS.Platform;
  runtime: RuntimeConfig;
  environment: EnvironmentConfig;
  directories: string[];
  defaults: ConfigDefault[];
  email: EmailConfig;
  service: ServiceConfig;
}
