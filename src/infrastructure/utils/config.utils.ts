import { existsSync, readFileSync } from "node:fs";
import { dirname, isAbsolute, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import yaml from "js-yaml";
import { ConfigValidationError, errorMessage } from "../../core/domain/errors.js";
import type { BootstrapConfig } from "../../core/domain/entities/config.entity.js";
import { BootstrapFileSchema, formatIssues } from "../../adapters/validation.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Settings shipped with the package, used when the project root has none. */
export const PACKAGED_CONFIG_PATH = resolve(__dirname, "..", "..", "..", "config", "bootstrap.yaml");

export interface LoadOptions {
  root: string;
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

function substituteEnv(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === "string" && value.startsWith("${") && value.endsWith("}")) {
    const key = value.slice(2, -1);
    return env[key] ?? value;
  }
  if (Array.isArray(value)) return value.map((v) => substituteEnv(v, env));
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = substituteEnv(v, env);
    return out;
  }
  return value;
}

/**
 * Resolves the bootstrap YAML: explicit path, then BOOTSTRAP_CONFIG, then
 * `<root>/config/bootstrap.yaml`, then the packaged copy.
 */
export function getConfigPath(root: string, env: NodeJS.ProcessEnv = process.env): string {
  if (env.BOOTSTRAP_CONFIG) return resolve(root, env.BOOTSTRAP_CONFIG);
  const local = join(root, "config", "bootstrap.yaml");
  return existsSync(local) ? local : PACKAGED_CONFIG_PATH;
}

function readSettings(configPath: string): object {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (e) {
    throw new ConfigValidationError(`Failed to load config from ${configPath}. ${errorMessage(e)}`, {
      cause: e,
    });
  }
  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (e) {
    throw new ConfigValidationError(`Invalid YAML in ${configPath}. ${errorMessage(e)}`, { cause: e });
  }
  if (!parsed || typeof parsed !== "object") {
    throw new ConfigValidationError(`Config at ${configPath} must be a YAML object.`);
  }
  return parsed;
}

function settingsPath(options: LoadOptions, root: string, env: NodeJS.ProcessEnv): string {
  return options.configPath ? resolve(root, options.configPath) : getConfigPath(root, env);
}

/**
 * The env file the settings name, found without validating the rest, so it
 * can be loaded into the environment before `${VAR}` values are substituted.
 */
export function envFilePath(options: LoadOptions): string {
  const env = options.env ?? process.env;
  const root = resolve(options.root);
  const settings = substituteEnv(readSettings(settingsPath(options, root, env)), env);
  const envFile =
    settings && typeof settings === "object" && "envFile" in settings && typeof settings.envFile === "string"
      ? settings.envFile
      : ".env";
  return isAbsolute(envFile) ? envFile : join(root, envFile);
}

export function loadBootstrapConfig(options: LoadOptions): BootstrapConfig {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;
  const root = resolve(options.root);
  const configPath = settingsPath(options, root, env);
  const parsed = readSettings(configPath);

  const result = BootstrapFileSchema.safeParse(substituteEnv(parsed, env));
  if (!result.success) {
    throw new ConfigValidationError(`Invalid config at ${configPath}. ${formatIssues(result.error)}.`);
  }
  const file = result.data;
  const at = (p: string) => (isAbsolute(p) ? p : join(root, p));
  const environmentPath = at(file.environment.path);
  const binDir = join(environmentPath, platform === "win32" ? "Scripts" : "bin");

  return {
    root,
    envFile: at(file.envFile),
    platform,
    runtime: file.runtime,
    environment: { path: environmentPath, packages: file.environment.packages },
    directories: file.directories.map(at),
    defaults: file.defaults,
    email: file.email,
    service: {
      command: isAbsolute(file.service.command) ? file.service.command : join(binDir, file.service.command),
      args: file.service.args,
      logFile: at(file.service.logFile),
      defaultPort: file.service.defaultPort,
    },
  };
}

export function endpointUrl(config: BootstrapConfig, port: string | undefined): string {
  const parsed = Number.parseInt(port ?? "", 10);
  const value = Number.isInteger(parsed) && parsed > 0 ? parsed : config.service.defaultPort;
  return `http://localhost:${value}`;
}
