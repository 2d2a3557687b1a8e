export type RuntimeStatus = "present" | "installed";

export interface IDependencyInstaller {
  ensureRuntime(minVersion?: string): Promise<RuntimeStatus>;
  ensureIsolatedEnvironment(path?: string): Promise<boolean>;
  installPackages(names?: Iterable<string>): Promise<string[]>;
  ensureDirectories(paths?: Iterable<string>): Promise<string[]>;
}
