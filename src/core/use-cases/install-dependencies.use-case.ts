import type { BootstrapConfig } from "../domain/entities/config.entity.js";
import type { IConfigStore } from "../domain/repositories/config-store.repository.js";
import type {
  IDependencyInstaller,
  RuntimeStatus,
} from "../domain/services/dependency-installer.service.js";

export interface InstallSummary {
  runtime: RuntimeStatus;
  environmentCreated: boolean;
  packages: string[];
  directoriesCreated: string[];
  configCreated: boolean;
}

/**
 * Runtime, then environment, then packages, then directories, then the
 * env file. A failing step stops the run; later steps never see a half
 * prepared machine.
 */
export class InstallDependenciesUseCase {
  constructor(
    private installer: IDependencyInstaller,
    private configStore: IConfigStore,
    private config: BootstrapConfig,
  ) {}

  async execute(onStep: (message: string) => void = () => {}): Promise<InstallSummary> {
    const { runtime, environment } = this.config;

    onStep(`Checking ${runtime.command} >= ${runtime.minVersion}...`);
    const runtimeStatus = await this.installer.ensureRuntime(runtime.minVersion);
    onStep(runtimeStatus === "present" ? "Runtime already installed." : "Runtime installed.");

    onStep(`Preparing environment at ${environment.path}...`);
    const environmentCreated = await this.installer.ensureIsolatedEnvironment(environment.path);
    onStep(environmentCreated ? "Environment created." : "Environment already present, left as is.");

    onStep(`Installing ${environment.packages.length} package(s)...`);
    const packages = await this.installer.installPackages(environment.packages);

    const directoriesCreated = await this.installer.ensureDirectories(this.config.directories);
    for (const dir of directoriesCreated) onStep(`Created ${dir}`);

    const configCreated = await this.configStore.ensureExists(this.config.envFile, this.config.defaults);
    onStep(
      configCreated
        ? `Wrote ${this.config.envFile} with default values.`
        : `${this.config.envFile} already exists, left untouched.`,
    );

    return {
      runtime: runtimeStatus,
      environmentCreated,
      packages,
      directoriesCreated,
      configCreated,
    };
  }
}
