import { IOError } from "../domain/errors.js";
import type { BootstrapConfig } from "../domain/entities/config.entity.js";
import type { IConfigStore } from "../domain/repositories/config-store.repository.js";
import { endpointUrl } from "../../infrastructure/utils/config.utils.js";
import type {
  ServiceHandle,
  ServiceSupervisor,
} from "../../infrastructure/services/service-supervisor.service.js";

export interface StartServiceResult {
  handle: ServiceHandle;
  endpointUrl: string;
}

export class StartServiceUseCase {
  constructor(
    private supervisor: ServiceSupervisor,
    private configStore: IConfigStore,
    private config: BootstrapConfig,
  ) {}

  async execute(): Promise<StartServiceResult> {
    const url = endpointUrl(this.config, await this.configuredPort());
    const { command, args } = this.config.service;
    const handle = await this.supervisor.start({
      command,
      args,
      cwd: this.config.root,
      endpointUrl: url,
    });
    return { handle, endpointUrl: url };
  }

  /** PORT from the env file; the application falls back to its default without one. */
  private async configuredPort(): Promise<string | undefined> {
    try {
      return await this.configStore.get(this.config.envFile, "PORT");
    } catch (e) {
      if (e instanceof IOError && e.code === "ENOENT") return undefined;
      throw e;
    }
  }
}
