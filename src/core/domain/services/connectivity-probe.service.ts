import type { ProbeResult } from "../entities/probe-result.entity.js";
import type { ConfigSnapshot } from "../repositories/config-store.repository.js";

export interface IConnectivityProbe {
  testConnection(config: ConfigSnapshot): Promise<ProbeResult>;
}
