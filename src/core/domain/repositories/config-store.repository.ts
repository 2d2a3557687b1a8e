import type { ConfigDefault } from "../entities/config.entity.js";

export type ConfigSnapshot = Record<string, string>;

export interface IConfigStore {
  ensureExists(path: string, defaults: ConfigDefault[]): Promise<boolean>;
  read(path: string): Promise<ConfigSnapshot>;
  get(path: string, key: string): Promise<string | undefined>;
  set(path: string, key: string, value: string): Promise<void>;
  setMany(path: string, entries: Record<string, string>): Promise<void>;
}
