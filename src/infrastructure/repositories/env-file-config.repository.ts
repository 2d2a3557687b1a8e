import { chmod, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { parse } from "dotenv";
import { errnoCode, KeyNotFoundError } from "../../core/domain/errors.js";
import type { ConfigDefault } from "../../core/domain/entities/config.entity.js";
import type {
  ConfigSnapshot,
  IConfigStore,
} from "../../core/domain/repositories/config-store.repository.js";
import {
  type EnvLine,
  parseEnvLines,
  renderDefaults,
  replaceEntry,
  serializeEnvLines,
} from "../utils/env-file.utils.js";
import { toIOError } from "../utils/fs.utils.js";

/**
 * Flat `KEY=VALUE` file store.
 * Edits only ever replace values of keys already in the file; the layout
 * stays operator-curated. Nothing here prints or logs values.
 */
export class EnvFileConfigStore implements IConfigStore {
  async ensureExists(path: string, defaults: ConfigDefault[]): Promise<boolean> {
    try {
      // "wx" fails with EEXIST instead of truncating an existing file.
      await writeFile(path, renderDefaults(defaults), { encoding: "utf-8", flag: "wx" });
      return true;
    } catch (e) {
      if (errnoCode(e) === "EEXIST") return false;
      throw toIOError(e, path, "Cannot create");
    }
  }

  async read(path: string): Promise<ConfigSnapshot> {
    return parse(await this.load(path));
  }

  async get(path: string, key: string): Promise<string | undefined> {
    const snapshot = await this.read(path);
    return snapshot[key];
  }

  async set(path: string, key: string, value: string): Promise<void> {
    await this.setMany(path, { [key]: value });
  }

  async setMany(path: string, entries: Record<string, string>): Promise<void> {
    const lines = parseEnvLines(await this.load(path));
    this.apply(lines, path, entries);
    await this.replaceFile(path, serializeEnvLines(lines));
  }

  /** Mutates in memory only; throws before anything reaches the disk. */
  private apply(lines: EnvLine[], path: string, entries: Record<string, string>): void {
    for (const [key, value] of Object.entries(entries)) {
      if (!replaceEntry(lines, key, value)) {
        throw new KeyNotFoundError(key, path);
      }
    }
  }

  private async load(path: string): Promise<string> {
    try {
      return await readFile(path, "utf-8");
    } catch (e) {
      throw toIOError(e, path, "Cannot read");
    }
  }

  private async replaceFile(path: string, content: string): Promise<void> {
    const tmp = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`);
    try {
      const { mode } = await stat(path);
      await writeFile(tmp, content, { encoding: "utf-8", mode });
      // The umask applies on create; restore the exact permission bits.
      await chmod(tmp, mode & 0o7777);
      await rename(tmp, path);
    } catch (e) {
      await rm(tmp, { force: true });
      throw toIOError(e, path, "Cannot write");
    }
  }
}
