import { mkdir, mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { errnoCode, errorMessage, InstallError } from "../../core/domain/errors.js";
import type { BootstrapConfig } from "../../core/domain/entities/config.entity.js";
import type {
  IDependencyInstaller,
  RuntimeStatus,
} from "../../core/domain/services/dependency-installer.service.js";
import type {
  IProcessLauncher,
  LaunchResult,
} from "../../core/domain/services/process-launcher.service.js";
import { type Downloader, downloadFile } from "../utils/download.utils.js";
import { exists, toIOError } from "../utils/fs.utils.js";
import { isAtLeast, parseVersion } from "../utils/version.utils.js";

function lastLines(output: string, count = 5): string {
  return output.trim().split("\n").slice(-count).join("\n");
}

/**
 * Puts the application's runtime, its isolated package environment and
 * the project directories in place. Every step is safe to re-run.
 */
export class DependencyInstaller implements IDependencyInstaller {
  constructor(
    private config: BootstrapConfig,
    private launcher: IProcessLauncher,
    private download: Downloader = downloadFile,
    private tmpRoot: string = tmpdir(),
  ) {}

  async ensureRuntime(minVersion: string = this.config.runtime.minVersion): Promise<RuntimeStatus> {
    const found = await this.detectRuntime();
    if (found && isAtLeast(found, minVersion)) return "present";
    await this.runInstaller();
    return "installed";
  }

  /** Returns false when the environment already existed. */
  async ensureIsolatedEnvironment(path: string = this.config.environment.path): Promise<boolean> {
    if (await exists(path)) return false;
    const result = await this.exec("environment", this.config.runtime.command, ["-m", "venv", path]);
    if (result.exitCode !== 0) {
      throw new InstallError(
        `Creating the environment at ${path} failed (exit ${result.exitCode}).\n${lastLines(result.stderr)}`,
        "environment",
        result.exitCode,
      );
    }
    return true;
  }

  async installPackages(names: Iterable<string> = this.config.environment.packages): Promise<string[]> {
    const unique = [...new Set(names)].filter((n) => n.trim() !== "");
    if (unique.length === 0) return [];
    const result = await this.exec("packages", this.environmentPython(), [
      "-m",
      "pip",
      "install",
      ...unique,
    ]);
    if (result.exitCode !== 0) {
      throw new InstallError(
        `Package installation failed (exit ${result.exitCode}).\n${lastLines(result.stderr)}`,
        "packages",
        result.exitCode,
      );
    }
    return unique;
  }

  /** Returns the directories that had to be created. */
  async ensureDirectories(paths: Iterable<string> = this.config.directories): Promise<string[]> {
    const created: string[] = [];
    for (const dir of new Set(paths)) {
      try {
        if (await mkdir(dir, { recursive: true })) created.push(dir);
      } catch (e) {
        throw toIOError(e, dir, "Cannot create directory");
      }
    }
    return created;
  }

  /** Interpreter inside the isolated environment. */
  environmentPython(): string {
    const env = this.config.environment.path;
    return this.config.platform === "win32"
      ? join(env, "Scripts", "python.exe")
      : join(env, "bin", "python");
  }

  private async detectRuntime(): Promise<[number, number, number] | null> {
    const { command, versionArgs } = this.config.runtime;
    try {
      const result = await this.launcher.run(command, versionArgs, { detached: false });
      if (result.exitCode !== 0) return null;
      // Older interpreters print their version on stderr.
      return parseVersion(`${result.stdout}\n${result.stderr}`);
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return null;
      throw new InstallError(`Cannot run ${command}: ${errorMessage(e)}`, "runtime", null, { cause: e });
    }
  }

  private async runInstaller(): Promise<void> {
    const { installer } = this.config.runtime;
    const dir = await mkdtemp(join(this.tmpRoot, "adm-runtime-"));
    const artifact = join(dir, installer.fileName);
    try {
      try {
        await this.download(installer.url, artifact);
      } catch (e) {
        throw new InstallError(
          `Download of ${installer.url} failed: ${errorMessage(e)}`,
          "runtime",
          null,
          { cause: e },
        );
      }
      const command = installer.command.replaceAll("{file}", artifact);
      const args = installer.args.map((a) => a.replaceAll("{file}", artifact));
      const result = await this.exec("runtime", command, args);
      if (result.exitCode !== 0) {
        throw new InstallError(
          `Runtime installer exited with code ${result.exitCode}`,
          "runtime",
          result.exitCode,
        );
      }
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }

  private async exec(step: string, command: string, args: string[]): Promise<LaunchResult> {
    try {
      return await this.launcher.run(command, args, { cwd: this.config.root, detached: false });
    } catch (e) {
      throw new InstallError(`Cannot run ${command}: ${errorMessage(e)}`, step, null, { cause: e });
    }
  }
}
