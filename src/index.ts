#!/usr/bin/env node
/**
 * Ad manager bootstrap – CLI
 * Commands: install | configure | test-email | start | check
 */

import { program } from "commander";
import { config as loadEnv } from "dotenv";
import {
  BootstrapError,
  errorMessage,
  ExitCode,
  type ExitCodeValue,
} from "./core/domain/errors.js";
import type { BootstrapConfig } from "./core/domain/entities/config.entity.js";
import type { ProbeResult } from "./core/domain/entities/probe-result.entity.js";
import { CheckConfigUseCase } from "./core/use-cases/check-config.use-case.js";
import { ConfigureEmailUseCase } from "./core/use-cases/configure-email.use-case.js";
import { InstallDependenciesUseCase } from "./core/use-cases/install-dependencies.use-case.js";
import { StartServiceUseCase } from "./core/use-cases/start-service.use-case.js";
import { EnvFileConfigStore } from "./infrastructure/repositories/env-file-config.repository.js";
import { ConsoleNotifier } from "./infrastructure/services/console-notifier.service.js";
import { DependencyInstaller } from "./infrastructure/services/dependency-installer.service.js";
import { NodeProcessLauncher } from "./infrastructure/services/node-process-launcher.service.js";
import { NodemailerProbe } from "./infrastructure/services/nodemailer-probe.service.js";
import { ReadlinePrompter } from "./infrastructure/services/readline-prompter.service.js";
import { ServiceSupervisor } from "./infrastructure/services/service-supervisor.service.js";
import { TextLifecycleLogger } from "./infrastructure/services/text-lifecycle-logger.service.js";
import { envFilePath, loadBootstrapConfig } from "./infrastructure/utils/config.utils.js";

// ─── Shared helpers ───────────────────────────────────────────────────────────

function loadConfig(): BootstrapConfig {
  const opts = program.opts<{ root: string; config?: string }>();
  const options = { root: opts.root, configPath: opts.config };
  loadEnv({ path: envFilePath(options) });
  return loadBootstrapConfig(options);
}

function fail(command: string, e: unknown): never {
  console.error(`${command} failed: ${errorMessage(e)}`);
  const code: ExitCodeValue = e instanceof BootstrapError ? e.exitCode : ExitCode.UNEXPECTED;
  process.exit(code);
}

function printProbe(result: ProbeResult): void {
  if (result.success) {
    console.log(`OK  ${result.message}`);
  } else {
    console.error(`FAIL [${result.category ?? "unknown"}] ${result.message}`);
  }
}

const store = new EnvFileConfigStore();

program
  .name("adm-bootstrap")
  .description("Install, configure and start the ad manager web application")
  .option("--root <dir>", "Project root", process.cwd())
  .option("-c, --config <path>", "Bootstrap settings (YAML)");

// ─── install ──────────────────────────────────────────────────────────────────

program
  .command("install")
  .description("Install the runtime, packages, directories and a default .env")
  .action(async () => {
    try {
      const config = loadConfig();
      const installer = new DependencyInstaller(config, new NodeProcessLauncher());
      const useCase = new InstallDependenciesUseCase(installer, store, config);
      const summary = await useCase.execute((message) => console.log(message));

      console.log("\nInstall Summary");
      console.log("---------------");
      console.log(`Runtime: ${summary.runtime}`);
      console.log(`Environment: ${summary.environmentCreated ? "created" : "existing"}`);
      console.log(`Packages: ${summary.packages.join(", ") || "none"}`);
      console.log(`Config file: ${summary.configCreated ? "created" : "kept"}`);
      console.log("\nNext: adm-bootstrap configure");
    } catch (e) {
      fail("Install", e);
    }
  });

// ─── configure ────────────────────────────────────────────────────────────────

program
  .command("configure")
  .description("Prompt for the email settings, save them and test the login")
  .option("--no-test", "Save without testing the SMTP login")
  .action(async (opts: { test: boolean }) => {
    try {
      const config = loadConfig();
      const useCase = new ConfigureEmailUseCase(
        store,
        new NodemailerProbe(config.email.probeTimeoutMs),
        new ReadlinePrompter(),
        config,
      );
      const result = await useCase.execute({
        testConnection: opts.test,
        onMessage: (message) => console.log(message),
      });
      // A failed login is reported but the settings stay saved.
      if (result.probe) printProbe(result.probe);
    } catch (e) {
      fail("Configure", e);
    }
  });

// ─── test-email ───────────────────────────────────────────────────────────────

program
  .command("test-email")
  .description("Log in to the configured SMTP server without sending mail")
  .action(async () => {
    try {
      const config = loadConfig();
      const probe = new NodemailerProbe(config.email.probeTimeoutMs);
      const result = await probe.testConnection(await store.read(config.envFile));
      printProbe(result);
      if (!result.success) process.exitCode = ExitCode.PROBE_FAILED;
    } catch (e) {
      fail("Email test", e);
    }
  });

// ─── start ────────────────────────────────────────────────────────────────────

program
  .command("start")
  .description("Start the application in the background")
  .action(async () => {
    try {
      const config = loadConfig();
      const logger = new TextLifecycleLogger(config.service.logFile);
      const supervisor = new ServiceSupervisor(
        new NodeProcessLauncher(),
        logger,
        new ConsoleNotifier(),
      );
      const useCase = new StartServiceUseCase(supervisor, store, config);
      await useCase.execute();
      console.log(`Lifecycle log: ${logger.getLogPath()}`);
    } catch (e) {
      fail("Start", e);
    }
  });

// ─── check ────────────────────────────────────────────────────────────────────

program
  .command("check")
  .description("Show which credentials are set (values are never printed)")
  .action(async () => {
    try {
      const config = loadConfig();
      const status = await new CheckConfigUseCase(store).execute(config.envFile);
      for (const group of status.groups) {
        const missing = Object.entries(group.details)
          .filter(([, present]) => !present)
          .map(([key]) => key);
        console.log(
          `${group.configured ? "OK  " : "MISS"} ${group.name}${missing.length ? ` (missing: ${missing.join(", ")})` : ""}`,
        );
      }
      if (!status.ok) console.log("\nThe application runs in degraded mode until these are set.");
    } catch (e) {
      fail("Check", e);
    }
  });

program.parseAsync(process.argv).catch((e: unknown) => fail("adm-bootstrap", e));
