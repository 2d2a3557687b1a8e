import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { BootstrapConfig } from "../src/core/domain/entities/config.entity.js";
import type {
  IProcessLauncher,
  LaunchOptions,
  LaunchResult,
} from "../src/core/domain/services/process-launcher.service.js";

export interface LaunchCall {
  command: string;
  args: string[];
  options: LaunchOptions;
}

type Responder = (call: LaunchCall) => Partial<LaunchResult> | Error;

/** Records every launch and answers from a responder instead of spawning. */
export class FakeLauncher implements IProcessLauncher {
  calls: LaunchCall[] = [];

  constructor(private responder: Responder = () => ({ exitCode: 0 })) {}

  async run(command: string, args: string[], options: LaunchOptions): Promise<LaunchResult> {
    const call = { command, args, options };
    this.calls.push(call);
    const answer = this.responder(call);
    if (answer instanceof Error) throw answer;
    return {
      command: [command, ...args].join(" "),
      exitCode: options.detached ? null : 0,
      stdout: "",
      stderr: "",
      ...answer,
    };
  }
}

export function enoent(command: string): Error {
  return Object.assign(new Error(`spawn ${command} ENOENT`), { code: "ENOENT" });
}

export async function makeTempDir(prefix = "adm-test-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function buildConfig(root: string, overrides: Partial<BootstrapConfig> = {}): BootstrapConfig {
  return {
    root,
    envFile: join(root, ".env"),
    platform: "linux",
    runtime: {
      command: "python3",
      versionArgs: ["--version"],
      minVersion: "3.9",
      installer: {
        url: "https://downloads.example.test/runtime-installer.exe",
        fileName: "runtime-installer.exe",
        command: "{file}",
        args: ["/quiet", "TargetLog={file}.log"],
      },
    },
    environment: { path: join(root, ".venv"), packages: ["flask", "python-dotenv"] },
    directories: [join(root, "logs"), join(root, "data")],
    defaults: [
      { key: "EMAIL_HOST", value: "smtp.gmail.com", comment: "SMTP relay" },
      { key: "EMAIL_PORT", value: "587" },
      { key: "EMAIL_USERNAME", value: "" },
      { key: "EMAIL_PASSWORD", value: "", secret: true },
      { key: "EMAIL_RECIPIENT", value: "" },
      { key: "PORT", value: "5000" },
    ],
    email: { probeTimeoutMs: 2000 },
    service: {
      command: join(root, ".venv", "bin", "python"),
      args: ["main.py"],
      logFile: join(root, "logs", "service.log"),
      defaultPort: 5000,
    },
    ...overrides,
  };
}

/** Clock that advances one second per call, starting at the given instant. */
export function steppingClock(start = "2026-01-01T00:00:00.000Z"): () => Date {
  let t = Date.parse(start);
  return () => {
    const d = new Date(t);
    t += 1000;
    return d;
  };
}
