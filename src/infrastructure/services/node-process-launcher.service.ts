import { spawn } from "node:child_process";
import type {
  IProcessLauncher,
  LaunchOptions,
  LaunchResult,
} from "../../core/domain/services/process-launcher.service.js";

export class NodeProcessLauncher implements IProcessLauncher {
  run(command: string, args: string[], options: LaunchOptions): Promise<LaunchResult> {
    const displayCmd = [command, ...args].join(" ");
    return options.detached
      ? this.runDetached(command, args, options, displayCmd)
      : this.runAttached(command, args, options, displayCmd);
  }

  private runDetached(
    command: string,
    args: string[],
    options: LaunchOptions,
    displayCmd: string,
  ): Promise<LaunchResult> {
    return new Promise<LaunchResult>((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: options.env,
        shell: false,
        detached: true,
        windowsHide: true,
        stdio: "ignore",
      });
      child.once("error", reject);
      child.once("spawn", () => {
        child.removeListener("error", reject);
        // The launcher may exit right away; the child keeps running on its own.
        child.unref();
        resolve({ command: displayCmd, pid: child.pid, exitCode: null, stdout: "", stderr: "" });
      });
    });
  }

  private runAttached(
    command: string,
    args: string[],
    options: LaunchOptions,
    displayCmd: string,
  ): Promise<LaunchResult> {
    return new Promise<LaunchResult>((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: options.env,
        shell: false,
        windowsHide: true,
        stdio: ["ignore", "pipe", "pipe"],
      });

      let stdout = "";
      let stderr = "";
      // Decoded per stream so a character split across chunks stays whole.
      child.stdout?.setEncoding("utf8");
      child.stderr?.setEncoding("utf8");
      child.stdout?.on("data", (d: string) => {
        stdout += d;
      });
      child.stderr?.on("data", (d: string) => {
        stderr += d;
      });

      child.once("error", reject);
      child.once("close", (code) => {
        resolve({
          command: displayCmd,
          pid: child.pid,
          // null when killed by a signal
          exitCode: code ?? 1,
          stdout,
          stderr,
        });
      });
    });
  }
}
