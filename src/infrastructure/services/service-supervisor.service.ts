import { errorMessage, ServiceLaunchError } from "../../core/domain/errors.js";
import type { ILifecycleLog } from "../../core/domain/services/lifecycle-log.service.js";
import type { IOperatorNotifier } from "../../core/domain/services/operator.service.js";
import type { IProcessLauncher } from "../../core/domain/services/process-launcher.service.js";

export interface ServiceHandle {
  command: string;
  pid?: number;
}

export interface StartRequest {
  command: string;
  args: string[];
  cwd: string;
  env?: NodeJS.ProcessEnv;
  endpointUrl: string;
}

/**
 * Fire-and-forget launcher for the application process.
 * The child is not tracked after it spawns; stopping it is done out of band.
 */
export class ServiceSupervisor {
  constructor(
    private launcher: IProcessLauncher,
    private lifecycleLog: ILifecycleLog,
    private notifier: IOperatorNotifier,
  ) {}

  async start(request: StartRequest): Promise<ServiceHandle> {
    const display = [request.command, ...request.args].join(" ");
    this.logLifecycleEvent(`Starting service: ${display} (cwd ${request.cwd})`);
    let handle: ServiceHandle;
    try {
      handle = await this.startDetached(request.command, request.args, request.cwd, request.env);
    } catch (e) {
      this.logLifecycleEvent(`Failed to start service: ${errorMessage(e)}`);
      throw new ServiceLaunchError(`Could not start ${display}: ${errorMessage(e)}`, display, {
        cause: e,
      });
    }
    this.logLifecycleEvent(`Service started (pid ${handle.pid ?? "unknown"})`);
    this.notifyOperator(request.endpointUrl);
    return handle;
  }

  async startDetached(
    command: string,
    args: string[],
    cwd: string,
    env?: NodeJS.ProcessEnv,
  ): Promise<ServiceHandle> {
    const result = await this.launcher.run(command, args, { cwd, env, detached: true });
    return { command: result.command, pid: result.pid };
  }

  logLifecycleEvent(message: string): boolean {
    return this.lifecycleLog.log(message);
  }

  notifyOperator(endpointUrl: string): void {
    this.notifier.notify("Ad manager started", [
      `The application was launched in the background.`,
      `Open ${endpointUrl} in a browser.`,
      `It keeps running after this window closes; stop it from the task manager.`,
    ]);
  }
}
