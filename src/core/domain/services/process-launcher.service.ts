export interface LaunchOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Detached launches return as soon as the child has spawned. */
  detached: boolean;
}

export interface LaunchResult {
  command: string;
  pid?: number;
  /** null for detached launches, which are never waited on. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface IProcessLauncher {
  run(command: string, args: string[], options: LaunchOptions): Promise<LaunchResult>;
}
