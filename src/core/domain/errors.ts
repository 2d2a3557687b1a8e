/**
 * Exit codes returned by the CLI, one per failure category.
 */
export const ExitCode = {
  OK: 0,
  UNEXPECTED: 1,
  IO: 2,
  INSTALL: 3,
  KEY_NOT_FOUND: 4,
  PROBE_FAILED: 5,
  LAUNCH: 6,
  INVALID_CONFIG: 7,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

export class BootstrapError extends Error {
  readonly exitCode: ExitCodeValue = ExitCode.UNEXPECTED;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BootstrapError";
  }
}

export class IOError extends BootstrapError {
  override readonly exitCode = ExitCode.IO;

  constructor(
    message: string,
    public readonly path: string,
    public readonly code?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "IOError";
  }
}

export class InstallError extends BootstrapError {
  override readonly exitCode = ExitCode.INSTALL;

  constructor(
    message: string,
    public readonly step: string,
    /** Exit code of the failed installer process, null when it never ran. */
    public readonly processExitCode: number | null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "InstallError";
  }
}

export class KeyNotFoundError extends BootstrapError {
  override readonly exitCode = ExitCode.KEY_NOT_FOUND;

  constructor(
    public readonly key: string,
    public readonly path: string,
  ) {
    super(`Key "${key}" is not present in ${path}. Add it to the file first.`);
    this.name = "KeyNotFoundError";
  }
}

export class InvalidConfigValueError extends BootstrapError {
  override readonly exitCode = ExitCode.INVALID_CONFIG;

  constructor(
    public readonly key: string,
    reason: string,
  ) {
    super(`Value for "${key}" ${reason}.`);
    this.name = "InvalidConfigValueError";
  }
}

export class ConfigValidationError extends BootstrapError {
  override readonly exitCode = ExitCode.INVALID_CONFIG;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigValidationError";
  }
}

export class ServiceLaunchError extends BootstrapError {
  override readonly exitCode = ExitCode.LAUNCH;

  constructor(
    message: string,
    public readonly command: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ServiceLaunchError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Node system errors carry an errno string such as "ENOENT". */
export function errnoCode(e: unknown): string | undefined {
  if (e instanceof Error && "code" in e && typeof e.code === "string") {
    return e.code;
  }
  return undefined;
}
