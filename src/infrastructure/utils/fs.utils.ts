import { stat } from "node:fs/promises";
import { errnoCode, errorMessage, IOError } from "../../core/domain/errors.js";

export async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (e) {
    if (errnoCode(e) === "ENOENT") return false;
    // Unexpected error, let the caller report it
    throw toIOError(e, path, "Cannot access");
  }
}

const IO_HINTS: Record<string, string> = {
  EACCES: "permission denied",
  EPERM: "operation not permitted",
  ENOENT: "parent directory does not exist",
  ENOTDIR: "a path component is not a directory",
  EROFS: "read-only file system",
  ENOSPC: "no space left on device",
};

/** Wraps a file system failure so the operator can tell permission problems from missing paths. */
export function toIOError(e: unknown, path: string, action: string): IOError {
  const code = errnoCode(e);
  const hint = code ? (IO_HINTS[code] ?? code) : errorMessage(e);
  return new IOError(`${action} ${path}: ${hint}`, path, code, { cause: e });
}
