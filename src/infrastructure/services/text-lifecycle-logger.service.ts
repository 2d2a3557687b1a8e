import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { errorMessage } from "../../core/domain/errors.js";
import type { ILifecycleLog } from "../../core/domain/services/lifecycle-log.service.js";

/**
 * Append-only service log, one `<ISO timestamp> <message>` line per event.
 * No lock is taken: two launchers writing at the same instant may interleave.
 */
export class TextLifecycleLogger implements ILifecycleLog {
  constructor(
    private logPath: string,
    private now: () => Date = () => new Date(),
  ) {}

  log(message: string): boolean {
    const line = `${this.now().toISOString()} ${message.replace(/\r?\n/g, " ")}\n`;
    try {
      mkdirSync(dirname(this.logPath), { recursive: true });
      appendFileSync(this.logPath, line, "utf-8");
      return true;
    } catch (e) {
      // Dropped: logging must never stop the launch.
      console.error(`Could not write to ${this.logPath}: ${errorMessage(e)}`);
      return false;
    }
  }

  getLogPath(): string {
    return this.logPath;
  }
}
