import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ServiceLaunchError } from "../src/core/domain/errors.js";
import type { IOperatorNotifier } from "../src/core/domain/services/operator.service.js";
import { ConsoleNotifier } from "../src/infrastructure/services/console-notifier.service.js";
import { ServiceSupervisor } from "../src/infrastructure/services/service-supervisor.service.js";
import { TextLifecycleLogger } from "../src/infrastructure/services/text-lifecycle-logger.service.js";
import { enoent, FakeLauncher, makeTempDir, removeDir, steppingClock } from "./helpers.js";

class RecordingNotifier implements IOperatorNotifier {
  notices: { title: string; lines: string[] }[] = [];

  notify(title: string, lines: string[]): void {
    this.notices.push({ title, lines });
  }
}

describe("ServiceSupervisor", () => {
  let dir: string;
  let logPath: string;
  let notifier: RecordingNotifier;

  beforeEach(async () => {
    dir = await makeTempDir();
    logPath = join(dir, "logs", "service.log");
    notifier = new RecordingNotifier();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("launches detached, logs both lifecycle events and tells the operator where to go", async () => {
    const launcher = new FakeLauncher(() => ({ pid: 4321 }));
    const supervisor = new ServiceSupervisor(
      launcher,
      new TextLifecycleLogger(logPath, steppingClock()),
      notifier,
    );

    const handle = await supervisor.start({
      command: "/srv/app/.venv/bin/python",
      args: ["main.py"],
      cwd: "/srv/app",
      endpointUrl: "http://localhost:5000",
    });

    expect(handle).toEqual({ command: "/srv/app/.venv/bin/python main.py", pid: 4321 });
    expect(launcher.calls).toEqual([
      {
        command: "/srv/app/.venv/bin/python",
        args: ["main.py"],
        options: { cwd: "/srv/app", env: undefined, detached: true },
      },
    ]);
    expect(await readFile(logPath, "utf-8")).toBe(
      "2026-01-01T00:00:00.000Z Starting service: /srv/app/.venv/bin/python main.py (cwd /srv/app)\n" +
        "2026-01-01T00:00:01.000Z Service started (pid 4321)\n",
    );
    expect(notifier.notices).toHaveLength(1);
    expect(notifier.notices[0].title).toBe("Ad manager started");
    expect(notifier.notices[0].lines).toContain("Open http://localhost:5000 in a browser.");
  });

  it("logs the failure before surfacing it and skips the notice", async () => {
    const launcher = new FakeLauncher(() => enoent("/srv/app/.venv/bin/python"));
    const supervisor = new ServiceSupervisor(
      launcher,
      new TextLifecycleLogger(logPath, steppingClock()),
      notifier,
    );

    const error = await supervisor
      .start({
        command: "/srv/app/.venv/bin/python",
        args: ["main.py"],
        cwd: "/srv/app",
        endpointUrl: "http://localhost:5000",
      })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServiceLaunchError);
    expect(error).toMatchObject({
      message: "Could not start /srv/app/.venv/bin/python main.py: spawn /srv/app/.venv/bin/python ENOENT",
    });
    expect((await readFile(logPath, "utf-8")).split("\n")).toEqual([
      "2026-01-01T00:00:00.000Z Starting service: /srv/app/.venv/bin/python main.py (cwd /srv/app)",
      "2026-01-01T00:00:01.000Z Failed to start service: spawn /srv/app/.venv/bin/python ENOENT",
      "",
    ]);
    expect(notifier.notices).toEqual([]);
  });
});

describe("ConsoleNotifier", () => {
  it("prints the title over a rule as wide as the longest line", () => {
    const printed: string[] = [];

    new ConsoleNotifier((text) => printed.push(text)).notify("Started", ["Open http://localhost:5000"]);

    expect(printed).toEqual(["\nStarted\n" + "-".repeat(26) + "\nOpen http://localhost:5000\n"]);
  });
});
