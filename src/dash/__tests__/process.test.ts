import { describe, expect, it, vi } from "vitest";
import { makeLogger } from "../../__tests__/helpers.js";
import { runCommand, type CommandResult } from "../command.js";
import { createProcessLauncher, createProcessProbe } from "../process.js";
import { createCapabilityEnabler } from "../settings.js";
import { DASH_TARGETS } from "../targets.js";

const result = (exitCode: number | null, stderr = ""): CommandResult => ({ exitCode, stdout: "", stderr });

const runner = (...results: CommandResult[]) =>
  vi.fn(async (_file: string, _args: string[], _options: { timeoutMs: number }) => results.shift() ?? result(0));

describe("createProcessProbe", () => {
  it("looks Dash up with pgrep and treats exit 0 as running", async () => {
    const run = runner(result(0));
    const probe = createProcessProbe(run, makeLogger());

    await expect(probe.isRunning()).resolves.toBe(true);
    expect(run).toHaveBeenCalledWith("pgrep", ["-f", "Dash"], { timeoutMs: 5_000 });
  });

  it("reports not running on a non-zero exit or when pgrep cannot run", async () => {
    const logger = makeLogger();
    const probe = createProcessProbe(runner(result(1), result(null, "spawn pgrep ENOENT")), logger);

    await expect(probe.isRunning()).resolves.toBe(false);
    await expect(probe.isRunning()).resolves.toBe(false);
    expect(logger.debug).toHaveBeenCalledWith("pgrep did not complete: spawn pgrep ENOENT");
  });
});

describe("createProcessLauncher", () => {
  it("opens the bundle hidden in the background", async () => {
    const run = runner(result(0));
    const launcher = createProcessLauncher(run, makeLogger(), 7_000);

    await expect(launcher.launch(DASH_TARGETS[0])).resolves.toBe(true);
    expect(run).toHaveBeenCalledWith("open", ["-g", "-j", "-b", "com.kapeli.dashdoc"], { timeoutMs: 7_000 });
  });

  it("returns false when open fails", async () => {
    const launcher = createProcessLauncher(runner(result(1, "Unable to find application")), makeLogger());

    await expect(launcher.launch(DASH_TARGETS[1])).resolves.toBe(false);
  });
});

describe("createCapabilityEnabler", () => {
  it("writes the API server flag into every preferences domain", async () => {
    const run = runner(result(0), result(0));
    const enabler = createCapabilityEnabler(run, makeLogger());

    const report = await enabler.enableApiServer(DASH_TARGETS);

    expect(report).toEqual({ written: ["com.kapeli.dashdoc", "com.kapeli.dash-setapp"], failed: [] });
    expect(run.mock.calls.map(([file, args]) => [file, ...args])).toEqual([
      ["defaults", "write", "com.kapeli.dashdoc", "DHAPIServerEnabled", "-bool", "YES"],
      ["defaults", "write", "com.kapeli.dash-setapp", "DHAPIServerEnabled", "-bool", "YES"],
    ]);
  });

  it("keeps going after a failed write and reports it", async () => {
    const enabler = createCapabilityEnabler(runner(result(1, "boom\n"), result(0)), makeLogger());

    const report = await enabler.enableApiServer(DASH_TARGETS);

    expect(report).toEqual({
      written: ["com.kapeli.dash-setapp"],
      failed: [{ domain: "com.kapeli.dashdoc", reason: "boom" }],
    });
  });

  it("falls back to the exit code when the command prints nothing", async () => {
    const enabler = createCapabilityEnabler(runner(result(null)), makeLogger());

    const report = await enabler.enableApiServer([DASH_TARGETS[0]]);

    expect(report.failed).toEqual([{ domain: "com.kapeli.dashdoc", reason: "exit code none" }]);
  });
});

describe("runCommand", () => {
  it("resolves with a null exit code when the binary does not exist", async () => {
    const outcome = await runCommand("dash-mcp-no-such-binary", [], { timeoutMs: 1_000 });

    expect(outcome.exitCode).toBeNull();
    expect(outcome.stderr).toContain("ENOENT");
  });
});
