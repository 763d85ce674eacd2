import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { defaultConfig } from "../config/index.js";
import type { CommandResult, CommandRunner } from "../exec/command-runner.js";
import type { ServiceManager } from "../services/service-manager.js";
import { createSilentLogger } from "../shared/logger.js";
import type { ProcessControl } from "../supervisor/process-control.js";
import { ProcessRegistry } from "../supervisor/registry.js";
import { buildProgram, createContext, handleStatus, handleStop, type CliContext } from "./program.js";

const ok: CommandResult = { success: true, exitCode: 0, stdout: "", stderr: "", command: "true" };

function fakeRunner(): CommandRunner {
  return { run: () => ok, which: () => true };
}

function fakeServices(running: boolean): ServiceManager {
  return {
    isInstalled: () => true,
    isRunning: () => running,
    install: () => ok,
    start: () => ok,
    enable: () => ok,
    runCommand: () => ok,
  };
}

function fakeControl(alive: Set<number>, unkillable = new Set<number>()): ProcessControl {
  return {
    spawnDetached: () => 1,
    isAlive: (pid) => alive.has(pid),
    commandLine: (pid) => (alive.has(pid) ? ["celery", "-A", "tasks", "worker"] : null),
    terminate: (pid) => alive.has(pid) && (unkillable.has(pid) || alive.delete(pid)),
  };
}

describe("CLI program", () => {
  it("creates a program with name taskstack", () => {
    expect(buildProgram().name()).toBe("taskstack");
  });

  it("has expected global options", () => {
    const optionFlags = buildProgram().options.map((o) => o.long);
    expect(optionFlags).toEqual(
      expect.arrayContaining([
        "--project-dir",
        "--config",
        "--skip-install",
        "--skip-brokers",
        "--verbose",
        "--quiet",
      ]),
    );
  });

  it("has up, status and stop subcommands", () => {
    expect(buildProgram().commands.map((c) => c.name())).toEqual(["up", "status", "stop"]);
  });

  it("stop takes optional variadic process names", () => {
    const stop = buildProgram().commands.find((c) => c.name() === "stop");
    const arg = stop?.registeredArguments[0];
    expect(arg?.name()).toBe("names");
    expect(arg?.variadic).toBe(true);
    expect(arg?.required).toBe(false);
  });
});

describe("createContext", () => {
  let projectDir: string;

  beforeEach(() => {
    projectDir = fs.mkdtempSync(path.join(os.tmpdir(), "taskstack-cli-test-"));
  });

  afterEach(() => {
    fs.rmSync(projectDir, { recursive: true, force: true });
  });

  it("loads taskstack.yaml from the project directory", () => {
    fs.writeFileSync(path.join(projectDir, "taskstack.yaml"), "app: jobs\nbrokers: [redis]\n");

    const ctx = createContext({ projectDir }, {});

    expect(ctx.projectDir).toBe(projectDir);
    expect(ctx.config.app).toBe("jobs");
    expect(ctx.config.brokers).toEqual(["redis"]);
  });

  it("reads an explicit config path relative to the project", () => {
    fs.writeFileSync(path.join(projectDir, "stack.yaml"), "app: parser\n");
    expect(createContext({ projectDir, config: "stack.yaml" }, {}).config.app).toBe("parser");
  });

  it("applies environment overrides", () => {
    expect(createContext({ projectDir }, { TASKSTACK_APP: "jobs" }).config.app).toBe("jobs");
  });
});

describe("command handlers", () => {
  let projectDir: string;
  let alive: Set<number>;
  let ctx: CliContext;
  let log: MockInstance<typeof console.log>;

  beforeEach(() => {
    projectDir = fs.mkdtempSync(path.join(os.tmpdir(), "taskstack-cli-test-"));
    alive = new Set([4242]);
    const registry = new ProcessRegistry(path.join(projectDir, ".taskstack"));
    registry.put({
      name: "worker",
      pid: 4242,
      command: "celery",
      args: ["-A", "tasks", "worker"],
      logFile: path.join(projectDir, "celery.log"),
      startedAt: "2026-01-01T00:00:00.000Z",
    });
    const config = defaultConfig();
    config.brokers = ["redis"];
    ctx = {
      projectDir,
      config,
      logger: createSilentLogger(),
      runner: fakeRunner(),
      services: fakeServices(true),
      supervisor: { registry, control: fakeControl(alive), stopPoll: { attempts: 2, intervalMs: 0 } },
    };
    log = vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(projectDir, { recursive: true, force: true });
  });

  it("status exits 0 when everything is up", () => {
    expect(handleStatus(ctx)).toBe(0);
    expect(log).toHaveBeenCalledWith(
      [
        "Brokers:",
        "  Redis      running",
        "Processes:",
        `  worker     pid 4242 running since 2026-01-01T00:00:00.000Z -> ${path.join(projectDir, "celery.log")}`,
      ].join("\n"),
    );
  });

  it("status exits 1 when a broker is stopped or a process exited", () => {
    expect(handleStatus({ ...ctx, services: fakeServices(false) })).toBe(1);
    alive.clear();
    expect(handleStatus(ctx)).toBe(1);
  });

  it("stop signals tracked processes and clears the registry", async () => {
    expect(await handleStop(ctx, [])).toBe(0);

    expect(alive.size).toBe(0);
    expect(ctx.supervisor.registry.list()).toEqual([]);
    expect(log).toHaveBeenCalledWith("[taskstack] Stopped worker (pid 4242).");
  });

  it("stop exits 1 and keeps the record when a process survives SIGKILL", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const stuck = { ...ctx.supervisor, control: fakeControl(alive, new Set([4242])) };

    expect(await handleStop({ ...ctx, supervisor: stuck }, [])).toBe(1);

    expect(error).toHaveBeenCalledWith(
      "[taskstack] Could not stop worker: worker (pid 4242) did not exit after SIGKILL",
    );
    expect(ctx.supervisor.registry.list().map((r) => r.name)).toEqual(["worker"]);
  });

  it("stop says when nothing is tracked", async () => {
    expect(await handleStop(ctx, ["monitor"])).toBe(0);
    expect(log).toHaveBeenCalledWith("[taskstack] No tracked processes to stop.");
    expect(alive.has(4242)).toBe(true);
  });
});
