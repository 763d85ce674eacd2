import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  ConfigError,
  DEFAULT_CONFIG,
  applyEnvOverrides,
  defaultConfig,
  expandArgs,
  loadConfig,
  resolveConfigPath,
  resolveStateDir,
} from "./index.js";

function makeTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "taskstack-config-test-"));
}

function rmrf(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

describe("resolveStateDir", () => {
  it("returns <project>/.taskstack by default", () => {
    expect(resolveStateDir("/srv/app", {})).toBe(path.join("/srv/app", ".taskstack"));
  });

  it("respects TASKSTACK_STATE_DIR, relative to the project", () => {
    expect(resolveStateDir("/srv/app", { TASKSTACK_STATE_DIR: "/tmp/custom-state" })).toBe(
      "/tmp/custom-state",
    );
    expect(resolveStateDir("/srv/app", { TASKSTACK_STATE_DIR: "run" })).toBe("/srv/app/run");
  });
});

describe("resolveConfigPath", () => {
  it("returns taskstack.yaml inside the project", () => {
    expect(resolveConfigPath("/srv/app")).toBe("/srv/app/taskstack.yaml");
  });

  it("resolves an override against the project", () => {
    expect(resolveConfigPath("/srv/app", "conf/stack.yaml")).toBe("/srv/app/conf/stack.yaml");
  });
});

describe("loadConfig", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTmpDir();
  });

  afterEach(() => {
    rmrf(tmpDir);
  });

  function writeConfig(content: string): string {
    const file = path.join(tmpDir, "taskstack.yaml");
    fs.writeFileSync(file, content);
    return file;
  }

  it("returns the defaults when the file is missing", () => {
    expect(loadConfig(path.join(tmpDir, "missing.yaml"), {})).toEqual(DEFAULT_CONFIG);
  });

  it("returns the defaults for an empty file", () => {
    expect(loadConfig(writeConfig(""), {})).toEqual(DEFAULT_CONFIG);
  });

  it("default worker and monitor reproduce the classic celery/flower commands", () => {
    const config = loadConfig(path.join(tmpDir, "missing.yaml"), {});
    expect(expandArgs(config.worker.args, { app: config.app })).toEqual([
      "-A", "tasks", "worker", "-l", "info", "-P", "gevent",
    ]);
    expect(expandArgs(config.monitor.args, { app: config.app, port: config.monitor.port })).toEqual([
      "-A", "tasks", "flower", "--port=5555",
    ]);
    expect(config.worker.logFile).toBe("celery.log");
    expect(config.monitor.logFile).toBe("flower.log");
  });

  it("merges file values over the defaults", () => {
    const config = loadConfig(
      writeConfig(
        [
          "app: parser",
          "sudo: false",
          "brokers: [rabbitmq]",
          "worker:",
          "  logMode: append",
          "monitor:",
          "  port: 5566",
          "  duplicates: allow",
        ].join("\n"),
      ),
      {},
    );

    expect(config.app).toBe("parser");
    expect(config.sudo).toBe(false);
    expect(config.brokers).toEqual(["rabbitmq"]);
    expect(config.worker.logMode).toBe("append");
    expect(config.worker.command).toBe("celery");
    expect(config.monitor.port).toBe(5566);
    expect(config.monitor.duplicates).toBe("allow");
    expect(config.monitor.logFile).toBe("flower.log");
  });

  it("drops duplicate broker ids", () => {
    const config = loadConfig(writeConfig("brokers: [redis, redis, rabbitmq]"), {});
    expect(config.brokers).toEqual(["redis", "rabbitmq"]);
  });

  it("accepts numeric args as strings", () => {
    const config = loadConfig(writeConfig("worker:\n  args: [worker, --concurrency, 4]"), {});
    expect(config.worker.args).toEqual(["worker", "--concurrency", "4"]);
  });

  it("rejects an unknown broker", () => {
    const file = writeConfig("brokers: [redis, kafka]");
    expect(() => loadConfig(file, {})).toThrow(ConfigError);
    expect(() => loadConfig(file, {})).toThrow('unknown broker "kafka"');
  });

  it("rejects an invalid log mode", () => {
    expect(() => loadConfig(writeConfig("worker:\n  logMode: rotate"), {})).toThrow(
      '"worker.logMode" must be "truncate" or "append"',
    );
  });

  it("rejects an invalid duplicate policy", () => {
    expect(() => loadConfig(writeConfig("monitor:\n  duplicates: skip"), {})).toThrow(
      '"monitor.duplicates" must be "replace" or "allow"',
    );
  });

  it("rejects an out-of-range port", () => {
    expect(() => loadConfig(writeConfig("monitor:\n  port: 70000"), {})).toThrow(
      '"monitor.port" must be an integer between 1 and 65535',
    );
  });

  it("rejects a user without a password", () => {
    expect(() => loadConfig(writeConfig("rabbitmq:\n  user: ops"), {})).toThrow(
      '"rabbitmq.user" and "rabbitmq.password" must be set together',
    );
  });

  it("rejects a non-mapping document", () => {
    expect(() => loadConfig(writeConfig("- just\n- a list"), {})).toThrow("top level must be a mapping");
  });

  it("rejects malformed YAML", () => {
    expect(() => loadConfig(writeConfig("app: [unclosed"), {})).toThrow("not valid YAML");
  });

  it("names the file in the error", () => {
    const file = writeConfig("sudo: maybe");
    expect(() => loadConfig(file, {})).toThrow(`Invalid configuration in ${file}: "sudo" must be true or false`);
  });
});

describe("applyEnvOverrides", () => {
  it("overrides app, sudo and rabbitmq credentials", () => {
    const config = applyEnvOverrides(defaultConfig(), {
      TASKSTACK_APP: "jobs",
      TASKSTACK_NO_SUDO: "1",
      TASKSTACK_RABBITMQ_USER: "ops",
      TASKSTACK_RABBITMQ_PASSWORD: "test-secret",
    });
    expect(config.app).toBe("jobs");
    expect(config.sudo).toBe(false);
    expect(config.rabbitmq.user).toBe("ops");
    expect(config.rabbitmq.password).toBe("test-secret");
  });

  it("does not mutate its input", () => {
    const base = defaultConfig();
    applyEnvOverrides(base, { TASKSTACK_APP: "jobs" });
    expect(base.app).toBe("tasks");
  });

  it("rejects a password without a user", () => {
    expect(() => applyEnvOverrides(defaultConfig(), { TASKSTACK_RABBITMQ_PASSWORD: "test-secret" })).toThrow(
      ConfigError,
    );
  });
});

describe("expandArgs", () => {
  it("substitutes known placeholders and keeps unknown ones", () => {
    expect(expandArgs(["-A", "{app}", "--port={port}", "{other}"], { app: "tasks", port: 5555 })).toEqual([
      "-A",
      "tasks",
      "--port=5555",
      "{other}",
    ]);
  });
});
