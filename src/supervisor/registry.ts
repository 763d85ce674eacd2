/**
 * Process registry persistence.
 *
 * Records every process taskstack spawns in <stateDir>/processes.yaml, so
 * re-launching or stopping targets exactly the pid that was started rather
 * than anything whose command line happens to match. Writes are atomic
 * (write-to-temp then rename).
 */
import fs from "node:fs";
import path from "node:path";
import { parse, stringify } from "yaml";
import type { ProcessRecord } from "../shared/types.js";

const REGISTRY_FILENAME = "processes.yaml";

interface RegistryFile {
  processes: ProcessRecord[];
}

export class RegistryError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`Process registry ${filePath}: ${message}`);
    this.name = "RegistryError";
    this.filePath = filePath;
  }
}

export function registryFilePath(stateDir: string): string {
  return path.join(stateDir, REGISTRY_FILENAME);
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isProcessRecord(value: unknown): value is ProcessRecord {
  if (!isObject(value)) return false;
  const record = value;
  return (
    typeof record.name === "string" &&
    typeof record.pid === "number" &&
    Number.isInteger(record.pid) &&
    record.pid > 0 &&
    typeof record.command === "string" &&
    Array.isArray(record.args) &&
    record.args.every((a) => typeof a === "string") &&
    typeof record.logFile === "string" &&
    typeof record.startedAt === "string"
  );
}

export class ProcessRegistry {
  private readonly filePath: string;
  private records = new Map<string, ProcessRecord>();

  constructor(stateDir: string) {
    this.filePath = registryFilePath(stateDir);
    this.load();
  }

  /**
   * Re-read the registry file. A missing file is an empty registry; a file
   * that is not YAML throws RegistryError. Malformed entries are skipped.
   */
  load(): void {
    this.records.clear();
    if (!fs.existsSync(this.filePath)) return;

    const raw = fs.readFileSync(this.filePath, "utf-8");
    let parsed: unknown;
    try {
      parsed = parse(raw);
    } catch (error: unknown) {
      const msg = error instanceof Error ? error.message : String(error);
      throw new RegistryError(this.filePath, `not valid YAML (${msg}); fix or delete it`);
    }
    if (!isObject(parsed)) return;
    const list = parsed.processes;
    if (!Array.isArray(list)) return;

    for (const entry of list) {
      if (isProcessRecord(entry)) {
        this.records.set(entry.name, entry);
      }
    }
  }

  get(name: string): ProcessRecord | undefined {
    return this.records.get(name);
  }

  /** All records, sorted by name. */
  list(): ProcessRecord[] {
    return [...this.records.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  put(record: ProcessRecord): void {
    this.records.set(record.name, record);
    this.save();
  }

  /** Remove a record. Returns the removed record, if any. */
  remove(name: string): ProcessRecord | undefined {
    const existing = this.records.get(name);
    if (existing) {
      this.records.delete(name);
      this.save();
    }
    return existing;
  }

  /** Drop records whose process is gone. Returns the dropped records. */
  prune(isAlive: (pid: number) => boolean): ProcessRecord[] {
    const dead = this.list().filter((r) => !isAlive(r.pid));
    if (dead.length > 0) {
      for (const record of dead) this.records.delete(record.name);
      this.save();
    }
    return dead;
  }

  private save(): void {
    const tmpPath = this.filePath + ".tmp";
    const content: RegistryFile = { processes: this.list() };

    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tmpPath, stringify(content), "utf-8");
      fs.renameSync(tmpPath, this.filePath);
    } catch (error: unknown) {
      try {
        if (fs.existsSync(tmpPath)) {
          fs.unlinkSync(tmpPath);
        }
      } catch {
        // Ignore cleanup errors
      }
      const msg = error instanceof Error ? error.message : String(error);
      throw new RegistryError(this.filePath, `failed to save (${msg})`);
    }
  }
}
