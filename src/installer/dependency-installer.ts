/**
 * Dependency installer.
 *
 * Installs the task application's language-runtime dependencies from a
 * manifest (one package specifier per line) with the configured package
 * manager. No partial-success handling and no retry: a missing manifest or
 * a failed install is fatal for the bootstrap.
 */
import fs from "node:fs";
import type { CommandRunner, CommandResult } from "../exec/command-runner.js";
import { BootstrapError } from "../shared/errors.js";
import { createSilentLogger, type Logger } from "../shared/logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface InstallOptions {
  /** Package manager executable. Defaults to "pip". */
  installer?: string;
  logger?: Logger;
}

export interface InstallResult {
  /** Entries listed in the manifest, in file order. */
  packages: string[];
  /** True when the manifest had no entries and nothing was invoked. */
  skipped: boolean;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class ManifestMissingError extends BootstrapError {
  readonly manifestPath: string;

  constructor(manifestPath: string) {
    super("install", `Dependency manifest not found: ${manifestPath}`);
    this.name = "ManifestMissingError";
    this.manifestPath = manifestPath;
  }
}

export class DependencyInstallError extends BootstrapError {
  readonly result: CommandResult;

  constructor(result: CommandResult) {
    const detail = result.stderr.trim().split("\n").pop()?.trim() || `exit code ${result.exitCode}`;
    super("install", `Dependency install failed: ${detail}`);
    this.name = "DependencyInstallError";
    this.result = result;
  }
}

// ---------------------------------------------------------------------------
// Manifest parsing
// ---------------------------------------------------------------------------

/**
 * Parse manifest text into package specifiers.
 *
 * Blank lines and `#` comments are dropped; an inline comment needs
 * whitespace before the `#` so URL fragments survive.
 */
export function parseManifest(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.replace(/(^|\s)#.*$/, "").trim())
    .filter((line) => line.length > 0);
}

/** Read and parse a manifest file. */
export function readManifest(manifestPath: string): string[] {
  if (!fs.existsSync(manifestPath)) {
    throw new ManifestMissingError(manifestPath);
  }
  return parseManifest(fs.readFileSync(manifestPath, "utf-8"));
}

// ---------------------------------------------------------------------------
// Install
// ---------------------------------------------------------------------------

/**
 * Install every dependency listed in the manifest.
 *
 * Invokes `<installer> install -r <manifest>` once. Running it again repeats
 * the same single call; the package manager resolves already-installed
 * packages without side effects.
 */
export function installDependencies(
  manifestPath: string,
  runner: CommandRunner,
  options: InstallOptions = {},
): InstallResult {
  const logger = options.logger ?? createSilentLogger();
  const installer = options.installer ?? "pip";

  const packages = readManifest(manifestPath);
  if (packages.length === 0) {
    logger.info(`${manifestPath} lists no dependencies, nothing to install.`);
    return { packages, skipped: true };
  }

  logger.info(`Installing ${packages.length} dependencies from ${manifestPath}...`);
  const result = runner.run(installer, ["install", "-r", manifestPath]);
  if (!result.success) {
    throw new DependencyInstallError(result);
  }

  logger.info("Dependencies installed.");
  return { packages, skipped: false };
}
