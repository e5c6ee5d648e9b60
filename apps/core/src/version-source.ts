/**
 * Version discovery backed by git.
 *
 * Versions are the release tags (see VERSION_TAG_PATTERN) followed by the
 * floating branch. Test suites are listed per version, either from the
 * revision's tree object (`snapshot`) or by checking the revision out and
 * listing the directory on disk (`checkout`). The checkout strategy mutates
 * the shared working tree and must not run alongside anything else using it.
 */
import { execFileSync } from "node:child_process";
import * as fs from "node:fs";
import * as path from "node:path";
import { ENTRYPOINT_FILE, SuiteStrategy, VERSION_TAG_PATTERN } from "./constants.js";
import { isValid } from "./harness.js";
import type { Logger } from "./logger.js";
import { msg } from "./messages.js";

/** Runs git with the given arguments and returns stdout. Throws on a non-zero exit. */
export type GitRunner = (args: readonly string[]) => string;

export function createGitRunner(cwd: string): GitRunner {
  return (args) =>
    execFileSync("git", [...args], { cwd, encoding: "utf-8", stdio: ["ignore", "pipe", "pipe"], maxBuffer: 16 * 1024 * 1024 });
}

export interface VersionSource {
  /** Release tags in listing order, then the floating branch. */
  listVersions(): string[];
  /** Suite directory names at `version`. Empty when the revision cannot be read. */
  listSuitesAt(version: string): string[];
  /** Whether the suite directory carries the entrypoint marker at `version`. */
  isSuiteValid(version: string, suitePath: string): boolean;
}

/** Keep only release tags, preserving the order git listed them in. */
export function filterVersionTags(lines: readonly string[]): string[] {
  return lines.map((line) => line.trim()).filter((tag) => VERSION_TAG_PATTERN.test(tag));
}

export interface GitVersionSourceOptions {
  readonly root: string;
  readonly testSuitesDir: string;
  readonly floatingBranch: string;
  readonly git: GitRunner;
  readonly logger: Logger;
}

abstract class GitVersionSource implements VersionSource {
  constructor(protected readonly options: GitVersionSourceOptions) {}

  listVersions(): string[] {
    const tags = filterVersionTags(this.options.git(["tag", "-l"]).split("\n"));
    const branch = this.options.floatingBranch;
    return [...tags.filter((tag) => tag !== branch), branch];
  }

  listSuitesAt(version: string): string[] {
    let suites: string[];
    try {
      suites = this.readSuites(version);
    } catch (err) {
      this.options.logger.error(msg.suiteListingFailed(version), err);
      return [];
    }
    this.options.logger.debug(msg.suitesAt(version, suites));
    return suites;
  }

  abstract isSuiteValid(version: string, suitePath: string): boolean;

  protected abstract readSuites(version: string): string[];

  /** `<rev>:./<path>` object name, resolved by git relative to the root (its working directory). */
  protected treeSpec(version: string, absolute: string): string {
    const rel = path.relative(this.options.root, absolute).split(path.sep).join("/");
    return `${version}:./${rel}`;
  }
}

/** Reads suites from the revision's tree without touching the working tree. */
export class SnapshotVersionSource extends GitVersionSource {
  protected readSuites(version: string): string[] {
    const spec = this.treeSpec(version, this.options.testSuitesDir);
    return this.options.git(["ls-tree", "-d", "--name-only", spec]).split("\n").filter(Boolean);
  }

  isSuiteValid(version: string, suitePath: string): boolean {
    let entries: string[];
    try {
      entries = this.options.git(["ls-tree", "--name-only", this.treeSpec(version, suitePath)]).split("\n");
    } catch (err) {
      this.options.logger.debug(`  ${suitePath} not found at ${version}: ${err instanceof Error ? err.message : String(err)}`);
      return false;
    }
    return entries.includes(ENTRYPOINT_FILE);
  }
}

/** Checks the revision out, then lists the suites directory on disk. */
export class CheckoutVersionSource extends GitVersionSource {
  protected readSuites(version: string): string[] {
    this.options.logger.debug(msg.checkingOut(version));
    this.options.git(["checkout", version]);
    return fs
      .readdirSync(this.options.testSuitesDir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  }

  isSuiteValid(_version: string, suitePath: string): boolean {
    return isValid(suitePath);
  }
}

export function createVersionSource(strategy: SuiteStrategy, options: GitVersionSourceOptions): VersionSource {
  switch (strategy) {
    case SuiteStrategy.SNAPSHOT:
      return new SnapshotVersionSource(options);
    case SuiteStrategy.CHECKOUT:
      return new CheckoutVersionSource(options);
  }
}
