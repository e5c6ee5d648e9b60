/**
 * Filesystem predicates for example applications and test suites.
 *
 * Both kinds of directory must ship `test_entrypoint.sh`, which initializes
 * the application under test. Directories without it are left out of the
 * matrix. Applications may also ship `circle_config.yml` with custom steps.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import { parse as parseYaml } from "yaml";
import { ENTRYPOINT_FILE, OVERRIDE_FILE } from "./constants.js";
import type { OverrideDocument, StepSpec, YamlMap } from "./pipeline-types.js";
import { isYamlMap, toYamlValue } from "./yaml-value.js";

function fail(message: string): never {
  throw new Error(`Override error: ${message}`);
}

function listEntries(dir: string): string[] {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) return [];
  return fs.readdirSync(dir);
}

/** True if `dir` is a directory containing the entrypoint marker. */
export function isValid(dir: string): boolean {
  return listEntries(dir).includes(ENTRYPOINT_FILE);
}

/** True if the application directory provides custom CircleCI steps. */
export function hasOverride(appDir: string): boolean {
  return listEntries(appDir).includes(OVERRIDE_FILE);
}

function readSteps(doc: YamlMap, key: "before" | "after", source: string): StepSpec[] {
  const value = doc[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) fail(`"${key}" must be a list of steps in ${source}`);
  return value;
}

/** Validate a parsed override document. Returns null for documents with no content. */
export function parseOverride(raw: unknown, source: string): OverrideDocument | null {
  if (raw === undefined || raw === null) return null;
  const value = toYamlValue(raw, source);
  if (!isYamlMap(value)) fail(`${source} must be a YAML mapping`);
  if (Object.keys(value).length === 0) return null;
  return {
    before: readSteps(value, "before", source),
    after: readSteps(value, "after", source),
  };
}

/**
 * Load `circle_config.yml` from the application directory.
 * Returns null if the file is missing (it may vanish after `hasOverride`) or empty.
 */
export function loadOverride(appDir: string): OverrideDocument | null {
  const file = path.join(appDir, OVERRIDE_FILE);
  let content: string;
  try {
    content = fs.readFileSync(file, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    fail(`Failed to parse ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseOverride(parsed, file);
}
