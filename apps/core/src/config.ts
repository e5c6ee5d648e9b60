import { execSync } from "node:child_process";
import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import { SuiteStrategy } from "./constants.js";

type Env = Readonly<Record<string, string | undefined>>;

function fail(message: string): never {
  throw new Error(`Config error: ${message}`);
}

function readEnvString(env: Env, key: string, fallback: string): string {
  const value = env[key];
  if (value === undefined || value === "") return fallback;
  return value;
}

function readEnvBoolean(env: Env, key: string, fallback: boolean): boolean {
  const value = env[key];
  if (value === undefined || value === "") return fallback;
  if (value === "true") return true;
  if (value === "false") return false;
  fail(`Invalid value for ${key}: "${value}". Must be "true" or "false".`);
}

function parseStrategy(value: string, source: string): SuiteStrategy {
  if (value === SuiteStrategy.SNAPSHOT || value === SuiteStrategy.CHECKOUT) return value;
  fail(`Invalid value for ${source}: "${value}". Must be "${SuiteStrategy.SNAPSHOT}" or "${SuiteStrategy.CHECKOUT}".`);
}

export function readVersion(): string {
  const dir = path.dirname(fileURLToPath(import.meta.url));
  const pkgPath = path.join(dir, "..", "package.json");
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

export const HELP_TEXT = `Usage: matrixgen [options]

Builds the CircleCI test matrix (example apps × versions × test suites)
and writes the generated config.

Options:
  --root <dir>           Project root (default: git top-level directory)
  --examples <dir>       Example applications directory (default: examples)
  --tests <dir>          Test suites directory (default: test)
  --template <file>      Base CircleCI template (default: templates/base-generated-config.yaml)
  --output <file>        Generated config path (default: templates/generated.yml)
  --branch <name>        Floating branch appended to the version list (default: main)
  --strategy <name>      How suites are listed per version: snapshot | checkout (default: snapshot)
  -n, --dry-run          Print the generated config without writing it
  -v, --verbose          Enable verbose output
  -V, --version          Show version number
  -h, --help             Show this help message

Examples:
  matrixgen
  matrixgen --strategy checkout --branch develop
  matrixgen -n --root ./src

Relative paths resolve against the project root.
Environment variables override defaults; CLI args override env vars.`;

export interface CliArgs {
  readonly help: boolean;
  readonly version: boolean;
  readonly verbose: boolean;
  readonly dryRun: boolean;
  readonly root: string | undefined;
  readonly examples: string | undefined;
  readonly tests: string | undefined;
  readonly template: string | undefined;
  readonly output: string | undefined;
  readonly branch: string | undefined;
  readonly strategy: string | undefined;
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const { values } = parseArgs({
    args: [...argv],
    strict: true,
    options: {
      verbose: { type: "boolean", short: "v" },
      help: { type: "boolean", short: "h" },
      version: { type: "boolean", short: "V" },
      "dry-run": { type: "boolean", short: "n" },
      root: { type: "string" },
      examples: { type: "string" },
      tests: { type: "string" },
      template: { type: "string" },
      output: { type: "string" },
      branch: { type: "string" },
      strategy: { type: "string" },
    },
  });

  return {
    help: values.help === true,
    version: values.version === true,
    verbose: values.verbose === true,
    dryRun: values["dry-run"] === true,
    root: values.root,
    examples: values.examples,
    tests: values.tests,
    template: values.template,
    output: values.output,
    branch: values.branch,
    strategy: values.strategy,
  };
}

/**
 * Generator config loaded from environment variables and CLI arguments.
 * CLI args take precedence over env vars. All paths are absolute.
 */
export interface MatrixConfig {
  readonly root: string;
  readonly examplesDir: string;
  readonly testSuitesDir: string;
  readonly templateFile: string;
  readonly outputFile: string;
  readonly floatingBranch: string;
  readonly strategy: SuiteStrategy;
  readonly dryRun: boolean;
  readonly verbose: boolean;
}

function gitTopLevel(): string {
  return execSync("git rev-parse --show-toplevel", { encoding: "utf-8" }).trim();
}

export function loadConfig(cli: CliArgs, env: Env = process.env): MatrixConfig {
  const rootArg = cli.root ?? readEnvString(env, "MATRIXGEN_ROOT", "");
  const root = rootArg !== "" ? path.resolve(rootArg) : gitTopLevel();
  const resolve = (value: string) => path.resolve(root, value);

  const strategy =
    cli.strategy !== undefined
      ? parseStrategy(cli.strategy, "--strategy")
      : parseStrategy(readEnvString(env, "SUITE_STRATEGY", SuiteStrategy.SNAPSHOT), "SUITE_STRATEGY");

  const branch = cli.branch ?? readEnvString(env, "FLOATING_BRANCH", "main");
  if (branch === "") fail("--branch must not be empty");

  return {
    root,
    examplesDir: resolve(cli.examples ?? readEnvString(env, "EXAMPLES_DIR", "examples")),
    testSuitesDir: resolve(cli.tests ?? readEnvString(env, "TEST_SUITES_DIR", "test")),
    templateFile: resolve(cli.template ?? readEnvString(env, "BASE_TEMPLATE", "templates/base-generated-config.yaml")),
    outputFile: resolve(cli.output ?? readEnvString(env, "GENERATED_CONFIG", "templates/generated.yml")),
    floatingBranch: branch,
    strategy,
    dryRun: cli.dryRun || readEnvBoolean(env, "DRY_RUN", false),
    verbose: cli.verbose || readEnvBoolean(env, "VERBOSE", false),
  };
}
