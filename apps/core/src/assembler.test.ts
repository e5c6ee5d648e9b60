import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { parse as parseYaml } from "yaml";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PipelineAssembler, discoverApplications } from "./assembler.js";
import { isValid } from "./harness.js";
import { Logger } from "./logger.js";
import type { VersionSource } from "./version-source.js";

const FIXTURE = path.join(path.dirname(fileURLToPath(import.meta.url)), "..", "fixtures", "base-generated-config.yaml");

describe("PipelineAssembler", () => {
  let root: string;
  let lines: string[];
  let logger: Logger;

  function write(rel: string, content = ""): void {
    const file = path.join(root, rel);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
  }

  function config(dryRun = false) {
    return {
      examplesDir: path.join(root, "examples"),
      testSuitesDir: path.join(root, "test"),
      templateFile: path.join(root, "templates", "base-generated-config.yaml"),
      outputFile: path.join(root, "templates", "generated.yml"),
      dryRun,
    };
  }

  /** Tags v1.0.0 and main, each shipping the suites on disk. */
  const versions: VersionSource = {
    listVersions: () => ["v1.0.0", "main"],
    listSuitesAt: () => ["smoke"],
    isSuiteValid: (_version, suitePath) => isValid(suitePath),
  };

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "assembler-"));
    lines = [];
    logger = new Logger(false, { write: (text: string) => lines.push(text) });

    write("templates/base-generated-config.yaml", fs.readFileSync(FIXTURE, "utf-8"));
    write("examples/app1/test_entrypoint.sh");
    write("examples/app2/test_entrypoint.sh");
    write("examples/app2/circle_config.yml", "after:\n  - run: cleanup\n");
    write("test/smoke/test_entrypoint.sh");
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("builds one job per app and version and merges app2's after steps once", () => {
    const result = new PipelineAssembler(config(), versions, logger).assemble();

    expect(result.jobCount).toBe(4);
    const doc = parseYaml(result.yaml);
    expect(doc.workflows.test_everything.jobs.map((job: { "test-example": { name: string } }) => job["test-example"].name)).toEqual([
      "app1 (smoke test suite , version: v1.0.0)",
      "app1 (smoke test suite , version: main)",
      "app2 (smoke test suite , version: v1.0.0)",
      "app2 (smoke test suite , version: main)",
    ]);

    const steps = result.template.steps;
    expect(steps.filter((step) => step.kind === "guarded")).toEqual([
      { kind: "guarded", appName: "app2", steps: [{ run: "cleanup" }] },
    ]);
    expect(steps[steps.length - 1]).toEqual({ kind: "guarded", appName: "app2", steps: [{ run: "cleanup" }] });
    expect(doc.jobs["test-example"].steps).toHaveLength(5);
  });

  it("records descriptor fields with absolute paths", () => {
    const result = new PipelineAssembler(config(), versions, logger).assemble();
    expect(result.template.workflowJobs[0]).toEqual({
      "test-example": {
        "example-app-path": path.join(root, "examples", "app1"),
        "example-app-name": "app1",
        "test-suite-path": path.join(root, "test", "smoke"),
        "test-suite-name": "smoke",
        "bb-version": "v1.0.0",
        name: "app1 (smoke test suite , version: v1.0.0)",
      },
    });
  });

  it("keeps apps without an entrypoint out of the matrix", () => {
    write("examples/broken/README.md", "# no entrypoint");
    const result = new PipelineAssembler(config(), versions, logger).assemble();

    expect(result.jobCount).toBe(4);
    expect(result.yaml).not.toContain("example-app-name: broken");
    const warning = `---\nApp: ${path.join(root, "examples", "broken")}\nwill not be executed.\ntest_entrypoint.sh is missing.\n---\n`;
    expect(lines.filter((line) => line === warning)).toHaveLength(2);
  });

  it("produces identical output on repeated runs", () => {
    const first = new PipelineAssembler(config(), versions, logger).assemble();
    const second = new PipelineAssembler(config(), versions, logger).assemble();
    expect(second.yaml).toBe(first.yaml);
  });

  it("prints and writes the generated config", async () => {
    const assembler = new PipelineAssembler(config(), versions, logger);
    const result = assembler.assemble();
    const out: string[] = [];
    await assembler.emit(result, { write: (text: string) => out.push(text) });

    expect(out).toEqual([result.yaml]);
    expect(fs.readFileSync(path.join(root, "templates", "generated.yml"), "utf-8")).toBe(result.yaml);
  });

  it("only prints on a dry run", async () => {
    const assembler = new PipelineAssembler(config(true), versions, logger);
    const out: string[] = [];
    await assembler.emit(assembler.assemble(), { write: (text: string) => out.push(text) });

    expect(out).toHaveLength(1);
    expect(fs.existsSync(path.join(root, "templates", "generated.yml"))).toBe(false);
  });

  it("fails on a missing base template", () => {
    fs.rmSync(path.join(root, "templates", "base-generated-config.yaml"));
    expect(() => new PipelineAssembler(config(), versions, logger).assemble()).toThrow("ENOENT");
  });

  it("fails on a malformed base template", () => {
    write("templates/base-generated-config.yaml", "jobs: [\n");
    expect(() => new PipelineAssembler(config(), versions, logger).assemble()).toThrow("Template error: Failed to parse");
  });
});

describe("discoverApplications", () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "discover-"));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("lists directories sorted by name and ignores files", () => {
    fs.mkdirSync(path.join(root, "zeta"));
    fs.mkdirSync(path.join(root, "alpha"));
    fs.writeFileSync(path.join(root, "notes.txt"), "");
    expect(discoverApplications(root)).toEqual([
      { path: path.join(root, "alpha"), name: "alpha" },
      { path: path.join(root, "zeta"), name: "zeta" },
    ]);
  });

  it("fails when the examples root is missing", () => {
    expect(() => discoverApplications(path.join(root, "missing"))).toThrow("ENOENT");
  });
});
