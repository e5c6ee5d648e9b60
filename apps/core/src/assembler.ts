/**
 * PipelineAssembler — loads the base template, installs the generated test
 * matrix and folds in every application's custom steps.
 * Collaborator errors are not caught; they abort the run.
 */
import * as fs from "node:fs";
import * as fsp from "node:fs/promises";
import * as path from "node:path";
import type { MatrixConfig } from "./config.js";
import { extendConfig, type OverrideReader } from "./config-extender.js";
import { hasOverride, isValid, loadOverride } from "./harness.js";
import type { LogSink, Logger } from "./logger.js";
import { applicationFromPath, buildMatrix } from "./matrix-builder.js";
import { msg } from "./messages.js";
import type { Application, PipelineTemplate } from "./pipeline-types.js";
import { loadTemplate, serializeTemplate, withWorkflowJobs } from "./template.js";
import type { VersionSource } from "./version-source.js";

export interface AssembledPipeline {
  readonly template: PipelineTemplate;
  readonly yaml: string;
  readonly jobCount: number;
}

/** Directories under the examples root, sorted by name. */
export function discoverApplications(examplesDir: string): Application[] {
  return fs
    .readdirSync(examplesDir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort()
    .map((name) => applicationFromPath(path.join(examplesDir, name)));
}

type AssemblerConfig = Pick<MatrixConfig, "examplesDir" | "testSuitesDir" | "templateFile" | "outputFile" | "dryRun">;

export class PipelineAssembler {
  constructor(
    private readonly config: AssemblerConfig,
    private readonly versions: VersionSource,
    private readonly logger: Logger,
    private readonly overrides: OverrideReader = { hasOverride, loadOverride },
  ) {}

  assemble(): AssembledPipeline {
    const base = loadTemplate(this.config.templateFile);
    this.logger.debug(msg.templateLoaded(this.config.templateFile));

    const applications = discoverApplications(this.config.examplesDir);
    this.logger.debug(msg.applicationsFound(applications.map((app) => app.name)));

    const versions = this.versions.listVersions();
    this.logger.debug(msg.versionsFound(versions));

    const jobs = buildMatrix(applications, versions, {
      versions: this.versions,
      testSuitesDir: this.config.testSuitesDir,
      isValidApp: isValid,
      logger: this.logger,
    });
    this.logger.info(msg.matrixBuilt(jobs.length));

    const template = extendConfig(withWorkflowJobs(base, jobs), applications, this.logger, this.overrides);
    return { template, yaml: serializeTemplate(template), jobCount: jobs.length };
  }

  /** Print the generated config and persist it unless this is a dry run. */
  async emit(result: AssembledPipeline, stdout: LogSink = process.stdout): Promise<void> {
    stdout.write(result.yaml);
    if (this.config.dryRun) {
      this.logger.info(msg.dryRun);
      return;
    }
    await fsp.mkdir(path.dirname(this.config.outputFile), { recursive: true });
    await fsp.writeFile(this.config.outputFile, result.yaml);
    this.logger.info(msg.configWritten(this.config.outputFile));
  }
}
