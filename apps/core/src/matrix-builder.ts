import * as path from "node:path";
import { ENTRYPOINT_FILE } from "./constants.js";
import type { Logger } from "./logger.js";
import { msg } from "./messages.js";
import type { Application, JobDescriptor, WorkflowJobEntry } from "./pipeline-types.js";
import type { VersionSource } from "./version-source.js";

export interface MatrixDeps {
  readonly versions: VersionSource;
  readonly testSuitesDir: string;
  /** Application validity; evaluated per (app, version) pair, never cached. */
  readonly isValidApp: (appDir: string) => boolean;
  readonly logger: Logger;
}

export function applicationFromPath(appPath: string): Application {
  const absolute = path.resolve(appPath);
  return { path: absolute, name: path.basename(absolute) };
}

export function jobName(appName: string, suiteName: string, version: string): string {
  return `${appName} (${suiteName} test suite , version: ${version})`;
}

function describeJob(app: Application, suitePath: string, suiteName: string, version: string): JobDescriptor {
  return {
    "example-app-path": app.path,
    "test-suite-name": suiteName,
    "example-app-name": app.name,
    "test-suite-path": suitePath,
    "bb-version": version,
    name: jobName(app.name, suiteName, version),
  };
}

/** Every (app, version) pair in Cartesian order, app-major. */
function* pairs<A, B>(left: readonly A[], right: readonly B[]): Generator<[A, B]> {
  for (const a of left) {
    for (const b of right) {
      yield [a, b];
    }
  }
}

/**
 * One `test-example` job per valid (application, version, suite) triple,
 * in generation order. Invalid apps and suites are logged and skipped.
 */
export function buildMatrix(
  applications: readonly Application[],
  versions: readonly string[],
  deps: MatrixDeps,
): WorkflowJobEntry[] {
  const jobs: WorkflowJobEntry[] = [];

  for (const [app, version] of pairs(applications, versions)) {
    if (!deps.isValidApp(app.path)) {
      deps.logger.warn(msg.invalidApplication(app.path, ENTRYPOINT_FILE));
      continue;
    }

    for (const suite of deps.versions.listSuitesAt(version)) {
      const suitePath = path.join(deps.testSuitesDir, suite);
      if (!deps.versions.isSuiteValid(version, suitePath)) {
        deps.logger.warn(msg.invalidSuite(suite, ENTRYPOINT_FILE));
        continue;
      }
      jobs.push({ "test-example": describeJob(app, suitePath, path.basename(suitePath), version) });
    }
  }

  return jobs;
}
