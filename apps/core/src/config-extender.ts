/**
 * Merges per-application `circle_config.yml` steps into the shared test job.
 *
 * `before` steps land right after the checkout step, `after` steps at the end,
 * each wrapped in a `when` guard on the application's name. Applications are
 * folded in discovery order, so a later app's `before` block sits nearer the
 * checkout step than an earlier one's, and `after` blocks keep discovery order.
 */
import { CHECKOUT_STEP, TemplateKey } from "./constants.js";
import { hasOverride, loadOverride } from "./harness.js";
import type { Logger } from "./logger.js";
import { msg } from "./messages.js";
import type {
  Application,
  OverrideDocument,
  PipelineStep,
  PipelineTemplate,
  StepSpec,
} from "./pipeline-types.js";
import { withSteps } from "./template.js";
import { isYamlMap } from "./yaml-value.js";

export interface OverrideReader {
  hasOverride(appDir: string): boolean;
  loadOverride(appDir: string): OverrideDocument | null;
}

const fsOverrideReader: OverrideReader = { hasOverride, loadOverride };

function isCheckoutStep(step: PipelineStep): boolean {
  if (step.kind !== "plain") return false;
  const { spec } = step;
  return spec === CHECKOUT_STEP || (isYamlMap(spec) && CHECKOUT_STEP in spec);
}

/** Index right after the first checkout step. Throws if the shared job never checks out. */
export function beforeInsertIndex(steps: readonly PipelineStep[]): number {
  const index = steps.findIndex(isCheckoutStep);
  if (index === -1) {
    throw new Error(
      `Template error: "jobs.${TemplateKey.SHARED_JOB}.steps" has no "${CHECKOUT_STEP}" step to insert custom steps after`,
    );
  }
  return index + 1;
}

function guarded(steps: readonly StepSpec[], appName: string): PipelineStep {
  return { kind: "guarded", appName, steps };
}

/** Return a new template with the override's guarded steps spliced into the shared job. */
export function mergeCustomSteps(
  template: PipelineTemplate,
  override: OverrideDocument,
  appName: string,
): PipelineTemplate {
  let steps = template.steps;

  if (override.before.length > 0) {
    const at = beforeInsertIndex(steps);
    steps = [...steps.slice(0, at), guarded(override.before, appName), ...steps.slice(at)];
  }

  if (override.after.length > 0) {
    steps = [...steps, guarded(override.after, appName)];
  }

  return steps === template.steps ? template : withSteps(template, steps);
}

export function extendConfig(
  template: PipelineTemplate,
  applications: readonly Application[],
  logger: Logger,
  reader: OverrideReader = fsOverrideReader,
): PipelineTemplate {
  return applications.reduce((acc, app) => {
    if (!reader.hasOverride(app.path)) {
      logger.info(msg.noOverride(app.path));
      return acc;
    }

    const override = reader.loadOverride(app.path);
    if (!override) {
      logger.debug(msg.emptyOverride(app.name));
      return acc;
    }

    if (override.before.length > 0) logger.debug(msg.mergedBefore(app.name, override.before.length));
    if (override.after.length > 0) logger.debug(msg.mergedAfter(app.name, override.after.length));
    return mergeCustomSteps(acc, override, app.name);
  }, template);
}
