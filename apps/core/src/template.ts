import * as fs from "node:fs";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { MATRIX_PARAMETER_REF, TemplateKey } from "./constants.js";
import type { PipelineStep, PipelineTemplate, StepSpec, YamlMap, YamlValue } from "./pipeline-types.js";
import { isYamlMap, toYamlValue } from "./yaml-value.js";

function fail(message: string): never {
  throw new Error(`Template error: ${message}`);
}

function requireMap(parent: YamlMap, key: string, context: string): YamlMap {
  const value = parent[key];
  if (!isYamlMap(value)) fail(`"${context}.${key}" must be a mapping`);
  return value;
}

/**
 * Validate the base template. It must define `workflows.test_everything.jobs`
 * and a non-empty `jobs.test-example.steps`; everything else passes through.
 */
export function parseTemplate(raw: unknown): PipelineTemplate {
  const document = toYamlValue(raw);
  if (!isYamlMap(document)) fail("Base template must be a YAML mapping");

  const workflow = requireMap(requireMap(document, "workflows", "$"), TemplateKey.WORKFLOW, "workflows");
  const workflowJobs = workflow.jobs;
  if (!Array.isArray(workflowJobs)) fail(`"workflows.${TemplateKey.WORKFLOW}.jobs" must be a list`);

  const job = requireMap(requireMap(document, "jobs", "$"), TemplateKey.SHARED_JOB, "jobs");
  const steps = job.steps;
  if (!Array.isArray(steps) || steps.length === 0) {
    fail(`"jobs.${TemplateKey.SHARED_JOB}.steps" must be a non-empty list`);
  }

  return {
    document,
    workflowJobs,
    steps: steps.map((spec): PipelineStep => ({ kind: "plain", spec })),
  };
}

/** Read and validate the base template. A missing file or malformed YAML is fatal. */
export function loadTemplate(file: string): PipelineTemplate {
  const content = fs.readFileSync(file, "utf-8");
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    fail(`Failed to parse ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseTemplate(parsed);
}

export function withWorkflowJobs(template: PipelineTemplate, jobs: readonly YamlValue[]): PipelineTemplate {
  return { ...template, workflowJobs: jobs };
}

export function withSteps(template: PipelineTemplate, steps: readonly PipelineStep[]): PipelineTemplate {
  return { ...template, steps };
}

/** Guard custom steps so they only run for the matching example app. */
export function wrapWithCondition(steps: readonly StepSpec[], appName: string): YamlMap {
  return {
    when: {
      condition: {
        equal: [MATRIX_PARAMETER_REF, appName],
      },
      steps: [...steps],
    },
  };
}

export function renderStep(step: PipelineStep): StepSpec {
  switch (step.kind) {
    case "plain":
      return step.spec;
    case "guarded":
      return wrapWithCondition(step.steps, step.appName);
  }
}

/** Plain YAML document with the workflow jobs and shared steps written back in. */
export function renderTemplate(template: PipelineTemplate): YamlMap {
  const { document } = template;
  const workflows = requireMap(document, "workflows", "$");
  const jobs = requireMap(document, "jobs", "$");
  const workflow = requireMap(workflows, TemplateKey.WORKFLOW, "workflows");
  const job = requireMap(jobs, TemplateKey.SHARED_JOB, "jobs");

  return {
    ...document,
    workflows: {
      ...workflows,
      [TemplateKey.WORKFLOW]: { ...workflow, jobs: [...template.workflowJobs] },
    },
    jobs: {
      ...jobs,
      [TemplateKey.SHARED_JOB]: { ...job, steps: template.steps.map(renderStep) },
    },
  };
}

/** Block-style YAML with sorted keys, so identical inputs give identical bytes. */
export function serializeTemplate(template: PipelineTemplate): string {
  return stringifyYaml(renderTemplate(template), { sortMapEntries: true, lineWidth: 0, aliasDuplicateObjects: false });
}
