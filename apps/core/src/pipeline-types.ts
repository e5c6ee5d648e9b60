/**
 * Types for the generated CircleCI document.
 * The base template is loosely typed YAML; only the parts the generator
 * rewrites (workflow job list, shared job steps) get a dedicated shape.
 */

export type YamlScalar = string | number | boolean | null;

export type YamlValue = YamlScalar | YamlValue[] | YamlMap;

export interface YamlMap {
  [key: string]: YamlValue;
}

/** A single CircleCI step as written in YAML, e.g. `checkout` or `{ run: "make" }`. */
export type StepSpec = YamlValue;

/** A step taken over verbatim from the base template or an override document. */
export interface PlainStep {
  readonly kind: "plain";
  readonly spec: StepSpec;
}

/** Steps that only run when the matrix parameter equals `appName`. */
export interface GuardedStep {
  readonly kind: "guarded";
  readonly appName: string;
  readonly steps: readonly StepSpec[];
}

export type PipelineStep = PlainStep | GuardedStep;

/** Contents of an application's `circle_config.yml`. */
export interface OverrideDocument {
  readonly before: readonly StepSpec[];
  readonly after: readonly StepSpec[];
}

/** A directory holding software under test. */
export interface Application {
  /** Absolute path. */
  readonly path: string;
  /** Base name of `path`. */
  readonly name: string;
}

/** One generated job instance, keyed as the pipeline parameters expect. */
export type JobDescriptor = {
  readonly "example-app-path": string;
  readonly "example-app-name": string;
  readonly "test-suite-path": string;
  readonly "test-suite-name": string;
  readonly "bb-version": string;
  readonly name: string;
};

export type WorkflowJobEntry = {
  readonly "test-example": JobDescriptor;
};

/**
 * Parsed base template. Never mutated; every update produces a new value.
 * `document` keeps the untouched remainder of the YAML.
 */
export interface PipelineTemplate {
  readonly document: YamlMap;
  readonly workflowJobs: readonly YamlValue[];
  readonly steps: readonly PipelineStep[];
}
