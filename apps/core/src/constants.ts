/** Marker file whose presence makes an application or test suite runnable. */
export const ENTRYPOINT_FILE = "test_entrypoint.sh";

/** Optional per-application CircleCI extension. */
export const OVERRIDE_FILE = "circle_config.yml";

/** Keys in the base template that the generator rewrites. */
export const TemplateKey = {
  WORKFLOW: "test_everything",
  SHARED_JOB: "test-example",
} as const;

/** Pipeline parameter the guarded custom steps compare against. */
export const MATRIX_PARAMETER_REF = "<< parameters.example-app-name >>";

/** Step name that custom `before` steps are inserted after. */
export const CHECKOUT_STEP = "checkout";

/** Release tags: vMAJOR.MINOR.PATCH without leading zeros, or the literal `latest`. */
export const VERSION_TAG_PATTERN = /^(?:v(?:0|[1-9]\d*)\.(?:0|[1-9]\d*)\.(?:0|[1-9]\d*)|latest)$/;

export const SuiteStrategy = {
  SNAPSHOT: "snapshot",
  CHECKOUT: "checkout",
} as const;

export type SuiteStrategy = (typeof SuiteStrategy)[keyof typeof SuiteStrategy];
