/** Centralized log messages. Edit this file to change any user-facing output. */
export const msg = {
  // --- Lifecycle ---
  starting: (root: string) => `🚀 Generating test matrix for ${root}`,
  configLoaded: (strategy: string, branch: string, verbose: boolean) =>
    `⚙️  Config: strategy=${strategy}, branch=${branch}, verbose=${verbose}`,
  templateLoaded: (source: string) => `📋 Base template: ${source}`,
  applicationsFound: (names: readonly string[]) => `📦 Applications: ${names.join(", ") || "(none)"}`,
  versionsFound: (versions: readonly string[]) => `🏷️  Versions: ${versions.join(", ")}`,
  matrixBuilt: (count: number) => `🧮 Generated ${count} test job(s)`,
  configWritten: (file: string) => `💾 Written to ${file}`,
  dryRun: "⏭️  Dry run: generated config not written.",

  // --- Skipped entities ---
  invalidApplication: (app: string, marker: string) =>
    `---\nApp: ${app}\nwill not be executed.\n${marker} is missing.\n---`,
  invalidSuite: (suite: string, marker: string) =>
    `---\nTest Suite: ${suite}\nwill not be executed.\n${marker} is missing.\n---`,
  noOverride: (app: string) => `Software under ${app} doesn't provide custom CircleCI steps.`,
  emptyOverride: (app: string) => `  Custom CircleCI steps for ${app} are empty, nothing to merge.`,

  // --- Versions ---
  suiteListingFailed: (version: string) => `Failed to checkout or list test suites for version: ${version}`,
  checkingOut: (version: string) => `  git checkout ${version}`,
  suitesAt: (version: string, suites: readonly string[]) => `  Suites at ${version}: ${suites.join(", ") || "(none)"}`,

  // --- Merge ---
  mergedBefore: (app: string, count: number) => `  ➕ ${app}: ${count} step(s) before the test job`,
  mergedAfter: (app: string, count: number) => `  ➕ ${app}: ${count} step(s) after the test job`,

  // --- Errors ---
  fatal: "❌ Pipeline generation failed",
} as const;
