import type { YamlMap, YamlValue } from "./pipeline-types.js";

export function isYamlMap(value: YamlValue | undefined): value is YamlMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPlainObject(raw: object): raw is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(raw);
  return proto === Object.prototype || proto === null;
}

/**
 * Narrow the output of `yaml.parse` to plain YAML data.
 * Throws on anything that cannot round-trip (functions, class instances).
 */
export function toYamlValue(raw: unknown, context = "document"): YamlValue {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === "string" || typeof raw === "number" || typeof raw === "boolean") return raw;
  if (Array.isArray(raw)) {
    return raw.map((item: unknown, i) => toYamlValue(item, `${context}[${i}]`));
  }
  if (typeof raw === "object" && isPlainObject(raw)) {
    const result: YamlMap = {};
    for (const [key, value] of Object.entries(raw)) {
      result[key] = toYamlValue(value, `${context}.${key}`);
    }
    return result;
  }
  throw new Error(`Unsupported YAML value at ${context}`);
}
