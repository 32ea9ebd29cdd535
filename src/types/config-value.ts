/**
 * Raw configuration document values.
 * A parsed JSON or YAML file is a tree of mappings, sequences and scalars.
 */

export type ConfigScalar = string | number | boolean | null;

export type ConfigValue = ConfigScalar | ConfigValue[] | ConfigMapping;

export interface ConfigMapping {
  [key: string]: ConfigValue;
}

export function isConfigMapping(value: unknown): value is ConfigMapping {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

export function isConfigScalar(value: unknown): value is ConfigScalar {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

/**
 * Convert a parser result into a ConfigValue tree.
 *
 * Dates become ISO strings, undefined becomes null. Anything else that is
 * not plain data (functions, symbols, class instances from custom YAML tags)
 * is reported through `onInvalid` and replaced by null.
 */
export function toConfigValue(
  raw: unknown,
  onInvalid: (path: string, value: unknown) => void = () => undefined,
  path = "(root)"
): ConfigValue {
  if (raw === undefined) {
    return null;
  }
  if (isConfigScalar(raw)) {
    return raw;
  }
  if (raw instanceof Date) {
    return raw.toISOString();
  }
  const child = (key: string | number): string => (path === "(root)" ? String(key) : `${path}.${key}`);
  if (Array.isArray(raw)) {
    return raw.map((item, index) => toConfigValue(item, onInvalid, child(index)));
  }
  if (typeof raw === "object" && Object.getPrototypeOf(raw) === Object.prototype) {
    const mapping: ConfigMapping = {};
    for (const [key, value] of Object.entries(raw)) {
      mapping[key] = toConfigValue(value, onInvalid, child(key));
    }
    return mapping;
  }
  onInvalid(path, raw);
  return null;
}
