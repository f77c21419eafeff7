/**
 * values.ts - Shapes of loaded configuration data
 */

export type ConfigObject = { [key: string]: unknown };

/**
 * True for `{}` literals and `Object.create(null)` objects, the only
 * objects that are treated as nested configuration sections.
 */
export function isPlainObject(value: unknown): value is ConfigObject {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value !== 'object') return typeof value;
  return value.constructor?.name ?? 'Object';
}

/**
 * Copy of a value in which sections and arrays are new objects. Any other
 * value (a date, URL, byte array or class instance) is the same reference.
 */
export function copyValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(copyValue);
  }
  return isPlainObject(value) ? copySection(value) : value;
}

export function copySection(section: ConfigObject): ConfigObject {
  const copy: ConfigObject = {};
  for (const [key, value] of Object.entries(section)) {
    copy[key] = copyValue(value);
  }
  return copy;
}
