/**
 * JSON-shaped values carried by intel reports.
 *
 * Plugins return a bag of these instead of per-plugin result types, so any
 * payload that survives JSON.stringify can flow through the collector.
 */

export type IntelScalar = string | number | boolean | null;

export type IntelValue = IntelScalar | IntelValue[] | { [key: string]: IntelValue };

export type IntelData = { [key: string]: IntelValue };

/**
 * Narrow an unknown value to a plain JSON object (not an array, not null).
 */
export function isIntelObject(value: unknown): value is IntelData {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep check that a value is JSON-shaped. Used on values read back from storage.
 */
export function isIntelValue(value: unknown): value is IntelValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isIntelValue);
      return Object.values(value).every(isIntelValue);
    default:
      return false;
  }
}

/**
 * Own, enumerable write that also works for keys such as `__proto__`,
 * which plain assignment would route to the prototype setter.
 */
export function setEntry<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}
