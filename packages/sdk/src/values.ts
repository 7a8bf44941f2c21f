/**
 * Value helpers shared by the transformer and backends
 */

/**
 * True for values that are never written into a document.
 *
 * Zero, `false` and empty strings count as empty alongside null, undefined
 * and empty collections, so a record field holding one of them leaves the
 * document key unset rather than writing it.
 */
export function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined || value === false || value === "") {
    return true;
  }
  if (typeof value === "number") {
    return value === 0 || Number.isNaN(value);
  }
  if (typeof value === "bigint") {
    return value === 0n;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  if (value instanceof Map || value instanceof Set) {
    return value.size === 0;
  }
  if (typeof value === "object" && Object.getPrototypeOf(value) === Object.prototype) {
    return Object.keys(value).length === 0;
  }
  return false;
}

/**
 * Normalize a value for storage: Dates become ISO-8601 strings, Sets become
 * arrays, nested arrays are normalized element-wise
 */
export function toStoredValue(value: unknown): unknown {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Set) {
    return Array.from(value, toStoredValue);
  }
  if (Array.isArray(value)) {
    return value.map(toStoredValue);
  }
  return value;
}
