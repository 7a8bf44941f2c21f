/**
 * Mango query evaluation engine
 *
 * Evaluates the field predicates built by search backends against stored
 * documents. Used by the in-memory backend for delete-by-query and counts.
 */

import type { Filter, IndexDocument } from "./types.js";

/**
 * Get a nested value from an object using dot-path notation
 * @param obj - Object to get value from
 * @param path - Dot-separated path (e.g., "address.city")
 * @returns Value at path, or undefined if not found
 */
export function getPath(obj: unknown, path: string): unknown {
  return path.split(".").reduce<unknown>((o, k) => {
    if (o === null || typeof o !== "object") return undefined;
    return Reflect.get(o, k);
  }, obj);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Order two values of the same kind
 * @returns negative, zero or positive; null when the values are not comparable
 */
function compareOrdered(a: unknown, b: unknown): number | null {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() - b.getTime();
  }
  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  return null;
}

function isEqual(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  return a === b;
}

function typeOf(value: unknown): string {
  if (value === null) return "null";
  return Array.isArray(value) ? "array" : typeof value;
}

/**
 * Evaluate a field-level condition
 * @param val - Actual field value
 * @param cond - Condition to test (operator object or literal value)
 * @returns true if condition matches
 */
function matchField(val: unknown, cond: unknown): boolean {
  // If condition is an operator object
  if (isPlainObject(cond)) {
    for (const [op, rhs] of Object.entries(cond)) {
      switch (op) {
        case "$eq":
          // Array fields match when they contain the value
          if (Array.isArray(val)) {
            if (!val.some((v) => isEqual(v, rhs))) return false;
          } else if (!isEqual(val, rhs)) {
            return false;
          }
          break;
        case "$ne":
          if (isEqual(val, rhs)) return false;
          break;
        case "$in":
          if (!Array.isArray(rhs) || !rhs.some((v) => isEqual(val, v))) return false;
          break;
        case "$nin":
          if (!Array.isArray(rhs) || rhs.some((v) => isEqual(val, v))) return false;
          break;
        case "$gt": {
          const cmp = compareOrdered(val, rhs);
          if (cmp === null || !(cmp > 0)) return false;
          break;
        }
        case "$gte": {
          const cmp = compareOrdered(val, rhs);
          if (cmp === null || !(cmp >= 0)) return false;
          break;
        }
        case "$lt": {
          const cmp = compareOrdered(val, rhs);
          if (cmp === null || !(cmp < 0)) return false;
          break;
        }
        case "$lte": {
          const cmp = compareOrdered(val, rhs);
          if (cmp === null || !(cmp <= 0)) return false;
          break;
        }
        case "$exists": {
          const exists = val !== undefined;
          if (exists !== rhs) return false;
          break;
        }
        case "$type":
          if (typeOf(val) !== rhs) return false;
          break;
        default:
          throw new Error(`Unknown operator: ${op}`);
      }
    }
    return true;
  }

  // Direct equality
  if (Array.isArray(val)) {
    return val.some((v) => isEqual(v, cond));
  }
  return isEqual(val, cond);
}

function asFilters(value: unknown, operator: string): Filter[] {
  if (!Array.isArray(value) || !value.every(isPlainObject)) {
    throw new Error(`${operator} operator requires an array of filters`);
  }
  return value;
}

/**
 * Test if a document matches a Mango filter
 * @param doc - Document to test
 * @param filter - Mango filter object
 * @returns true if document matches filter
 */
export function matches(doc: IndexDocument, filter: Filter): boolean {
  if (Object.keys(filter).length === 0) {
    return true;
  }

  for (const [key, value] of Object.entries(filter)) {
    if (key === "$and") {
      if (!asFilters(value, "$and").every((f) => matches(doc, f))) {
        return false;
      }
      continue;
    }

    if (key === "$or") {
      if (!asFilters(value, "$or").some((f) => matches(doc, f))) {
        return false;
      }
      continue;
    }

    if (key === "$not") {
      if (!isPlainObject(value)) {
        throw new Error("$not operator requires a filter");
      }
      if (matches(doc, value)) {
        return false;
      }
      continue;
    }

    if (!matchField(getPath(doc, key), value)) {
      return false;
    }
  }

  return true;
}
