/**
 * Attribute-or-callable path resolution
 *
 * A dotted path is walked one segment at a time. Each segment is resolved by
 * the first resolver that supports the current value:
 * - entry: a key of a `Map`
 * - accessor: a zero-argument method, called with the value as `this`
 * - attribute: a plain (own or inherited) property, getters included
 */

import { inspect } from "node:util";
import { FieldResolutionError } from "./errors.js";

export type SegmentResolverKind = "entry" | "accessor" | "attribute";

export interface SegmentResolver {
  readonly kind: SegmentResolverKind;
  supports(target: object, segment: string): boolean;
  resolve(target: object, segment: string): unknown;
}

const entryResolver: SegmentResolver = {
  kind: "entry",
  supports: (target, segment) => target instanceof Map && target.has(segment),
  resolve: (target, segment) => (target instanceof Map ? target.get(segment) : undefined),
};

const accessorResolver: SegmentResolver = {
  kind: "accessor",
  supports: (target, segment) => segment in target && typeof Reflect.get(target, segment) === "function",
  resolve: (target, segment) => {
    const accessor: unknown = Reflect.get(target, segment);
    return typeof accessor === "function" ? accessor.call(target) : accessor;
  },
};

const attributeResolver: SegmentResolver = {
  kind: "attribute",
  supports: (target, segment) => segment in target,
  resolve: (target, segment) => Reflect.get(target, segment),
};

/** Resolvers in precedence order */
export const SEGMENT_RESOLVERS: readonly SegmentResolver[] = [
  entryResolver,
  accessorResolver,
  attributeResolver,
];

/**
 * Short printable form of a record for error messages
 */
export function describeRecord(record: unknown): string {
  return inspect(record, { depth: 1, breakLength: Infinity, maxArrayLength: 5, maxStringLength: 80 });
}

/**
 * Pick the resolver for one segment of a value
 * @returns The resolver, or undefined when the value has no such segment
 */
export function selectResolver(value: unknown, segment: string): SegmentResolver | undefined {
  // Box primitives so string and number methods resolve too
  const target: object = Object(value);
  return SEGMENT_RESOLVERS.find((resolver) => resolver.supports(target, segment));
}

/**
 * Walk a dotted path from a record
 *
 * @throws FieldResolutionError when an intermediate value is absent, a segment
 * does not exist, or the path ends on null/undefined
 */
export function walkPath(record: unknown, path: string, segments: readonly string[] = path.split(".")): unknown {
  let value: unknown = record;

  for (const segment of segments) {
    if (value === null || value === undefined) {
      throw new FieldResolutionError(describeRecord(record), path, segment);
    }

    const resolver = selectResolver(value, segment);
    if (!resolver) {
      throw new FieldResolutionError(describeRecord(record), path, segment);
    }
    value = resolver.resolve(Object(value), segment);
  }

  if (value === null || value === undefined) {
    throw new FieldResolutionError(describeRecord(record), path, segments[segments.length - 1] ?? path);
  }

  return value;
}

/**
 * Compile a path into a reusable resolver function
 */
export function createPathResolver(path: string): (record: unknown) => unknown {
  const segments = Object.freeze(path.split("."));
  return (record) => walkPath(record, path, segments);
}
