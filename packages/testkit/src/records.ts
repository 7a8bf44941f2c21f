/**
 * Record sources for indexing tests
 */

import type { RecordSource } from "@searchmap/sdk";

/**
 * Source that replays a fixed list of records
 */
export function arraySource<R>(records: readonly R[]): RecordSource<R> {
  return { getRecords: () => records };
}

/**
 * Lazy single-pass source producing `count` records from a factory.
 * `pulled` reports how many records have been consumed so far.
 */
export function generatedSource<R>(
  count: number,
  make: (index: number) => R
): RecordSource<R> & { readonly pulled: number } {
  let pulled = 0;

  function* generate(): Generator<R> {
    for (let index = 0; index < count; index++) {
      pulled++;
      yield make(index);
    }
  }

  return {
    getRecords: () => generate(),
    get pulled() {
      return pulled;
    },
  };
}

/**
 * Async source yielding records one at a time
 */
export function asyncSource<R>(records: readonly R[]): RecordSource<R> {
  async function* generate(): AsyncGenerator<R> {
    for (const record of records) {
      yield record;
    }
  }

  return { getRecords: () => generate() };
}
