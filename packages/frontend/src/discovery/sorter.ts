/**
 * Deterministic ordering of accepted handler records
 */

import type { HandlerRecord } from "./types.js";

/**
 * Ordinal (UTF-16 code unit) comparison, independent of locale
 */
export const compareOrdinal = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

/**
 * Order records by handler name. A class implementing the contract more
 * than once appears once per signature, in signature order.
 */
export const sortHandlerRecords = (
  records: readonly HandlerRecord[]
): readonly HandlerRecord[] =>
  [...records].sort(
    (a, b) =>
      compareOrdinal(a.handlerName, b.handlerName) ||
      compareOrdinal(a.signature, b.signature)
  );
