/**
 * Candidate filter - syntactic pre-filter ahead of semantic resolution
 */

import type { CatalogEntry } from "../catalog/types.js";

/**
 * A type is a candidate when it declares at least one base type or interface
 */
export const isCandidate = (entry: CatalogEntry): boolean =>
  entry.baseList.length > 0;
