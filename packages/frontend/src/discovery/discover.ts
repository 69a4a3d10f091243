/**
 * Handler discovery - filter, resolve, match, validate and sort
 */

import type { TypeCatalog, TypeIdentity } from "../catalog/types.js";
import { formatIdentity } from "../catalog/type-reference.js";
import {
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
} from "../types/diagnostic.js";
import { isCandidate } from "./candidate-filter.js";
import { resolveEligibleType } from "./eligibility.js";
import { matchContract } from "./matcher.js";
import { createHandlerValidator } from "./validator.js";
import { sortHandlerRecords } from "./sorter.js";
import type { DiscoveryResult, HandlerRecord, RejectedType } from "./types.js";

export type DiscoveryOptions = {
  readonly contract: TypeIdentity;
  /** Aborting throws out of the run; nothing partial is returned */
  readonly signal?: AbortSignal;
};

/**
 * Run discovery over a catalog snapshot
 */
export const discoverHandlers = (
  catalog: TypeCatalog,
  options: DiscoveryOptions
): DiscoveryResult => {
  const { signal } = options;
  signal?.throwIfAborted();

  const contract = catalog.lookupContract(options.contract);
  if (!contract) {
    return {
      records: [],
      rejected: [],
      diagnostics: createDiagnosticsCollector([
        createDiagnostic(
          "missing-target-contract",
          "warning",
          `The ${options.contract.name} contract could not be found (looked for '${formatIdentity(options.contract)}').`,
          undefined,
          `Ensure '${options.contract.module || options.contract.name}' is referenced by the program`
        ),
      ]),
    };
  }

  const validator = createHandlerValidator(contract);
  const records: HandlerRecord[] = [];
  const rejected: RejectedType[] = [];
  let diagnostics = createDiagnosticsCollector();

  for (const entry of catalog.entries) {
    signal?.throwIfAborted();

    if (!isCandidate(entry)) {
      continue;
    }

    const eligible = resolveEligibleType(entry);
    if (!eligible.ok) {
      rejected.push({ name: entry.name, reason: eligible.error });
      continue;
    }

    for (const instantiation of matchContract(eligible.value, contract)) {
      const result = validator.accept(eligible.value, instantiation);
      if (result.diagnostic) {
        diagnostics = addDiagnostic(diagnostics, result.diagnostic);
      }
      if (result.record) {
        records.push(result.record);
      }
    }
  }

  signal?.throwIfAborted();

  return {
    records: sortHandlerRecords(records),
    rejected,
    diagnostics,
  };
};
