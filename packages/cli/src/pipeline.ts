/**
 * Generation pipeline - catalog, discovery, emission
 */

import {
  type DiagnosticsCollector,
  type DiscoveryResult,
  type TypeCatalog,
  createDiagnosticsCollector,
  createHandlerProgram,
  createProgramCatalog,
  discoverHandlers,
  loadCatalogFile,
  map,
  mapError,
} from "@relaygen/frontend";
import { type GeneratedUnit, emitRegistrationUnit } from "@relaygen/emitter";
import type { ResolvedConfig, Result } from "./types.js";

export type GenerationResult = {
  /** Absent when no handler was accepted */
  readonly unit: GeneratedUnit | undefined;
  readonly discovery: DiscoveryResult;
};

const loadCatalog = (
  config: ResolvedConfig
): Result<TypeCatalog, DiagnosticsCollector> => {
  if (config.catalogPath !== undefined) {
    return mapError(loadCatalogFile(config.catalogPath), (diagnostics) =>
      createDiagnosticsCollector(diagnostics)
    );
  }

  const programResult = createHandlerProgram({
    projectRoot: config.projectRoot,
    sourceRoot: config.sourceRoot,
    tsconfig: config.tsconfig,
    // The previous output must not register itself
    exclude: [config.outputPath],
    verbose: config.verbose,
  });
  return map(programResult, createProgramCatalog);
};

/**
 * Discover handlers and emit the registration module.
 *
 * Catalog and configuration failures come back as error diagnostics;
 * discovery warnings travel with the result. Aborting `signal` throws.
 */
export const generateRegistrations = (
  config: ResolvedConfig,
  signal?: AbortSignal
): Result<GenerationResult, DiagnosticsCollector> => {
  const catalog = loadCatalog(config);
  if (!catalog.ok) {
    return catalog;
  }

  const discovery = discoverHandlers(catalog.value, {
    contract: config.contract,
    signal,
  });

  const unit = emitRegistrationUnit(discovery.records, {
    outputFile: config.outputFile,
    contract: config.contract,
    runtimeModule: config.runtimeModule,
    importExtension: config.importExtension,
    includeTimestamp: config.includeTimestamp,
  });

  return { ok: true, value: { unit, discovery } };
};
