/**
 * relaygen frontend - type catalogs and handler discovery
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  type DiagnosticsCollector,
  createDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";

export type * from "./catalog/types.js";
export * from "./catalog/type-reference.js";
export {
  CATALOG_VERSION,
  loadCatalogFile,
  parseCatalog,
} from "./catalog/json/loader.js";
export { createProgramCatalog } from "./catalog/program/program-catalog.js";

export type { ProgramOptions, HandlerProgram } from "./program/types.js";
export { createHandlerProgram } from "./program/creation.js";

export * from "./discovery/index.js";
