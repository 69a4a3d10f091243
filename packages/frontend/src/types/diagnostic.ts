/**
 * Diagnostics reported while loading catalogs and discovering handlers
 */

import * as path from "node:path";

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Discovery (reported by the pipeline)
  | "missing-target-contract" // Contract interface not declared anywhere in the catalog
  | "arity-mismatch" // Contract implemented with a type-argument count other than 2
  | "duplicate-handler" // Same (input, output) signature handled more than once
  // JSON catalog loading
  | "catalog-not-found"
  | "catalog-read-failed"
  | "catalog-invalid-json"
  | "catalog-invalid-structure" // Top-level shape or 'interfaces' entries
  | "catalog-invalid-type" // A 'types' entry or one of its nested values
  // TypeScript program creation
  | "source-root-not-found"
  | "tsconfig-invalid";

/** 1-based line and column */
export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly length: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string
): Diagnostic => ({ code, severity, message, location, hint });

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

const formatLocation = (
  { file, line, column }: SourceLocation,
  relativeTo: string | undefined
): string => {
  const shown =
    relativeTo !== undefined && path.isAbsolute(file)
      ? path.relative(relativeTo, file).split(path.sep).join("/")
      : file;
  return `${shown}:${line}:${column}`;
};

/**
 * `file:line:col severity code: message Hint: hint`
 *
 * Absolute locations are shown relative to `relativeTo` when it is given.
 */
export const formatDiagnostic = (
  diagnostic: Diagnostic,
  relativeTo?: string
): string =>
  [
    diagnostic.location && formatLocation(diagnostic.location, relativeTo),
    `${diagnostic.severity} ${diagnostic.code}:`,
    diagnostic.message,
    diagnostic.hint && `Hint: ${diagnostic.hint}`,
  ]
    .filter((part): part is string => typeof part === "string" && part !== "")
    .join(" ");

/**
 * Immutable, ordered diagnostic list
 */
export type DiagnosticsCollector = {
  readonly diagnostics: readonly Diagnostic[];
  readonly hasErrors: boolean;
};

export const createDiagnosticsCollector = (
  diagnostics: readonly Diagnostic[] = []
): DiagnosticsCollector => ({
  diagnostics,
  hasErrors: diagnostics.some(isError),
});

export const addDiagnostic = (
  collector: DiagnosticsCollector,
  diagnostic: Diagnostic
): DiagnosticsCollector =>
  createDiagnosticsCollector([...collector.diagnostics, diagnostic]);
