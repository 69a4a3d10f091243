/**
 * TypeScript compiler configuration
 */

import * as ts from "typescript";

/**
 * Compiler options used when the project names no tsconfig.json.
 * Only binding and checking matter; nothing is emitted.
 */
export const defaultTsConfig: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.NodeNext,
  moduleResolution: ts.ModuleResolutionKind.NodeNext,
  strict: true,
  esModuleInterop: true,
  skipLibCheck: true,
  forceConsistentCasingInFileNames: true,
  allowJs: false,
  noEmit: true,
  types: [],
  allowImportingTsExtensions: true,
};
