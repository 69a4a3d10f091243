/**
 * Program type definitions
 */

import * as ts from "typescript";

export type ProgramOptions = {
  /** Absolute directory that module identities are relative to */
  readonly projectRoot: string;
  /** Directory scanned for sources when no tsconfig is given */
  readonly sourceRoot: string;
  /** tsconfig.json whose file list and compiler options replace the scan */
  readonly tsconfig?: string;
  /** Absolute paths left out of the program (the generated output file) */
  readonly exclude?: readonly string[];
  readonly verbose?: boolean;
};

export type HandlerProgram = {
  readonly program: ts.Program;
  readonly checker: ts.TypeChecker;
  readonly options: ProgramOptions;
  /** Project source files, sorted by path */
  readonly sourceFiles: readonly ts.SourceFile[];
};
