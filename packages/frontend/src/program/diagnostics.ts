/**
 * Source locations and tsconfig diagnostic conversion
 */

import * as ts from "typescript";
import {
  type Diagnostic,
  type SourceLocation,
  createDiagnostic,
} from "../types/diagnostic.js";

export const getSourceLocation = (
  file: ts.SourceFile,
  start: number,
  length: number
): SourceLocation => {
  const position = file.getLineAndCharacterOfPosition(start);
  return {
    file: file.fileName,
    line: position.line + 1,
    column: position.character + 1,
    length,
  };
};

/**
 * Location of a node, excluding leading trivia
 */
export const getNodeLocation = (node: ts.Node): SourceLocation =>
  getSourceLocation(node.getSourceFile(), node.getStart(), node.getWidth());

/**
 * Turn the errors TypeScript reported for a tsconfig.json into
 * `tsconfig-invalid` diagnostics. Warnings and suggestions are dropped.
 */
export const convertConfigDiagnostics = (
  tsDiagnostics: readonly ts.Diagnostic[]
): readonly Diagnostic[] =>
  tsDiagnostics
    .filter((d) => d.category === ts.DiagnosticCategory.Error)
    .map((d) =>
      createDiagnostic(
        "tsconfig-invalid",
        "error",
        ts.flattenDiagnosticMessageText(d.messageText, "\n"),
        d.file && d.start !== undefined
          ? getSourceLocation(d.file, d.start, d.length ?? 1)
          : undefined
      )
    );
