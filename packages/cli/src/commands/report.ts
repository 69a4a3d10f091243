/**
 * Console reporting shared by commands
 */

import {
  type Diagnostic,
  type DiscoveryResult,
  formatDiagnostic,
  isDiagnosticError,
} from "@relaygen/frontend";
import type { ResolvedConfig } from "../types.js";

/**
 * Print diagnostics to stderr with project-relative paths; --quiet keeps
 * errors only
 */
export const reportDiagnostics = (
  diagnostics: readonly Diagnostic[],
  config: Pick<ResolvedConfig, "quiet" | "projectRoot">
): void => {
  for (const diagnostic of diagnostics) {
    if (config.quiet && !isDiagnosticError(diagnostic)) {
      continue;
    }
    console.error(formatDiagnostic(diagnostic, config.projectRoot));
  }
};

/**
 * Print why candidates were skipped (--verbose only)
 */
export const reportRejected = (
  discovery: DiscoveryResult,
  config: Pick<ResolvedConfig, "verbose" | "quiet">
): void => {
  if (!config.verbose || config.quiet) {
    return;
  }
  for (const rejected of discovery.rejected) {
    console.log(`  skipped ${rejected.name}: ${rejected.reason}`);
  }
};
