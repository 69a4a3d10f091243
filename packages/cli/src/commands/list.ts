/**
 * relaygen list command - print discovered handlers
 */

import { formatTypeReference } from "@relaygen/frontend";
import { generateRegistrations } from "../pipeline.js";
import type { ResolvedConfig, Result } from "../types.js";
import { reportDiagnostics, reportRejected } from "./report.js";

/**
 * One line per accepted record, in registration order
 */
export const listCommand = (
  config: ResolvedConfig
): Result<readonly string[], string> => {
  const result = generateRegistrations(config);
  if (!result.ok) {
    reportDiagnostics(result.error.diagnostics, config);
    return { ok: false, error: "Handler discovery failed" };
  }

  const { discovery } = result.value;
  reportDiagnostics(discovery.diagnostics.diagnostics, config);

  const lines = discovery.records.map(
    (record) =>
      `${record.handlerName}: ${formatTypeReference(record.inputType)} -> ${formatTypeReference(record.outputType)}`
  );
  for (const line of lines) {
    console.log(line);
  }

  reportRejected(discovery, config);
  if (!config.quiet) {
    console.log(`${discovery.records.length} handler(s) discovered`);
  }

  return { ok: true, value: lines };
};
