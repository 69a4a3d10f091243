/**
 * relaygen check command - verify the registration module is current
 */

import { existsSync, readFileSync } from "node:fs";
import { stripInformationalLines } from "@relaygen/emitter";
import { generateRegistrations } from "../pipeline.js";
import type { ResolvedConfig, Result } from "../types.js";
import { reportDiagnostics } from "./report.js";

export type CheckOutcome = "up-to-date" | "stale" | "missing" | "unexpected";

/**
 * Compare the module on disk with freshly generated output, ignoring
 * informational header lines
 */
export const checkCommand = (
  config: ResolvedConfig
): Result<CheckOutcome, string> => {
  const result = generateRegistrations(config);
  if (!result.ok) {
    reportDiagnostics(result.error.diagnostics, config);
    return { ok: false, error: "Handler discovery failed" };
  }

  const { unit, discovery } = result.value;
  reportDiagnostics(discovery.diagnostics.diagnostics, config);

  const onDisk = existsSync(config.outputPath)
    ? readFileSync(config.outputPath, "utf-8")
    : undefined;

  const outcome: CheckOutcome =
    unit === undefined
      ? onDisk === undefined
        ? "up-to-date"
        : "unexpected"
      : onDisk === undefined
        ? "missing"
        : stripInformationalLines(onDisk) === stripInformationalLines(unit.text)
          ? "up-to-date"
          : "stale";

  switch (outcome) {
    case "up-to-date":
      if (!config.quiet) {
        console.log(`✓ ${config.outputFile} is up to date`);
      }
      break;
    case "stale":
      console.error(`${config.outputFile} is out of date; run 'relaygen generate'`);
      break;
    case "missing":
      console.error(`${config.outputFile} has not been generated; run 'relaygen generate'`);
      break;
    case "unexpected":
      console.error(
        `${config.outputFile} exists but no handlers were discovered`
      );
      break;
  }

  return { ok: true, value: outcome };
};
