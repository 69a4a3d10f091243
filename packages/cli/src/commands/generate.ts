/**
 * relaygen generate command - write the registration module
 */

import { existsSync, mkdirSync, rmSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { generateRegistrations } from "../pipeline.js";
import type { ResolvedConfig, Result } from "../types.js";
import { reportDiagnostics, reportRejected } from "./report.js";

export type GenerateSummary = {
  readonly handlerCount: number;
  /** Whether the output file exists after the command */
  readonly written: boolean;
};

/**
 * Generate the registration module. With nothing discovered, a module left
 * by an earlier run is deleted.
 */
export const generateCommand = (
  config: ResolvedConfig
): Result<GenerateSummary, string> => {
  const result = generateRegistrations(config);
  if (!result.ok) {
    reportDiagnostics(result.error.diagnostics, config);
    return { ok: false, error: "Handler discovery failed" };
  }

  const { unit, discovery } = result.value;
  reportDiagnostics(discovery.diagnostics.diagnostics, config);
  reportRejected(discovery, config);

  if (!unit) {
    if (existsSync(config.outputPath)) {
      rmSync(config.outputPath);
      if (!config.quiet) {
        console.log(`No handlers discovered; removed ${config.outputFile}`);
      }
    } else if (!config.quiet) {
      console.log("No handlers discovered");
    }
    return { ok: true, value: { handlerCount: 0, written: false } };
  }

  try {
    mkdirSync(dirname(config.outputPath), { recursive: true });
    writeFileSync(config.outputPath, unit.text, "utf-8");
  } catch (error) {
    return {
      ok: false,
      error: `Failed to write ${config.outputFile}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  if (!config.quiet) {
    console.log(
      `✓ Generated ${unit.fileName} (${unit.handlerCount} handler(s))`
    );
  }

  return {
    ok: true,
    value: { handlerCount: unit.handlerCount, written: true },
  };
};
