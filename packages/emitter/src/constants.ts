/**
 * Shared constants for the relaygen emitter
 */

import { createRequire } from "module";

const require = createRequire(import.meta.url);
const packageJson = require("@relaygen/emitter/package.json") as { version: string };

export const GENERATOR_NAME = "relaygen";
export const GENERATOR_VERSION = packageJson.version;

export const UNIT_NAME = "service-registration-extensions";
export const DEFAULT_OUTPUT_FILE = `src/generated/${UNIT_NAME}.ts`;

const INFORMATIONAL_SUFFIX = " (informational)";

/**
 * Generate the header of the registration module
 *
 * @returns Header lines followed by a blank line
 */
export const generateFileHeader = (
  handlerCount: number,
  options: {
    readonly version: string;
    readonly includeTimestamp?: boolean;
    readonly timestamp?: string;
  }
): string => {
  const lines: string[] = [];

  lines.push("// <auto-generated/>");
  lines.push(`// Generated by ${GENERATOR_NAME} v${options.version}`);

  if (options.includeTimestamp ?? false) {
    const timestamp = options.timestamp ?? new Date().toISOString();
    lines.push(`// Generated at: ${timestamp}${INFORMATIONAL_SUFFIX}`);
  }

  lines.push(`// Handlers discovered: ${handlerCount}`);
  lines.push("// WARNING: Do not modify this file manually");
  lines.push("");

  return lines.join("\n");
};

/**
 * Drop header lines that may differ between otherwise identical outputs
 */
export const stripInformationalLines = (text: string): string =>
  text
    .split("\n")
    .filter(
      (line) => !(line.startsWith("//") && line.endsWith(INFORMATIONAL_SUFFIX))
    )
    .join("\n");
