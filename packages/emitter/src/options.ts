/**
 * Emitter options and defaults
 */

import { REQUEST_HANDLER_CONTRACT } from "@relaygen/contracts";
import type { EmitterOptions } from "./types.js";
import { DEFAULT_OUTPUT_FILE, GENERATOR_VERSION } from "./constants.js";

/**
 * Default emitter options
 */
export const defaultOptions: EmitterOptions = {
  outputFile: DEFAULT_OUTPUT_FILE,
  contract: REQUEST_HANDLER_CONTRACT,
  runtimeModule: REQUEST_HANDLER_CONTRACT.module,
  importExtension: ".js",
  includeTimestamp: false,
  generatorVersion: GENERATOR_VERSION,
};
