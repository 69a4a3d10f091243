/**
 * Emitter types
 */

import type { TypeIdentity } from "@relaygen/frontend";

/**
 * Extension written on relative import specifiers of project modules.
 * ".js" maps each source extension to its output extension
 * (.ts and .tsx to .js, .mts to .mjs, .cts to .cjs); ".ts" keeps the
 * source extension; "" drops it.
 */
export type ImportExtension = ".js" | ".ts" | "";

export type EmitterOptions = {
  /** Output path relative to the project root, forward slashes */
  readonly outputFile: string;
  /** Contract whose instantiations name the service keys */
  readonly contract: TypeIdentity;
  /** Module exporting `serviceKey` and `ServiceCollection` */
  readonly runtimeModule: string;
  readonly importExtension: ImportExtension;
  /** Adds an informational "Generated at" header line */
  readonly includeTimestamp: boolean;
  /** Fixed ISO timestamp for the informational line (defaults to now) */
  readonly timestamp?: string;
  readonly generatorVersion: string;
};

/**
 * The emitted registration module
 */
export type GeneratedUnit = {
  readonly name: string;
  readonly fileName: string;
  readonly text: string;
  readonly handlerCount: number;
};
