/**
 * Type definitions for CLI
 */

import type { TypeIdentity } from "@relaygen/frontend";
import type { ImportExtension } from "@relaygen/emitter";

export type { Result } from "@relaygen/frontend";

/**
 * relaygen configuration file (relaygen.json)
 */
export type RelaygenConfig = {
  readonly $schema?: string;
  readonly sourceRoot?: string;
  readonly tsconfig?: string;
  readonly outputFile?: string;
  readonly contract?: TypeIdentity;
  readonly runtimeModule?: string;
  readonly importExtension?: ImportExtension;
  readonly includeTimestamp?: boolean;
  /** JSON catalog used instead of the TypeScript program */
  readonly catalog?: string;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  src?: string;
  out?: string;
  catalog?: string;
  tsconfig?: string;
  timestamp?: boolean;
};

/**
 * Configuration after defaults and CLI overrides are applied
 */
export type ResolvedConfig = {
  /** Absolute; module identities and relative settings start here */
  readonly projectRoot: string;
  readonly sourceRoot: string;
  readonly tsconfig: string | undefined;
  /** Relative to the project root, forward slashes */
  readonly outputFile: string;
  readonly outputPath: string;
  readonly contract: TypeIdentity;
  readonly runtimeModule: string;
  readonly importExtension: ImportExtension;
  readonly includeTimestamp: boolean;
  /** Absolute path of a JSON catalog, when one replaces the program */
  readonly catalogPath: string | undefined;
  readonly verbose: boolean;
  readonly quiet: boolean;
};
