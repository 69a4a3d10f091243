/**
 * Discovery result types
 */

import type { TypeDescriptor, TypeReference } from "../catalog/types.js";
import type { DiagnosticsCollector } from "../types/diagnostic.js";
import type { Rejection } from "./eligibility.js";

export type HandlerRecord = {
  readonly handler: TypeDescriptor;
  /** Fully-qualified handler name, the primary sort key */
  readonly handlerName: string;
  readonly inputType: TypeReference;
  readonly outputType: TypeReference;
  readonly signature: string;
};

export type RejectedType = {
  readonly name: string;
  readonly reason: Rejection;
};

export type DiscoveryResult = {
  /** Accepted records in emission order */
  readonly records: readonly HandlerRecord[];
  readonly rejected: readonly RejectedType[];
  readonly diagnostics: DiagnosticsCollector;
};
