/**
 * Handler discovery pipeline
 */

export { isCandidate } from "./candidate-filter.js";
export {
  type Rejection,
  findRejection,
  resolveEligibleType,
} from "./eligibility.js";
export { matchContract } from "./matcher.js";
export {
  type AcceptResult,
  type HandlerValidator,
  CONTRACT_ARITY,
  createHandlerValidator,
} from "./validator.js";
export { compareOrdinal, sortHandlerRecords } from "./sorter.js";
export { type DiscoveryOptions, discoverHandlers } from "./discover.js";
export type { DiscoveryResult, HandlerRecord, RejectedType } from "./types.js";
