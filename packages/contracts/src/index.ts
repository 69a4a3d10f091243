/**
 * relaygen contracts - request handler contract and registration sink
 */

export type { Request, RequestHandler } from "./request.js";
export type {
  ServiceKey,
  ServiceConstructor,
  ServiceCollection,
} from "./service-collection.js";
export {
  REQUEST_HANDLER_CONTRACT,
  serviceKey,
  requestHandlerKey,
} from "./service-collection.js";
