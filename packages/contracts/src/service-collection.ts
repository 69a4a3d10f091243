/**
 * Service registration sink used by generated registration modules
 */

import type { RequestHandler } from "./request.js";

/**
 * Name of a service in a container, typed by the service it resolves to.
 */
export type ServiceKey<TService> = {
  readonly name: string;
  readonly __service?: TService;
};

/**
 * Any class whose instances satisfy `TService`, whatever its constructor takes.
 */
export type ServiceConstructor<TService> = new (...args: never[]) => TService;

/**
 * Minimal registration surface of a dependency-injection container.
 *
 * Adapters for a concrete container implement this; generated code only
 * ever calls `registerScoped`.
 */
export interface ServiceCollection {
  registerScoped<TService>(
    key: ServiceKey<TService>,
    implementation: ServiceConstructor<TService>
  ): this;
}

/**
 * Module and export name of the built-in handler contract
 */
export const REQUEST_HANDLER_CONTRACT = {
  module: "@relaygen/contracts",
  name: "RequestHandler",
} as const;

/**
 * Create a typed service key
 */
export const serviceKey = <TService>(name: string): ServiceKey<TService> => ({
  name,
});

/**
 * Key under which generated code registers the handler for `input` -> `output`.
 *
 * Both arguments are fully-qualified type names as relaygen prints them, e.g.
 * `requestHandlerKey("./src/requests.ts#Ping", "string")`.
 */
export const requestHandlerKey = <TInput, TOutput>(
  input: string,
  output: string
): ServiceKey<RequestHandler<TInput, TOutput>> =>
  serviceKey(
    `${REQUEST_HANDLER_CONTRACT.module}#${REQUEST_HANDLER_CONTRACT.name}<${input}, ${output}>`
  );
