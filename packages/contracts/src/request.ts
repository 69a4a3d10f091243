/**
 * Request/response contract implemented by discoverable handlers
 */

/**
 * Marker for a request object whose handler produces `TOutput`.
 *
 * The phantom member only carries the output type; request classes never set it.
 */
export interface Request<TOutput> {
  readonly __output?: TOutput;
}

/**
 * Handles an input of type `TInput`, producing `TOutput`.
 *
 * Every exported, concrete class implementing this interface (directly or
 * through a base class or derived interface) is picked up by `relaygen generate`.
 */
export interface RequestHandler<TInput, TOutput> {
  handle(input: TInput, signal?: AbortSignal): Promise<TOutput>;
}
