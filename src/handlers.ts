/**
 * reactive-saga/handlers
 *
 * Builds a saga from one handler per action-result tag.
 * The handler record must name every tag of the union, so adding a new event
 * variant is a compile error until the saga decides how to react to it.
 *
 * @example
 * ```typescript
 * type OrderEvent =
 *   | { _tag: "OrderCreated"; orderId: number; customerName: string; items: string[] }
 *   | { _tag: "OrderUpdated"; orderId: number; updatedItems: string[] }
 *   | { _tag: "OrderCancelled"; orderId: number };
 *
 * const shipmentSaga = fromHandlers<OrderEvent, ShipmentCommand>({
 *   OrderCreated: (e) => [{ _tag: "CreateShipment", orderId: e.orderId, ... }],
 *   OrderUpdated: ignore,
 *   OrderCancelled: ignore,
 * });
 * ```
 */

import { UnhandledActionResultError } from "./errors";
import { createSaga, type Saga } from "./saga";

// =============================================================================
// Types
// =============================================================================

/**
 * Any object with a _tag discriminator.
 */
export type Tagged<Tag extends string = string> = { readonly _tag: Tag };

/**
 * One reaction function per tag, each receiving its narrowed union member.
 */
export type SagaHandlers<AR extends Tagged, A> = {
  readonly [K in AR["_tag"]]: (actionResult: Extract<AR, { _tag: K }>) => readonly A[];
};

// =============================================================================
// Builders
// =============================================================================

/**
 * Handler for action results that need no reaction.
 */
export const ignore = (): readonly never[] => [];

/**
 * Creates a saga that dispatches on `_tag`.
 * Throws {@link UnhandledActionResultError} if a value arrives with a tag the
 * record does not cover, which can only happen when the input escaped its type.
 */
export function fromHandlers<AR extends Tagged, A>(
  handlers: SagaHandlers<AR, A>
): Saga<AR, A> {
  return createSaga((actionResult: AR) => {
    const tag: AR["_tag"] = actionResult._tag;
    if (!Object.hasOwn(handlers, tag)) {
      throw new UnhandledActionResultError(tag);
    }
    const handler = handlers[tag] as (value: AR) => readonly A[];
    return handler(actionResult);
  });
}
