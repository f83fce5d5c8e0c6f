/**
 * reactive-saga/saga
 *
 * A Saga decides what to do next (`A`, the action) from something that just
 * happened (`AR`, the action result). It is a pure reaction function plus
 * combinators that build new sagas from existing ones.
 *
 * It is common to treat events as action results and commands as actions, but
 * any pair of types works: an action result can equally be the response of a
 * remote call.
 *
 * @example
 * ```typescript
 * import { createSaga } from 'reactive-saga';
 *
 * const shipmentSaga = createSaga<OrderEvent, ShipmentCommand>((event) => {
 *   switch (event._tag) {
 *     case "OrderCreated":
 *       return [{
 *         _tag: "CreateShipment",
 *         shipmentId: event.orderId,
 *         orderId: event.orderId,
 *         customerName: event.customerName,
 *         items: event.items,
 *       }];
 *     case "OrderUpdated":
 *     case "OrderCancelled":
 *       return [];
 *   }
 * });
 *
 * const commands = shipmentSaga.computeNewActions(orderCreated);
 * ```
 */

import { from, type Result } from "./core";
import { SagaReactionError } from "./errors";
import { first, second, type Sum } from "./sum";

// =============================================================================
// Types
// =============================================================================

/**
 * Maps one action result to an ordered, finite list of actions.
 * Must be pure: no hidden mutable state, no I/O, same input gives same output.
 */
export type ReactFunction<AR, A> = (actionResult: AR) => readonly A[];

/**
 * The action computation contract: handle an action result, produce new actions.
 */
export interface ActionComputation<AR, A> {
  computeNewActions(event: AR): A[];
}

/**
 * A reactive decision unit.
 *
 * Every combinator returns a new saga and leaves the receiver untouched.
 * Treat the receiver as consumed once it has been passed through a combinator;
 * keep using the returned saga instead.
 *
 * None of the combinators invoke `react`. Errors thrown by a reaction function
 * propagate through every combinator and through `computeNewActions` unchanged.
 */
export interface Saga<AR, A> extends ActionComputation<AR, A> {
  /** Drives the next actions from an action result. */
  readonly react: ReactFunction<AR, A>;

  /**
   * Runs the saga and returns the actions as a fresh array, in order.
   */
  computeNewActions(event: AR): A[];

  /**
   * Maps the saga over its action type, one output per action, order kept.
   */
  mapAction<A2>(fn: (action: A) => A2): Saga<AR, A2>;

  /**
   * Maps the saga over its action-result type by adapting the input first.
   */
  mapActionResult<AR2>(fn: (actionResult: AR2) => AR): Saga<AR2, A>;

  /**
   * Runs two unrelated sagas side by side under one input union.
   * `First(ar)` goes to this saga and its actions come back as `Second`;
   * `Second(ar2)` goes to `other` and its actions come back as `First`.
   */
  combine<AR2, A2>(other: Saga<AR2, A2>): Saga<Sum<AR, AR2>, Sum<A2, A>>;

  /**
   * Lets two sagas react to the same action result.
   * This saga's actions come first, tagged `Second`, followed by `other`'s
   * actions, tagged `First`.
   */
  merge<A2>(other: Saga<AR, A2>): Saga<AR, Sum<A2, A>>;
}

// =============================================================================
// Implementation
// =============================================================================

/**
 * Wraps a reaction function in a Saga. No validation is performed.
 *
 * @example
 * ```typescript
 * const notify = createSaga((event: OrderEvent) => [
 *   { _tag: "NotifyCustomer", orderId: event.orderId },
 * ]);
 * ```
 */
export function createSaga<AR, A>(react: ReactFunction<AR, A>): Saga<AR, A> {
  const saga: Saga<AR, A> = {
    react,

    computeNewActions(event: AR): A[] {
      return [...react(event)];
    },

    mapAction<A2>(fn: (action: A) => A2) {
      return createSaga((actionResult: AR) => react(actionResult).map((action) => fn(action)));
    },

    mapActionResult<AR2>(fn: (actionResult: AR2) => AR) {
      return createSaga((actionResult: AR2) => react(fn(actionResult)));
    },

    combine<AR2, A2>(other: Saga<AR2, A2>) {
      return createSaga((input: Sum<AR, AR2>): Sum<A2, A>[] => {
        switch (input._tag) {
          case "First":
            return react(input.value).map((action) => second<A, A2>(action));
          case "Second":
            return other.react(input.value).map((action) => first<A2, A>(action));
        }
      });
    },

    merge<A2>(other: Saga<AR, A2>) {
      return createSaga((actionResult: AR): Sum<A2, A>[] => [
        ...react(actionResult).map((action) => second<A, A2>(action)),
        ...other.react(actionResult).map((action) => first<A2, A>(action)),
      ]);
    },
  };

  return Object.freeze(saga);
}

/**
 * A saga that never reacts.
 */
export function emptySaga<AR, A>(): Saga<AR, A> {
  return createSaga<AR, A>(() => []);
}

/**
 * Free-function form of {@link ActionComputation.computeNewActions}.
 */
export function computeNewActions<AR, A>(
  computation: ActionComputation<AR, A>,
  event: AR
): A[] {
  return computation.computeNewActions(event);
}

/**
 * Runs the saga and returns a throw from the reaction function as an error
 * Result instead of rethrowing it. For drivers that route failures as values.
 *
 * @example
 * ```typescript
 * const result = tryComputeNewActions(saga, event);
 * if (result.ok) {
 *   await dispatch(result.value);
 * } else {
 *   logger.error({ err: result.error.cause }, "saga failed");
 * }
 * ```
 */
export function tryComputeNewActions<AR, A>(
  computation: ActionComputation<AR, A>,
  event: AR
): Result<A[], SagaReactionError<AR>> {
  return from(
    () => computation.computeNewActions(event),
    (cause) => new SagaReactionError(event, { cause })
  );
}
