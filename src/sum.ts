/**
 * reactive-saga/sum
 *
 * A closed, two-variant disjoint union. `combine` and `merge` use it to put two
 * unrelated domains under one type, with the tag recording provenance.
 *
 * @example
 * ```typescript
 * const input: Sum<OrderEvent, PaymentEvent> = first(orderCreated);
 *
 * const label = matchSum(input, {
 *   First: (order) => `order ${order.orderId}`,
 *   Second: (payment) => `payment ${payment.paymentId}`,
 * });
 * ```
 */

// =============================================================================
// Types
// =============================================================================

export interface First<L> {
  readonly _tag: "First";
  readonly value: L;
}

export interface Second<R> {
  readonly _tag: "Second";
  readonly value: R;
}

/**
 * Exactly one of two payloads. The tag is fixed at construction.
 */
export type Sum<L, R> = First<L> | Second<R>;

/**
 * One handler per variant, used by {@link matchSum}.
 */
export interface SumHandlers<L, R, Out> {
  First: (value: L) => Out;
  Second: (value: R) => Out;
}

// =============================================================================
// Constructors
// =============================================================================

export const first = <L, R = never>(value: L): Sum<L, R> =>
  Object.freeze<First<L>>({ _tag: "First", value });

export const second = <R, L = never>(value: R): Sum<L, R> =>
  Object.freeze<Second<R>>({ _tag: "Second", value });

// =============================================================================
// Discrimination
// =============================================================================

export const isFirst = <L, R>(sum: Sum<L, R>): sum is First<L> =>
  sum._tag === "First";

export const isSecond = <L, R>(sum: Sum<L, R>): sum is Second<R> =>
  sum._tag === "Second";

/**
 * Folds a Sum by running the handler for whichever variant is present.
 * Both handlers are required, so a missing case is a compile error.
 */
export function matchSum<L, R, Out>(
  sum: Sum<L, R>,
  handlers: SumHandlers<L, R, Out>
): Out {
  switch (sum._tag) {
    case "First":
      return handlers.First(sum.value);
    case "Second":
      return handlers.Second(sum.value);
  }
}

// =============================================================================
// Helpers
// =============================================================================

export const mapFirst = <L, R, L2>(sum: Sum<L, R>, fn: (value: L) => L2): Sum<L2, R> =>
  sum._tag === "First" ? first(fn(sum.value)) : sum;

export const mapSecond = <L, R, R2>(sum: Sum<L, R>, fn: (value: R) => R2): Sum<L, R2> =>
  sum._tag === "Second" ? second(fn(sum.value)) : sum;

/**
 * Exchanges the variants: `First(x)` becomes `Second(x)` and vice versa.
 */
export const swap = <L, R>(sum: Sum<L, R>): Sum<R, L> =>
  sum._tag === "First" ? second(sum.value) : first(sum.value);
