/**
 * reactive-saga
 *
 * Pure reactive orchestration: a Saga turns an action result (an event, a
 * remote-call outcome) into the actions that should follow (commands), and
 * combinators compose sagas without running them.
 *
 * ## Overview
 *
 * - `createSaga(react)` wraps a pure reaction function
 * - `mapAction` / `mapActionResult` adapt output and input types
 * - `combine` runs two unrelated sagas under one `Sum` input type
 * - `merge` lets two sagas react to the same action result
 *
 * Delivering the produced actions is left to the caller: the saga only
 * decides.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createSaga, first } from 'reactive-saga';
 *
 * const shipment = createSaga((event: OrderEvent) =>
 *   event._tag === "OrderCreated"
 *     ? [{ _tag: "CreateShipment", orderId: event.orderId }]
 *     : []
 * );
 * const notify = createSaga((event: OrderEvent) => [
 *   { _tag: "NotifyCustomer", orderId: event.orderId },
 * ]);
 *
 * const commands = shipment.merge(notify).computeNewActions(orderCreated);
 * // [second(createShipment), first(notifyCustomer)]
 * ```
 */

// =============================================================================
// Saga
// =============================================================================

export {
  // Types
  type ReactFunction,
  type ActionComputation,
  type Saga,

  // Functions
  createSaga,
  emptySaga,
  computeNewActions,
  tryComputeNewActions,
} from "./saga";

// =============================================================================
// Sum
// =============================================================================

export {
  type First,
  type Second,
  type Sum,
  type SumHandlers,
  first,
  second,
  isFirst,
  isSecond,
  matchSum,
  mapFirst,
  mapSecond,
  swap,
} from "./sum";

// =============================================================================
// Handlers
// =============================================================================

export { type Tagged, type SagaHandlers, fromHandlers, ignore } from "./handlers";

// =============================================================================
// Result & Errors
// =============================================================================

export { type Result, ok, err, from } from "./core";

export {
  type TaggedErrorBase,
  type SagaError,
  SagaReactionError,
  UnhandledActionResultError,
  isSagaError,
} from "./errors";

// =============================================================================
// Observability
// =============================================================================

export {
  type SagaEvent,
  type SagaEventType,
  type ObserveSagaOptions,
  type SagaLoggerConfig,
  type SagaLogger,
  observeSaga,
  createSagaLogger,
} from "./events";
