/**
 * reactive-saga/events
 *
 * Observability for sagas through an event stream. `observeSaga` wraps a saga
 * so each reaction emits start/success/error events; `createSagaLogger`
 * forwards that stream to a pino logger.
 *
 * @example
 * ```typescript
 * import pino from 'pino';
 * import { observeSaga, createSagaLogger } from 'reactive-saga';
 *
 * const log = createSagaLogger(pino());
 * const saga = observeSaga(shipmentSaga, {
 *   name: 'shipment',
 *   onEvent: log.handleEvent,
 * });
 * ```
 */

import { randomUUID } from "node:crypto";
import type { Level, Logger } from "pino";
import { createSaga, type Saga } from "./saga";

// =============================================================================
// Types
// =============================================================================

/**
 * Saga event types for observability.
 */
export type SagaEvent =
  | { type: "saga_react_start"; sagaName: string; reactionId: string; ts: number }
  | {
      type: "saga_react_success";
      sagaName: string;
      reactionId: string;
      ts: number;
      durationMs: number;
      actionCount: number;
    }
  | {
      type: "saga_react_error";
      sagaName: string;
      reactionId: string;
      ts: number;
      durationMs: number;
      error: unknown;
    };

export type SagaEventType = SagaEvent["type"];

/**
 * Options for observeSaga.
 */
export interface ObserveSagaOptions {
  /**
   * Name reported on every event.
   * @default "saga"
   */
  name?: string;

  /**
   * Event stream for reaction lifecycle events.
   */
  onEvent?: (event: SagaEvent) => void;

  /**
   * Monotonic clock used for durations.
   * @default performance.now
   */
  clock?: () => number;

  /**
   * Wall clock used for `ts`.
   * @default Date.now
   */
  now?: () => number;

  /**
   * Generates the id that correlates the events of one reaction.
   * @default crypto.randomUUID
   */
  idGenerator?: () => string;
}

/**
 * Configuration for the pino adapter.
 */
export interface SagaLoggerConfig {
  /**
   * Log level per event type.
   * @default { saga_react_start: "debug", saga_react_success: "info", saga_react_error: "error" }
   */
  levels?: Partial<Record<SagaEventType, Level>>;
}

export interface SagaLogger {
  /**
   * Handle saga events (pass to the onEvent option).
   */
  handleEvent: (event: SagaEvent) => void;
}

const DEFAULT_LEVELS: Record<SagaEventType, Level> = {
  saga_react_start: "debug",
  saga_react_success: "info",
  saga_react_error: "error",
};

// =============================================================================
// Implementation
// =============================================================================

/**
 * Wraps a saga so that every reaction reports to `onEvent`.
 * The actions returned and any error thrown are passed through unchanged.
 * A listener that throws on the error event does not replace the reaction's
 * error; the reaction's error is what reaches the caller.
 */
export function observeSaga<AR, A>(
  saga: Saga<AR, A>,
  options: ObserveSagaOptions = {}
): Saga<AR, A> {
  const {
    name = "saga",
    onEvent,
    clock = () => performance.now(),
    now = Date.now,
    idGenerator = randomUUID,
  } = options;

  return createSaga((actionResult: AR) => {
    const reactionId = idGenerator();
    const startTime = clock();

    onEvent?.({ type: "saga_react_start", sagaName: name, reactionId, ts: now() });

    let actions: readonly A[];
    try {
      actions = saga.react(actionResult);
    } catch (error) {
      try {
        onEvent?.({
          type: "saga_react_error",
          sagaName: name,
          reactionId,
          ts: now(),
          durationMs: clock() - startTime,
          error,
        });
      } finally {
        // The reaction's error is rethrown even if the listener throws.
        // eslint-disable-next-line no-unsafe-finally
        throw error;
      }
    }

    onEvent?.({
      type: "saga_react_success",
      sagaName: name,
      reactionId,
      ts: now(),
      durationMs: clock() - startTime,
      actionCount: actions.length,
    });

    return actions;
  });
}

/**
 * Creates an adapter that writes saga events to a pino logger.
 */
export function createSagaLogger(
  logger: Logger,
  config: SagaLoggerConfig = {}
): SagaLogger {
  return {
    handleEvent(event) {
      const level = config.levels?.[event.type] ?? DEFAULT_LEVELS[event.type];
      const base = { sagaName: event.sagaName, reactionId: event.reactionId };

      switch (event.type) {
        case "saga_react_start":
          logger[level](base, "saga reaction started");
          break;
        case "saga_react_success":
          logger[level](
            { ...base, durationMs: event.durationMs, actionCount: event.actionCount },
            "saga reaction completed"
          );
          break;
        case "saga_react_error":
          logger[level](
            { ...base, durationMs: event.durationMs, err: event.error },
            "saga reaction failed"
          );
          break;
      }
    },
  };
}
