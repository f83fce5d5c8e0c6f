/**
 * reactive-saga/testing
 *
 * Given/when/then harness for sagas.
 * Feeds action results to a saga, records each reaction and checks the
 * produced actions against expectations.
 */

import { isDeepStrictEqual } from "node:util";
import type { Saga } from "./saga";

// =============================================================================
// Types
// =============================================================================

/**
 * One recorded reaction.
 */
export interface SagaInvocation<AR, A> {
  /** Invocation order (0-indexed) */
  order: number;
  actionResult: AR;
  /** Actions produced, absent if the reaction threw */
  actions?: A[];
  /** Thrown value, if the reaction failed */
  error?: unknown;
}

/**
 * Assertion result.
 */
export interface AssertionResult {
  passed: boolean;
  message: string;
  expected?: unknown;
  actual?: unknown;
}

/**
 * Saga test harness interface.
 */
export interface SagaHarness<AR, A> {
  /**
   * Feed an action result to the saga and record the reaction.
   * Errors thrown by the saga are recorded and rethrown.
   */
  whenActionResult(actionResult: AR): A[];

  /**
   * Assert that the latest reaction produced exactly these actions, in order.
   */
  thenActions(expected: readonly A[]): AssertionResult;

  /**
   * Assert that the latest reaction produced no actions.
   */
  thenNoActions(): AssertionResult;

  /**
   * Get recorded invocations.
   */
  getInvocations(): SagaInvocation<AR, A>[];

  /**
   * Clear all state for a new test.
   */
  reset(): void;
}

// =============================================================================
// Test Harness
// =============================================================================

/**
 * Create a test harness for a saga.
 *
 * @example
 * ```typescript
 * const harness = createSagaHarness(shipmentSaga);
 *
 * harness.whenActionResult(orderCreated);
 * expect(harness.thenActions([createShipment]).passed).toBe(true);
 * ```
 */
export function createSagaHarness<AR, A>(saga: Saga<AR, A>): SagaHarness<AR, A> {
  let invocations: SagaInvocation<AR, A>[] = [];

  function latest(): SagaInvocation<AR, A> | undefined {
    return invocations[invocations.length - 1];
  }

  function compare(expected: readonly A[]): AssertionResult {
    const last = latest();
    if (!last) {
      return { passed: false, message: "Saga has not reacted yet", expected };
    }
    if (!last.actions) {
      return {
        passed: false,
        message: "Saga reaction threw",
        expected,
        actual: last.error,
      };
    }
    const passed = isDeepStrictEqual(last.actions, [...expected]);
    return {
      passed,
      message: passed
        ? `Saga produced ${expected.length} expected action(s)`
        : `Actions differ: expected ${expected.length}, got ${last.actions.length}`,
      expected,
      actual: last.actions,
    };
  }

  return {
    whenActionResult(actionResult) {
      const order = invocations.length;
      try {
        const actions = saga.computeNewActions(actionResult);
        invocations.push({ order, actionResult, actions: [...actions] });
        return actions;
      } catch (error) {
        invocations.push({ order, actionResult, error });
        throw error;
      }
    },

    thenActions(expected) {
      return compare(expected);
    },

    thenNoActions() {
      return compare([]);
    },

    getInvocations() {
      return [...invocations];
    },

    reset() {
      invocations = [];
    },
  };
}

// =============================================================================
// Test Utilities
// =============================================================================

/**
 * Create a deterministic clock for testing.
 */
export function createTestClock(startTime = 0): {
  now: () => number;
  advance: (ms: number) => void;
  reset: () => void;
} {
  let currentTime = startTime;

  return {
    now: () => currentTime,
    advance: (ms: number) => {
      currentTime += ms;
    },
    reset: () => {
      currentTime = startTime;
    },
  };
}

/**
 * Create a deterministic id generator: `${prefix}-1`, `${prefix}-2`, ...
 */
export function createSequentialIds(prefix = "reaction"): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
}
