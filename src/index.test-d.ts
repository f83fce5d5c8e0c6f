/**
 * Type tests for reactive-saga
 * Checked by `npm run typecheck`: `toEqualTypeOf` fails compilation on any
 * type that is not exactly the expected one.
 */
/* eslint-disable @typescript-eslint/no-unused-vars */
import { expectTypeOf } from "vitest";
import {
  createSaga,
  fromHandlers,
  ignore,
  first,
  second,
  isFirst,
  matchSum,
  tryComputeNewActions,
  type Saga,
  type Sum,
  type First,
  type Result,
  type SagaReactionError,
} from "./index";

// =============================================================================
// TEST HELPERS
// =============================================================================

type Event = { _tag: "Created"; id: string } | { _tag: "Deleted"; id: string };
type Command = { _tag: "Archive"; id: string };

declare const saga: Saga<Event, Command>;
declare const counter: Saga<number, string>;
declare const anyEvent: Event;
declare const sumValue: Sum<number, string>;

// =============================================================================
// TEST 1: createSaga infers both type parameters
// =============================================================================

function _test1() {
  const s = createSaga((n: number) => [`${n}`]);
  expectTypeOf(s).toEqualTypeOf<Saga<number, string>>();
  expectTypeOf(s.computeNewActions(1)).toEqualTypeOf<string[]>();
  expectTypeOf(s).not.toEqualTypeOf<Saga<number, unknown>>();
}

// =============================================================================
// TEST 2: mapAction / mapActionResult change one side only
// =============================================================================

function _test2() {
  expectTypeOf(saga.mapAction((c) => c.id)).toEqualTypeOf<Saga<Event, string>>();
  expectTypeOf(
    saga.mapActionResult((input: { event: Event }) => input.event)
  ).toEqualTypeOf<Saga<{ event: Event }, Command>>();
}

// =============================================================================
// TEST 3: combine and merge tag provenance with Sum
// =============================================================================

function _test3() {
  expectTypeOf(saga.combine(counter)).toEqualTypeOf<
    Saga<Sum<Event, number>, Sum<string, Command>>
  >();

  const merged = saga.merge(createSaga((e: Event) => [e.id.length]));
  expectTypeOf(merged).toEqualTypeOf<Saga<Event, Sum<number, Command>>>();

  const [action] = merged.computeNewActions(anyEvent);
  const label = matchSum(action, {
    First: (n) => n.toFixed(0),
    Second: (c) => c._tag,
  });
  expectTypeOf(label).toEqualTypeOf<string>();
}

// =============================================================================
// TEST 4: Sum constructors and guards
// =============================================================================

function _test4() {
  expectTypeOf(first<number, string>(1)).toEqualTypeOf<Sum<number, string>>();
  expectTypeOf(second("a")).toEqualTypeOf<Sum<never, string>>();

  if (isFirst(sumValue)) {
    expectTypeOf(sumValue).toEqualTypeOf<First<number>>();
  }
}

// =============================================================================
// TEST 5: fromHandlers requires every tag
// =============================================================================

function _test5() {
  const complete = fromHandlers<Event, Command>({
    Created: (e) => [{ _tag: "Archive", id: e.id }],
    Deleted: ignore,
  });
  expectTypeOf(complete).toEqualTypeOf<Saga<Event, Command>>();

  fromHandlers<Event, Command>(
    // @ts-expect-error - missing handler for "Deleted"
    { Created: ignore }
  );
}

// =============================================================================
// TEST 6: tryComputeNewActions carries the action result type into the error
// =============================================================================

function _test6() {
  const result = tryComputeNewActions(saga, anyEvent);
  expectTypeOf(result).toEqualTypeOf<Result<Command[], SagaReactionError<Event>>>();
}
