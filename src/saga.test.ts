import { describe, it, expect, vi } from "vitest";
import {
  createSaga,
  emptySaga,
  computeNewActions,
  tryComputeNewActions,
  type ActionComputation,
} from "./saga";
import { first, second } from "./sum";
import { SagaReactionError } from "./errors";

// Fan-out saga: n -> [n, n + 1, ..., n + n - 1]
const countUp = createSaga((n: number) => Array.from({ length: n }, (_, i) => n + i));

// Splits words; empty string yields no actions
const words = createSaga((text: string) => text.split(" ").filter((w) => w.length > 0));

const inputs = [0, 1, 3, 5];

describe("Saga", () => {
  describe("computeNewActions", () => {
    it("returns the reaction in order", () => {
      expect(countUp.computeNewActions(3)).toEqual([3, 4, 5]);
      expect(countUp.computeNewActions(0)).toEqual([]);
    });

    it("returns a fresh array each time", () => {
      const fixed: readonly string[] = ["a", "b"];
      const saga = createSaga(() => fixed);

      const actions = saga.computeNewActions(undefined);
      actions.push("c");

      expect(saga.computeNewActions(undefined)).toEqual(["a", "b"]);
    });

    it("is available as a free function over any ActionComputation", () => {
      const computation: ActionComputation<number, string> = {
        computeNewActions: (n) => [`got ${n}`],
      };

      expect(computeNewActions(computation, 7)).toEqual(["got 7"]);
      expect(computeNewActions(countUp, 2)).toEqual([2, 3]);
    });

    it("propagates errors thrown by the reaction function unchanged", () => {
      const boom = new Error("boom");
      const saga = createSaga((_: number): string[] => {
        throw boom;
      });

      expect(() => saga.computeNewActions(1)).toThrow(boom);
      expect(() => saga.mapAction((s) => s.length).computeNewActions(1)).toThrow(boom);
      expect(() => saga.merge(countUp).computeNewActions(1)).toThrow(boom);
    });
  });

  describe("combinators", () => {
    it("do not invoke the reaction function until computed", () => {
      const react = vi.fn((n: number) => [n]);
      const saga = createSaga(react);

      const composed = saga
        .mapAction((n) => n * 2)
        .mapActionResult((s: string) => s.length)
        .merge(createSaga((s: string) => [s]));

      expect(react).not.toHaveBeenCalled();

      expect(composed.computeNewActions("abc")).toEqual([second(6), first("abc")]);
      expect(react).toHaveBeenCalledTimes(1);
      expect(react).toHaveBeenCalledWith(3);
    });

    it("leave the original saga usable and unchanged", () => {
      const mapped = countUp.mapAction(String);

      expect(mapped.computeNewActions(2)).toEqual(["2", "3"]);
      expect(countUp.computeNewActions(2)).toEqual([2, 3]);
    });
  });

  describe("mapAction", () => {
    it("maps each action one-to-one, preserving order", () => {
      const saga = countUp.mapAction((n) => `#${n}`);

      expect(saga.computeNewActions(3)).toEqual(["#3", "#4", "#5"]);
    });

    it("satisfies the identity law", () => {
      const identity = countUp.mapAction((n) => n);

      for (const n of inputs) {
        expect(identity.computeNewActions(n)).toEqual(countUp.computeNewActions(n));
      }
    });

    it("satisfies the composition law", () => {
      const f = (n: number) => n * 3;
      const g = (n: number) => `value:${n}`;

      const twice = countUp.mapAction(f).mapAction(g);
      const once = countUp.mapAction((n) => g(f(n)));

      for (const n of inputs) {
        expect(twice.computeNewActions(n)).toEqual(once.computeNewActions(n));
      }
    });
  });

  describe("mapActionResult", () => {
    it("adapts the input before delegating", () => {
      const adapter = (text: string) => text.length;
      const saga = countUp.mapActionResult(adapter);

      for (const text of ["", "a", "abcd"]) {
        expect(saga.computeNewActions(text)).toEqual(
          countUp.computeNewActions(adapter(text))
        );
      }
      expect(saga.computeNewActions("ab")).toEqual([2, 3]);
    });
  });

  describe("combine", () => {
    const combined = countUp.combine(words);

    it("routes First to this saga and tags its actions Second", () => {
      expect(combined.computeNewActions(first(2))).toEqual([second(2), second(3)]);
    });

    it("routes Second to the other saga and tags its actions First", () => {
      expect(combined.computeNewActions(second("hello big world"))).toEqual([
        first("hello"),
        first("big"),
        first("world"),
      ]);
    });

    it("only runs the saga selected by the tag", () => {
      const left = vi.fn((n: number) => [n]);
      const right = vi.fn((s: string) => [s]);
      const saga = createSaga(left).combine(createSaga(right));

      saga.computeNewActions(first(1));
      expect(left).toHaveBeenCalledTimes(1);
      expect(right).not.toHaveBeenCalled();

      saga.computeNewActions(second("x"));
      expect(left).toHaveBeenCalledTimes(1);
      expect(right).toHaveBeenCalledTimes(1);
    });

    it("matches each saga's own output for every input", () => {
      for (const n of inputs) {
        expect(combined.computeNewActions(first(n))).toEqual(
          countUp.computeNewActions(n).map((a) => second(a))
        );
      }
      for (const text of ["", "one", "one two"]) {
        expect(combined.computeNewActions(second(text))).toEqual(
          words.computeNewActions(text).map((a) => first(a))
        );
      }
    });
  });

  describe("merge", () => {
    it("puts this saga's actions first (tagged Second), then the other's (tagged First)", () => {
      const labels = createSaga((n: number) => [`n=${n}`, `n*2=${n * 2}`]);

      expect(countUp.merge(labels).computeNewActions(2)).toEqual([
        second(2),
        second(3),
        first("n=2"),
        first("n*2=4"),
      ]);
    });

    it("feeds the same action result to both sagas", () => {
      const a = vi.fn((n: number) => [n]);
      const b = vi.fn((n: number) => [n + 1]);

      createSaga(a).merge(createSaga(b)).computeNewActions(10);

      expect(a).toHaveBeenCalledWith(10);
      expect(b).toHaveBeenCalledWith(10);
    });

    it("keeps the other saga's actions when this one is empty", () => {
      const saga = emptySaga<number, string>().merge(countUp);

      expect(saga.computeNewActions(2)).toEqual([first(2), first(3)]);
    });
  });

  describe("emptySaga", () => {
    it("never reacts", () => {
      expect(emptySaga<string, number>().computeNewActions("anything")).toEqual([]);
    });
  });

  describe("tryComputeNewActions", () => {
    it("wraps actions in an ok Result", () => {
      expect(tryComputeNewActions(countUp, 2)).toEqual({ ok: true, value: [2, 3] });
    });

    it("returns a SagaReactionError instead of throwing", () => {
      const cause = new Error("invalid order");
      const saga = createSaga((_: string): number[] => {
        throw cause;
      });

      const result = tryComputeNewActions(saga, "order-1");

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(SagaReactionError);
        expect(result.error._tag).toBe("SagaReactionError");
        expect(result.error.actionResult).toBe("order-1");
        expect(result.error.cause).toBe(cause);
        expect(result.error.message).toBe("Saga reaction failed: invalid order");
        expect(result.cause).toBe(cause);
      }
    });
  });
});
