/**
 * reactive-saga/errors
 *
 * Tagged error classes raised by the helpers around the saga algebra.
 * The algebra itself defines no failure: whatever a reaction function throws
 * reaches the caller unchanged. These types are used only where a helper adds
 * its own failure mode (handler lookup) or converts a throw into a value
 * (`tryComputeNewActions`).
 */

/**
 * Base interface for tagged errors.
 */
export interface TaggedErrorBase extends Error {
  readonly _tag: string;
}

/**
 * A reaction function threw while handling an action result.
 * The thrown value is kept as `cause`.
 */
export class SagaReactionError<AR = unknown> extends Error implements TaggedErrorBase {
  readonly _tag = "SagaReactionError" as const;
  readonly actionResult: AR;

  constructor(actionResult: AR, options: { cause: unknown }) {
    super(
      options.cause instanceof Error
        ? `Saga reaction failed: ${options.cause.message}`
        : "Saga reaction failed",
      { cause: options.cause }
    );
    this.name = "SagaReactionError";
    this.actionResult = actionResult;
  }
}

/**
 * A handler-based saga received an action result whose `_tag` has no handler.
 * Only reachable when the input escaped the declared union at run time.
 */
export class UnhandledActionResultError extends Error implements TaggedErrorBase {
  readonly _tag = "UnhandledActionResultError" as const;
  readonly tag: string;

  constructor(tag: string) {
    super(`No saga handler for action result: ${tag}`);
    this.name = "UnhandledActionResultError";
    this.tag = tag;
  }
}

export type SagaError = SagaReactionError | UnhandledActionResultError;

export function isSagaError(error: unknown): error is SagaError {
  return (
    error instanceof SagaReactionError ||
    error instanceof UnhandledActionResultError
  );
}
