import { Data } from "effect"

export class InvalidArgumentError extends Data.TaggedError("InvalidArgumentError")<{
  readonly message: string
}> {}

// CHANGE: normalize thrown values into InvalidArgumentError
// WHY: schema and platform errors surface with a single tag across the core
// SOURCE: n/a
// FORMAT THEOREM: forall e: toInvalidArgument(e)._tag = "InvalidArgumentError"
// PURITY: CORE
// INVARIANT: an InvalidArgumentError passes through unchanged
// COMPLEXITY: O(1)/O(1)
export const toInvalidArgument = (error: unknown): InvalidArgumentError =>
  error instanceof InvalidArgumentError
    ? error
    : new InvalidArgumentError({
      message: error instanceof Error ? error.message : String(error)
    })
