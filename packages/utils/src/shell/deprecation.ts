import { Effect } from "effect"

import { type DeprecationOptions, formatDeprecationMessage } from "../core/deprecation.js"

export type DeprecatedOptions = DeprecationOptions & {
  readonly name?: string | undefined
  readonly report?: ((message: string) => void) | undefined
}

// CHANGE: log a deprecation warning through the Effect logger
// WHY: warnings share the program's log level and annotations
// SOURCE: n/a
// FORMAT THEOREM: forall n, o: warn(n, o) logs formatDeprecationMessage(n, o) at Warning
// PURITY: SHELL
// EFFECT: Effect<void, never, never>
// INVARIANT: log line is annotated with category=DeprecationWarning
// COMPLEXITY: O(1)/O(1)
export const warnDeprecated = (name: string, options: DeprecationOptions = {}): Effect.Effect<void> =>
  Effect.logWarning(formatDeprecationMessage(name, options)).pipe(
    Effect.annotateLogs("category", "DeprecationWarning")
  )

const makeReporter = (name: string, options: DeprecatedOptions): (() => void) => {
  const sink = options.report
  if (sink === undefined) {
    return () => {
      Effect.runSync(warnDeprecated(name, options))
    }
  }
  const message = formatDeprecationMessage(name, options)
  return () => {
    sink(message)
  }
}

/**
 * Wraps a function so that every call first reports it as deprecated.
 *
 * `name` overrides the function's own name in the message; `report`
 * replaces the default Effect logger sink.
 */
export const deprecated = (options: DeprecatedOptions = {}) =>
<Args extends ReadonlyArray<unknown>, R>(fn: (...args: Args) => R): ((...args: Args) => R) => {
  const report = makeReporter(options.name ?? fn.name, options)
  return (...args) => {
    report()
    return fn(...args)
  }
}
