import { Clock, Duration, Effect, pipe } from "effect"

import type { Snowflake } from "../core/brand.js"
import { generateSnowflake } from "../core/snowflake.js"
import { computeTimedelta } from "../core/time.js"

// CHANGE: read the current instant from the Effect clock
// WHY: tests drive time through TestClock instead of the wall clock
// SOURCE: n/a
// FORMAT THEOREM: forall t: utcnow at t = new Date(t)
// PURITY: SHELL
// EFFECT: Effect<Date, never, never>
// INVARIANT: the returned Date is a fresh object
// COMPLEXITY: O(1)/O(1)
export const utcnow: Effect.Effect<Date> = pipe(
  Clock.currentTimeMillis,
  Effect.map((millis) => new Date(millis))
)

/**
 * Suspends until `when`, then succeeds with `result`.
 * A date in the past completes immediately.
 */
export const sleepUntil = <A>(when: Date, result: A): Effect.Effect<A> =>
  Effect.gen(function*(_) {
    const now = yield* _(utcnow)
    const seconds = computeTimedelta(when, now)
    if (seconds > 0) {
      yield* _(Effect.sleep(Duration.seconds(seconds)))
    }
    return result
  })

export const currentSnowflake: Effect.Effect<Snowflake> = pipe(
  utcnow,
  Effect.map(generateSnowflake)
)
