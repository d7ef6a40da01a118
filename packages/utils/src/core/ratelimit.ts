import * as S from "@effect/schema/Schema"
import { Either, pipe } from "effect"

import { InvalidArgumentError } from "./errors.js"

export type HeadersLike = {
  readonly get: (name: string) => string | null | undefined
}

export type RatelimitHeaderOptions = {
  readonly useClock?: boolean | undefined
  readonly now: Date
}

const decodeSeconds = S.decodeUnknownEither(S.NumberFromString)

const readSeconds = (headers: HeadersLike, name: string): number => {
  const raw = headers.get(name)
  if (raw === null || raw === undefined) {
    throw new InvalidArgumentError({ message: `Missing ${name} header` })
  }
  return pipe(
    decodeSeconds(raw),
    Either.match({
      onLeft: () => {
        throw new InvalidArgumentError({ message: `Malformed ${name} header: ${raw}` })
      },
      onRight: (seconds) => seconds
    })
  )
}

// CHANGE: compute how long a rate-limited route stays blocked
// WHY: the relative header is exact while the absolute one depends on clock skew
// SOURCE: https://discord.com/developers/docs/topics/rate-limits#header-format
// FORMAT THEOREM: forall h: useClock ∨ ¬h.resetAfter -> result = h.reset - now
// PURITY: CORE
// INVARIANT: X-Ratelimit-Reset-After wins unless useClock is set
// COMPLEXITY: O(1)/O(1)
export const parseRatelimitHeader = (headers: HeadersLike, options: RatelimitHeaderOptions): number => {
  const resetAfter = headers.get("X-Ratelimit-Reset-After")
  if (options.useClock !== true && resetAfter) {
    return readSeconds(headers, "X-Ratelimit-Reset-After")
  }
  const reset = readSeconds(headers, "X-Ratelimit-Reset")
  return (reset * 1000 - options.now.getTime()) / 1000
}
