import * as S from "@effect/schema/Schema"
import { Either, pipe } from "effect"

import { UnixSeconds } from "./brand.js"
import { InvalidArgumentError } from "./errors.js"

// t: 22:57, T: 22:57:58, d: 17/05/2016, D: 17 May 2016,
// f: 17 May 2016 22:57, F: Tuesday, 17 May 2016 22:57, R: 5 years ago
export const TimestampStyle = S.Literal("t", "T", "d", "D", "f", "F", "R")

export type TimestampStyle = S.Schema.Type<typeof TimestampStyle>

const decodeIsoDate = S.decodeUnknownEither(S.Date)

export const toUnixSeconds = (date: Date): UnixSeconds => UnixSeconds(Math.trunc(date.getTime() / 1000))

// CHANGE: render a date as client-localized timestamp markup
// WHY: the client formats the instant in each reader's locale and timezone
// SOURCE: n/a
// FORMAT THEOREM: forall d, s: format(d, s) = "<t:" + floor0(d/1000) + (s ? ":" + s : "") + ">"
// PURITY: CORE
// INVARIANT: seconds are truncated toward zero
// COMPLEXITY: O(1)/O(1)
export const formatDt = (date: Date, style?: TimestampStyle): string => {
  const seconds = toUnixSeconds(date)
  return style === undefined ? `<t:${seconds}>` : `<t:${seconds}:${style}>`
}

/**
 * Parses an ISO 8601 timestamp as sent in API payloads.
 * Empty and absent values map to `null`.
 *
 * @throws InvalidArgumentError when the text is not a valid date
 */
export const parseTime = (timestamp: string | null | undefined): Date | null => {
  if (timestamp === null || timestamp === undefined || timestamp === "") {
    return null
  }
  return pipe(
    decodeIsoDate(timestamp),
    Either.match({
      onLeft: () => {
        throw new InvalidArgumentError({ message: `Invalid ISO 8601 timestamp: ${timestamp}` })
      },
      onRight: (date) => date
    })
  )
}

export const computeTimedelta = (when: Date, now: Date): number => Math.max((when.getTime() - now.getTime()) / 1000, 0)
