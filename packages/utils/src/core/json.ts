import * as S from "@effect/schema/Schema"
import { Either, pipe } from "effect"

import { InvalidArgumentError } from "./errors.js"

const nonAsciiRegex = /[\u0080-\uffff]/g

const decodeJson = S.decodeUnknownEither(S.parseJson())

/**
 * Serializes to compact JSON with every non-ASCII code unit escaped as `\uXXXX`.
 *
 * @pure true
 * @throws InvalidArgumentError for values with no JSON form (undefined, functions, symbols)
 * @complexity O(n) time / O(n) space
 */
export const toJson = (value: unknown): string => {
  const text: string | undefined = JSON.stringify(value)
  if (text === undefined) {
    throw new InvalidArgumentError({ message: `Cannot serialize ${typeof value} to JSON` })
  }
  return text.replace(
    nonAsciiRegex,
    (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, "0")}`
  )
}

export const fromJson = (text: string): unknown =>
  pipe(
    decodeJson(text),
    Either.match({
      onLeft: (error) => {
        throw new InvalidArgumentError({ message: `Malformed JSON: ${error.message}` })
      },
      onRight: (value) => value
    })
  )
