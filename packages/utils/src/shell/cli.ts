import * as S from "@effect/schema/Schema"
import { Data, Effect, pipe } from "effect"

import { SnowflakeFromString } from "../core/snowflake.js"
import { TimestampStyle } from "../core/time.js"

export class CliError extends Data.TaggedError("CliError")<{
  readonly message: string
}> {}

const Bound = S.Literal("high", "low")

const textCommand = <C extends string>(command: C) =>
  S.Struct({
    command: S.Literal(command),
    args: S.Tuple(S.String)
  })

const nonEmptyCommand = <C extends string>(command: C) =>
  S.Struct({
    command: S.Literal(command),
    args: S.Tuple(S.NonEmptyString)
  })

const cliSchema = S.Union(
  S.Struct({
    command: S.Literal("snowflake-time"),
    args: S.Tuple(SnowflakeFromString)
  }),
  S.Struct({
    command: S.Literal("time-snowflake"),
    args: S.Union(S.Tuple(S.Date), S.Tuple(S.Date, Bound))
  }),
  S.Struct({
    command: S.Literal("format-dt"),
    args: S.Union(S.Tuple(S.Date), S.Tuple(S.Date, TimestampStyle))
  }),
  S.Struct({
    command: S.Literal("sort-ids"),
    args: S.NonEmptyArray(SnowflakeFromString)
  }),
  textCommand("escape-markdown"),
  textCommand("remove-markdown"),
  textCommand("escape-mentions"),
  nonEmptyCommand("oauth-url"),
  nonEmptyCommand("resolve-invite"),
  S.Struct({
    command: S.Literal("help"),
    args: S.Tuple()
  })
)

export type CliCommand = S.Schema.Type<typeof cliSchema>

const toCliInput = (argv: ReadonlyArray<string>) => ({
  command: argv[0] ?? "help",
  args: argv.slice(1)
})

// CHANGE: decode argv into a typed command
// WHY: keep raw process arguments outside the core
// SOURCE: n/a
// FORMAT THEOREM: forall argv: decode(argv) = cmd ∨ CliError
// PURITY: SHELL
// EFFECT: Effect<CliCommand, CliError, never>
// INVARIANT: an empty argv decodes to the help command
// COMPLEXITY: O(n)/O(n)
export const decodeCommand = (argv: ReadonlyArray<string>): Effect.Effect<CliCommand, CliError> =>
  pipe(
    S.decodeUnknown(cliSchema)(toCliInput(argv)),
    Effect.mapError((error) => new CliError({ message: error.message }))
  )

export const readCommand = pipe(
  Effect.sync(() => process.argv.slice(2)),
  Effect.flatMap(decodeCommand)
)
