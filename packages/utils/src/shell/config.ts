import type { PlatformError } from "@effect/platform/Error"
import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import * as S from "@effect/schema/Schema"
import dotenv from "dotenv"
import { Data, Effect, LogLevel, Option, pipe } from "effect"

import { unique } from "../core/search.js"
import { TimestampStyle } from "../core/time.js"

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string
}> {}

const LogLevelLiteral = S.Literal("All", "Fatal", "Error", "Warning", "Info", "Debug", "Trace", "None")

const envSchema = S.Struct({
  CHAT_UTILS_LOG_LEVEL: S.optionalWith(LogLevelLiteral, { default: () => "Info" as const }),
  CHAT_UTILS_TIMESTAMP_STYLE: S.optional(TimestampStyle)
})

type Env = S.Schema.Type<typeof envSchema>

export type Config = {
  readonly logLevel: LogLevel.LogLevel
  readonly timestampStyle: TimestampStyle | undefined
}

const toConfigError = (error: Error | PlatformError): ConfigError => new ConfigError({ message: error.message })

// package source sits four levels below the workspace root, the built output two
const workspaceDepth = 4

// CHANGE: list where a .env file may live, nearest first
// WHY: the CLI runs from the workspace root, from packages/utils, or from dist
// SOURCE: n/a
// FORMAT THEOREM: forall cwd, dir: candidates = [cwd/.env] ++ [dir/..^k/.env | 0 <= k <= depth]
// PURITY: CORE
// INVARIANT: no path appears twice
// COMPLEXITY: O(depth)/O(depth)
export const envFileCandidates = (
  path: Path.Path,
  cwd: string,
  moduleDir: string
): ReadonlyArray<string> => {
  const ancestors = Array.from(
    { length: workspaceDepth + 1 },
    (_, level) => path.resolve(moduleDir, ...Array.from({ length: level }, () => ".."), ".env")
  )
  return unique([path.resolve(cwd, ".env"), ...ancestors])
}

// CHANGE: load the first .env file found before reading configuration
// WHY: process.env may already hold the values, so a missing file is not an error
// SOURCE: n/a
// FORMAT THEOREM: forall c ∈ candidates: exists(c) ∧ ∀c' before c: ¬exists(c') -> loaded = c
// PURITY: SHELL
// EFFECT: Effect<void, ConfigError, FileSystem | Path>
// INVARIANT: at most one .env file is loaded
// COMPLEXITY: O(depth)/O(depth)
const loadEnv = Effect.gen(function*(_) {
  const fs = yield* _(FileSystem.FileSystem)
  const path = yield* _(Path.Path)
  const modulePath = yield* _(path.fromFileUrl(new URL(import.meta.url)))
  const candidates = envFileCandidates(path, process.cwd(), path.dirname(modulePath))
  const found = yield* _(Effect.findFirst(candidates, (candidate) => fs.exists(candidate)))
  yield* _(Effect.sync(() => {
    if (Option.isSome(found)) {
      dotenv.config({ path: found.value })
    }
  }))
}).pipe(Effect.mapError(toConfigError))

export const decodeConfig = (env: Readonly<Record<string, string | undefined>>) =>
  pipe(
    S.decodeUnknown(envSchema)(env),
    Effect.map((decoded: Env): Config => ({
      logLevel: LogLevel.fromLiteral(decoded.CHAT_UTILS_LOG_LEVEL),
      timestampStyle: decoded.CHAT_UTILS_TIMESTAMP_STYLE
    })),
    Effect.mapError((error) => toConfigError(error))
  )

// CHANGE: decode CLI configuration from environment variables
// WHY: keep boundary data validated before entering the core
// SOURCE: n/a
// FORMAT THEOREM: forall env: decode(env) = config -> config.logLevel ∈ LogLevel
// PURITY: SHELL
// EFFECT: Effect<Config, ConfigError, FileSystem | Path>
// INVARIANT: log level defaults to Info, timestamp style defaults to none
// COMPLEXITY: O(1)/O(1)
export const loadConfig = pipe(
  loadEnv,
  Effect.flatMap(() => Effect.sync(() => process.env)),
  Effect.flatMap(decodeConfig)
)
