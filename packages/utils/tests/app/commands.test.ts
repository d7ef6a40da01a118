import { describe, expect, it } from "@effect/vitest"
import { Effect, LogLevel, pipe } from "effect"

import { runCommand, usage } from "../../src/app/commands.js"
import { decodeCommand } from "../../src/shell/cli.js"
import type { Config } from "../../src/shell/config.js"

const plainConfig: Config = { logLevel: LogLevel.Info, timestampStyle: undefined }

const run = (argv: ReadonlyArray<string>, config: Config = plainConfig) =>
  pipe(
    decodeCommand(argv),
    Effect.flatMap((command) => runCommand(command, config))
  )

describe("runCommand", () => {
  it.effect("prints snowflake times", () =>
    Effect.gen(function*(_) {
      expect(yield* _(run(["snowflake-time", "175928847299117063"]))).toBe("2016-04-30T11:18:25.796Z")
    }))

  it.effect("prints snowflake bounds", () =>
    Effect.gen(function*(_) {
      const date = "2016-04-30T11:18:25.796Z"
      expect(yield* _(run(["time-snowflake", date]))).toBe("175928847298985984")
      expect(yield* _(run(["time-snowflake", date, "low"]))).toBe("175928847298985984")
      expect(yield* _(run(["time-snowflake", date, "high"]))).toBe("175928847303180287")
    }))

  it.effect("formats timestamps with the configured style", () =>
    Effect.gen(function*(_) {
      const styled: Config = { logLevel: LogLevel.Info, timestampStyle: "R" }
      expect(yield* _(run(["format-dt", "2024-01-01T00:00:00Z"]))).toBe("<t:1704067200>")
      expect(yield* _(run(["format-dt", "2024-01-01T00:00:00Z"], styled))).toBe("<t:1704067200:R>")
      expect(yield* _(run(["format-dt", "2024-01-01T00:00:00Z", "t"], styled))).toBe("<t:1704067200:t>")
    }))

  it.effect("sorts and deduplicates ids", () =>
    Effect.gen(function*(_) {
      expect(yield* _(run(["sort-ids", "5", "1", "3", "1"]))).toBe("1 3 5")
    }))

  it.effect("transforms text", () =>
    Effect.gen(function*(_) {
      expect(yield* _(run(["escape-markdown", "*hi*"]))).toBe("\\*hi\\*")
      expect(yield* _(run(["remove-markdown", "*hi*"]))).toBe("hi")
      expect(yield* _(run(["escape-mentions", "@here"]))).toBe("@\u200bhere")
    }))

  it.effect("builds platform strings", () =>
    Effect.gen(function*(_) {
      expect(yield* _(run(["oauth-url", "123"]))).toBe("https://discord.com/oauth2/authorize?client_id=123&scope=bot")
      expect(yield* _(run(["resolve-invite", "https://discord.gg/abc123"]))).toBe("abc123")
    }))

  it.effect("prints usage for help", () =>
    Effect.gen(function*(_) {
      expect(yield* _(run([]))).toBe(usage)
      expect(yield* _(run(["help"]))).toBe(usage)
    }))

  it.effect("turns core failures into CliError", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(run(["time-snowflake", "2000-01-01T00:00:00Z"])))
      expect(error).toMatchObject({
        _tag: "CliError",
        message: "2000-01-01T00:00:00.000Z precedes the platform epoch"
      })
    }))
})
