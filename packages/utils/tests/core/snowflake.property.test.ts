import { describe, expect, it } from "@effect/vitest"
import fc from "fast-check"

import { generateSnowflake, snowflakeTime, timeSnowflake } from "../../src/core/snowflake.js"
import { afterEpochDateArb } from "./property-helpers.js"

describe("snowflake time properties", () => {
  it("round-trips whole milliseconds", () => {
    fc.assert(
      fc.property(afterEpochDateArb, (date) => {
        expect(snowflakeTime(timeSnowflake(date)).getTime()).toBe(date.getTime())
        expect(snowflakeTime(timeSnowflake(date, true)).getTime()).toBe(date.getTime())
      })
    )
  })

  it("low and high bounds span the sequence bits", () => {
    fc.assert(
      fc.property(afterEpochDateArb, (date) => {
        expect(timeSnowflake(date, true) - timeSnowflake(date)).toBe(4194303n)
        expect(generateSnowflake(date)).toBe(timeSnowflake(date, true))
      })
    )
  })
})
