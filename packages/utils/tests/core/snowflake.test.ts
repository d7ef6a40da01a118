import { describe, expect, it } from "@effect/vitest"
import { Option } from "effect"

import { Snowflake } from "../../src/core/brand.js"
import { InvalidArgumentError } from "../../src/core/errors.js"
import {
  generateSnowflake,
  getAsSnowflake,
  parseSnowflake,
  platformEpoch,
  snowflakeTime,
  timeSnowflake
} from "../../src/core/snowflake.js"

const sampleId = Snowflake(175928847299117063n)
const sampleDate = new Date("2016-04-30T11:18:25.796Z")

describe("snowflake time", () => {
  it("reads the creation time", () => {
    expect(snowflakeTime(sampleId).getTime()).toBe(1462015105796)
    expect(snowflakeTime(sampleId).toISOString()).toBe("2016-04-30T11:18:25.796Z")
  })

  it("builds the lowest and highest ids of a millisecond", () => {
    expect(timeSnowflake(sampleDate)).toBe(175928847298985984n)
    expect(timeSnowflake(sampleDate, true)).toBe(175928847303180287n)
    expect(generateSnowflake(sampleDate)).toBe(175928847303180287n)
  })

  it("maps the epoch to zero", () => {
    const epoch = new Date(Number(platformEpoch))
    expect(timeSnowflake(epoch)).toBe(0n)
    expect(timeSnowflake(epoch, true)).toBe(4194303n)
  })

  it("rejects dates before the epoch and invalid dates", () => {
    expect(() => timeSnowflake(new Date("2014-12-31T23:59:59.999Z"))).toThrow(InvalidArgumentError)
    expect(() => generateSnowflake(new Date("not a date"))).toThrow(InvalidArgumentError)
  })
})

describe("parseSnowflake", () => {
  it("accepts bigints, decimal strings and safe integers", () => {
    expect(parseSnowflake(123n)).toBe(123n)
    expect(parseSnowflake("175928847299117063")).toBe(175928847299117063n)
    expect(parseSnowflake(42)).toBe(42n)
  })

  it("rejects negative, fractional and non-numeric input", () => {
    expect(() => parseSnowflake(-1n)).toThrow(InvalidArgumentError)
    expect(() => parseSnowflake(1.5)).toThrow(InvalidArgumentError)
    expect(() => parseSnowflake("abc")).toThrow(InvalidArgumentError)
  })

  it("reads optional ids from payload records", () => {
    const payload = { owner_id: "80088516616269824", icon: null, banner: "" }
    expect(Option.getOrUndefined(getAsSnowflake(payload, "owner_id"))).toBe(80088516616269824n)
    expect(Option.isNone(getAsSnowflake(payload, "icon"))).toBe(true)
    expect(Option.isNone(getAsSnowflake(payload, "banner"))).toBe(true)
    expect(Option.isNone(getAsSnowflake(payload, "missing"))).toBe(true)
  })
})
