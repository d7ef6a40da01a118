import { describe, expect, it } from "@effect/vitest"

import { Snowflake } from "../../src/core/brand.js"
import { oauthUrl, resolveInvite, resolveTemplate, validIconSize } from "../../src/core/platform.js"

describe("oauthUrl", () => {
  it("defaults to the bot scope", () => {
    expect(oauthUrl("123")).toBe("https://discord.com/oauth2/authorize?client_id=123&scope=bot")
  })

  it("adds every optional parameter", () => {
    expect(
      oauthUrl(123n, {
        permissions: 8n,
        guildId: Snowflake(456n),
        redirectUri: "https://example.com/cb",
        scopes: ["bot", "applications.commands"],
        disableGuildSelect: true
      })
    ).toBe(
      "https://discord.com/oauth2/authorize?client_id=123&scope=bot+applications.commands&permissions=8" +
        "&guild_id=456&response_type=code&redirect_uri=https%3A%2F%2Fexample.com%2Fcb&disable_guild_select=true"
    )
  })

  it("falls back to the bot scope for an empty list", () => {
    expect(oauthUrl("1", { scopes: [] })).toBe("https://discord.com/oauth2/authorize?client_id=1&scope=bot")
  })
})

describe("resolveInvite", () => {
  it("extracts the code from invite URLs", () => {
    expect(resolveInvite("https://discord.gg/abc123")).toBe("abc123")
    expect(resolveInvite("discord.com/invite/xyz")).toBe("xyz")
    expect(resolveInvite("http://discordapp.com/invite/legacy")).toBe("legacy")
  })

  it("passes bare codes and invite objects through", () => {
    expect(resolveInvite("plaincode")).toBe("plaincode")
    expect(resolveInvite({ code: "fromObject" })).toBe("fromObject")
  })
})

describe("resolveTemplate", () => {
  it("extracts the code from template URLs", () => {
    expect(resolveTemplate("https://discord.new/tmpl")).toBe("tmpl")
    expect(resolveTemplate("https://discord.com/template/other")).toBe("other")
    expect(resolveTemplate({ code: "obj" })).toBe("obj")
  })
})

describe("validIconSize", () => {
  it("accepts powers of two between 16 and 4096", () => {
    expect([16, 64, 1024, 4096].map(validIconSize)).toEqual([true, true, true, true])
  })

  it("rejects other sizes", () => {
    expect([8, 100, 8192, 0, 32.5].map(validIconSize)).toEqual([false, false, false, false, false])
  })
})
