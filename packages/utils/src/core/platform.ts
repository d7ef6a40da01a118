import type { Snowflake } from "./brand.js"

export type OAuthUrlOptions = {
  readonly permissions?: bigint | undefined
  readonly guildId?: Snowflake | undefined
  readonly redirectUri?: string | undefined
  readonly scopes?: ReadonlyArray<string> | undefined
  readonly disableGuildSelect?: boolean | undefined
}

export type HasCode = {
  readonly code: string
}

const authorizeUrl = "https://discord.com/oauth2/authorize"

const inviteRegex = /^(?:https?:\/\/)?discord(?:\.gg|(?:app)?\.com\/invite)\/(.+)/
const templateRegex = /^(?:https?:\/\/)?discord(?:\.new|(?:app)?\.com\/template)\/(.+)/

// CHANGE: build the authorization URL that invites a bot into a guild
// WHY: the query layout (scope joined by "+", optional guild preselection) is fixed by the platform
// SOURCE: https://discord.com/developers/docs/topics/oauth2#bot-authorization-flow
// FORMAT THEOREM: forall id: oauthUrl(id) starts with authorizeUrl + "?client_id=" + id
// PURITY: CORE
// INVARIANT: empty or missing scopes fall back to ["bot"]
// COMPLEXITY: O(|scopes|)/O(|url|)
export const oauthUrl = (clientId: bigint | string, options: OAuthUrlOptions = {}): string => {
  const scopes = options.scopes && options.scopes.length > 0 ? options.scopes : ["bot"]
  const parts = [`client_id=${clientId}`, `scope=${scopes.join("+")}`]
  if (options.permissions !== undefined) {
    parts.push(`permissions=${options.permissions}`)
  }
  if (options.guildId !== undefined) {
    parts.push(`guild_id=${options.guildId}`)
  }
  if (options.redirectUri !== undefined) {
    parts.push(`response_type=code&${new URLSearchParams({ redirect_uri: options.redirectUri }).toString()}`)
  }
  if (options.disableGuildSelect === true) {
    parts.push("disable_guild_select=true")
  }
  return `${authorizeUrl}?${parts.join("&")}`
}

const resolveCode = (regex: RegExp) => (value: HasCode | string): string => {
  if (typeof value !== "string") {
    return value.code
  }
  return regex.exec(value)?.[1] ?? value
}

/** Extracts an invite code from an invite object, an invite URL, or a bare code. */
export const resolveInvite = resolveCode(inviteRegex)

/** Extracts a guild template code from a template object, a template URL, or a bare code. */
export const resolveTemplate = resolveCode(templateRegex)

// icons are powers of two within [16, 4096]
export const validIconSize = (size: number): boolean =>
  Number.isInteger(size) && size >= 16 && size <= 4096 && (size & (size - 1)) === 0
