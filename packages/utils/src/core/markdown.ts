import * as S from "@effect/schema/Schema"
import { Array as Arr, Option, pipe } from "effect"

import { Snowflake } from "./brand.js"
import { SnowflakeFromString } from "./snowflake.js"

export type EscapeMarkdownOptions = {
  readonly asNeeded?: boolean | undefined
  readonly ignoreLinks?: boolean | undefined
}

export type RemoveMarkdownOptions = {
  readonly ignoreLinks?: boolean | undefined
}

const asNeededChars: ReadonlyArray<string> = ["*", "`", "_", "~", "|"]

// a marker character is escaped only when a later, unescaped copy of it exists
const asNeededPattern = asNeededChars
  .map((char) => `\\${char}(?=([\\s\\S]*((?<!\\${char})\\${char})))`)
  .join("|")

// link text without brackets, destination without parentheses
const linkPattern = String.raw`\[[^\[\]]*\]\([^\(\)]+\)`

const blockQuotePattern = String.raw`^>(?:>>)?\s`

const commonPattern = `${blockQuotePattern}|${linkPattern}`

const urlPattern = String.raw`(<[^: >]+:\/[^ >]+>|(?:https?|steam):\/\/[^\s<]+[^<.,:;"'\]\s])`

const markdownCharPattern = "[_\\\\~|\\*`]"

const stockPattern = `(${markdownCharPattern}|${commonPattern})`

const withLinks = (pattern: string): RegExp => new RegExp(`(?:${urlPattern}|${pattern})`, "gm")

const escapeStockRegex = new RegExp(stockPattern, "gm")
const escapeStockIgnoringLinksRegex = withLinks(stockPattern)
const escapeAsNeededRegex = new RegExp(`(${asNeededPattern}|${commonPattern})`, "gm")

const removePattern = `(${markdownCharPattern}|${blockQuotePattern})`
const removeRegex = new RegExp(removePattern, "gm")
const removeIgnoringLinksRegex = withLinks(removePattern)

const mentionEscapeRegex = /@(everyone|here|[!&]?\d{17,20})/g
const userMentionRegex = /<@!?(\d+)>/g
const channelMentionRegex = /<#(\d+)>/g
const roleMentionRegex = /<@&(\d+)>/g

const prefixBackslash = (match: string): string => `\\${match}`

const keepUrlOr = (fallback: (match: string) => string) => (match: string, url: string | undefined): string =>
  url === undefined ? fallback(match) : url

/**
 * Escapes the platform's markdown so the text renders literally.
 *
 * By default every markdown character, block-quote marker and `[text](url)`
 * link is escaped, leaving URLs intact. With `asNeeded`, a marker is escaped
 * only if it could pair with a later one, so `**hello**` becomes
 * `\*\*hello**`; URLs are not protected in that mode.
 *
 * @pure true
 * @complexity O(n) time / O(n) space for the default mode, O(n^2) worst case with asNeeded
 */
export const escapeMarkdown = (text: string, options: EscapeMarkdownOptions = {}): string => {
  if (options.asNeeded === true) {
    return text.replaceAll("\\", "\\\\").replace(escapeAsNeededRegex, prefixBackslash)
  }
  return options.ignoreLinks === false
    ? text.replace(escapeStockRegex, prefixBackslash)
    : text.replace(escapeStockIgnoringLinksRegex, keepUrlOr(prefixBackslash))
}

/**
 * Drops markdown characters and block-quote markers.
 *
 * Not markdown aware: `10 * 5` becomes `10  5`.
 */
export const removeMarkdown = (text: string, options: RemoveMarkdownOptions = {}): string =>
  options.ignoreLinks === false
    ? text.replace(removeRegex, "")
    : text.replace(removeIgnoringLinksRegex, keepUrlOr(() => ""))

// CHANGE: neutralize mass and id mentions with a zero-width space
// WHY: echoed user text must not ping everyone, here, users or roles
// SOURCE: n/a
// FORMAT THEOREM: forall t: mentions(escapeMentions(t)) = ∅ for everyone/here/ids
// PURITY: CORE
// INVARIANT: channel mentions are left unchanged
// COMPLEXITY: O(n)/O(n)
export const escapeMentions = (text: string): string => text.replace(mentionEscapeRegex, "@\u200b$1")

const decodeMentionId = S.decodeUnknownOption(SnowflakeFromString)

// ids wider than 64 bits are not snowflakes and are skipped
const collectIds = (text: string, regex: RegExp): ReadonlyArray<Snowflake> =>
  pipe(
    Array.from(text.matchAll(regex), (match) => match[1]),
    Arr.filterMap((digits) => pipe(decodeMentionId(digits), Option.map(Snowflake)))
  )

export const rawMentions = (text: string): ReadonlyArray<Snowflake> => collectIds(text, userMentionRegex)

export const rawChannelMentions = (text: string): ReadonlyArray<Snowflake> => collectIds(text, channelMentionRegex)

export const rawRoleMentions = (text: string): ReadonlyArray<Snowflake> => collectIds(text, roleMentionRegex)
