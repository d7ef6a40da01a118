import { Effect, Match } from "effect"

import { Snowflake } from "../core/brand.js"
import { toInvalidArgument } from "../core/errors.js"
import { escapeMarkdown, escapeMentions, removeMarkdown } from "../core/markdown.js"
import { oauthUrl, resolveInvite } from "../core/platform.js"
import { unique } from "../core/search.js"
import { SnowflakeList } from "../core/snowflake-list.js"
import { snowflakeTime, timeSnowflake } from "../core/snowflake.js"
import { formatDt } from "../core/time.js"
import { CliError, type CliCommand } from "../shell/cli.js"
import type { Config } from "../shell/config.js"

export const usage = [
  "Usage: chat-utils <command> [...args]",
  "",
  "  snowflake-time <id>                 creation time of a snowflake",
  "  time-snowflake <iso-date> [high|low] snowflake bounding an instant",
  "  format-dt <iso-date> [style]        timestamp markup (t T d D f F R)",
  "  sort-ids <id...>                    sorted, deduplicated ids",
  "  escape-markdown <text>              escape markdown characters",
  "  remove-markdown <text>              strip markdown characters",
  "  escape-mentions <text>              neutralize @everyone, @here and id mentions",
  "  oauth-url <client-id>               bot authorization URL",
  "  resolve-invite <invite>             invite code from a URL or code",
  "  help                                this text"
].join("\n")

/**
 * Renders the single output line of a decoded command.
 *
 * @pure true
 * @throws InvalidArgumentError from the core helpers (e.g. a date before the epoch)
 */
export const renderCommand = (command: CliCommand, config: Config): string =>
  Match.value(command).pipe(
    Match.when({ command: "snowflake-time" }, ({ args }) => snowflakeTime(Snowflake(args[0])).toISOString()),
    Match.when({ command: "time-snowflake" }, ({ args }) =>
      timeSnowflake(args[0], args.length === 2 && args[1] === "high").toString()),
    Match.when({ command: "format-dt" }, ({ args }) =>
      formatDt(args[0], args.length === 2 ? args[1] : config.timestampStyle)),
    Match.when({ command: "sort-ids" }, ({ args }) => unique(new SnowflakeList(args)).join(" ")),
    Match.when({ command: "escape-markdown" }, ({ args }) => escapeMarkdown(args[0])),
    Match.when({ command: "remove-markdown" }, ({ args }) => removeMarkdown(args[0])),
    Match.when({ command: "escape-mentions" }, ({ args }) => escapeMentions(args[0])),
    Match.when({ command: "oauth-url" }, ({ args }) => oauthUrl(args[0])),
    Match.when({ command: "resolve-invite" }, ({ args }) => resolveInvite(args[0])),
    Match.when({ command: "help" }, () => usage),
    Match.exhaustive
  )

export const runCommand = (command: CliCommand, config: Config): Effect.Effect<string, CliError> =>
  Effect.try({
    try: () => renderCommand(command, config),
    catch: (error) => new CliError({ message: toInvalidArgument(error).message })
  })
