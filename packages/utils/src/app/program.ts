import { Console, Effect, Logger, pipe } from "effect"

import { readCommand } from "../shell/cli.js"
import { loadConfig } from "../shell/config.js"
import { runCommand } from "./commands.js"

// CHANGE: compose configuration, argv decoding and command rendering
// WHY: one command per invocation, printed as a single line
// SOURCE: n/a
// FORMAT THEOREM: forall argv: program(argv) prints render(decode(argv)) ∨ fails with CliError | ConfigError
// PURITY: SHELL
// EFFECT: Effect<void, ConfigError | CliError, FileSystem | Path>
// INVARIANT: logs below the configured level are dropped
// COMPLEXITY: O(n)/O(n)
export const program = pipe(
  loadConfig,
  Effect.flatMap((config) =>
    pipe(
      readCommand,
      Effect.tap((command) => Effect.logDebug(`Running ${command.command}`)),
      Effect.flatMap((command) => runCommand(command, config)),
      Effect.flatMap((output) => Console.log(output)),
      Effect.annotateLogs("service", "chat-utils"),
      Logger.withMinimumLogLevel(config.logLevel)
    )
  )
)
