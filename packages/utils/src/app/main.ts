#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, pipe } from "effect"

import { program } from "./program.js"

// CHANGE: entry point of the chat-utils binary
// WHY: FileSystem and Path for .env discovery come from the Node context layer
// SOURCE: https://effect.website/docs/platform/runtime/
// FORMAT THEOREM: forall argv: exit(main) = 0 <-> program(argv) succeeds
// PURITY: SHELL
// EFFECT: Effect<void, ConfigError | CliError, never>
// INVARIANT: failures are reported by runMain and set a non-zero exit code
// COMPLEXITY: O(1)/O(1)
const cli = pipe(program, Effect.provide(NodeContext.layer))

NodeRuntime.runMain(cli)
