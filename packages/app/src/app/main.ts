import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import { controllers } from "./controllers.js"
import { runServer } from "./program.js"

// CHANGE: wire the server program into the Node runtime with proper teardown
// WHY: execute effects with platform services and typed error handling
// QUOTE(TZ): n/a
// REF: req-main-1
// SOURCE: n/a
// FORMAT THEOREM: runMain(program) runs until interrupted or fails with AppError
// PURITY: SHELL
// EFFECT: Effect<never, AppError, NodeContext>
// INVARIANT: startup failures terminate the process with a non-zero exit code
// COMPLEXITY: O(1)

NodeRuntime.runMain(Effect.provide(runServer(process.argv, controllers), NodeContext.layer))
