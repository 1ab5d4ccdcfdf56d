import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Layer } from "effect"
import type * as Either from "effect/Either"

import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { resolveConfig } from "../core/config.js"
import type { Controller, Router } from "../core/dispatch.js"
import { makeRouter } from "../core/dispatch.js"
import type { AppError } from "../core/errors.js"
import { serveError } from "../core/errors.js"
import { loadConfigFile } from "../shell/config-file.js"
import { serverLayer } from "../shell/server.js"

// CHANGE: orchestrate server startup with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic configuration
// QUOTE(TZ): n/a
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: prepare(argv) = Right(p) → p.config = resolve(cli(argv), file(cli(argv)))
// PURITY: SHELL
// EFFECT: Effect<never, AppError, FileSystem>
// INVARIANT: routes are logged before the listener starts
// COMPLEXITY: O(h) where h = number of handlers

export interface Prepared {
  readonly config: ResolvedConfig
  readonly router: Router
}

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

/**
 * Resolve configuration and register controllers without opening a socket.
 *
 * @param argv - process.argv array.
 * @param controllers - Controllers to register.
 * @returns Resolved config and router.
 *
 * @pure false
 * @effect FileSystem
 * @invariant CLI flags override the config file
 * @complexity O(h)
 */
export const prepareServer = (
  argv: ReadonlyArray<string>,
  controllers: ReadonlyArray<Controller>
): Effect.Effect<Prepared, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const fileConfig = yield* _(loadConfigFile(cli.configPath, cli.configExplicit))
    const config = resolveConfig(cli, fileConfig)
    const router = makeRouter(controllers)
    for (const handler of router.handlers) {
      yield* _(Effect.logDebug(`Registered GET ${handler.route.template}`))
    }
    return { config, router }
  })

/**
 * Run the JSON route server until interrupted.
 *
 * @param argv - process.argv array.
 * @param controllers - Controllers to serve.
 *
 * @pure false
 * @effect FileSystem, HTTP listener, Logger
 * @invariant never completes successfully
 * @complexity O(h)
 */
export const runServer = (
  argv: ReadonlyArray<string>,
  controllers: ReadonlyArray<Controller>
): Effect.Effect<never, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const { config, router } = yield* _(prepareServer(argv, controllers))
    yield* _(Effect.logInfo(`Server started at http://localhost:${config.port}`))
    return yield* _(
      Layer.launch(serverLayer(router, config)).pipe(
        Effect.mapError((error) => serveError(String(error)))
      )
    )
  })
