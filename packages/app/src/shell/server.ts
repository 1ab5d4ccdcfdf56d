import { HttpServer, HttpServerRequest, HttpServerResponse } from "@effect/platform"
import { NodeHttpServer } from "@effect/platform-node"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Layer from "effect/Layer"
import { createServer } from "node:http"

import type { ResolvedConfig } from "../core/config.js"
import type { RequestLine, Router } from "../core/dispatch.js"
import { describeDispatchError, dispatch, toReply } from "../core/dispatch.js"

// CHANGE: serve dispatcher replies over HTTP with the Effect platform
// WHY: keep the listener a thin shell around the pure dispatcher
// QUOTE(TZ): n/a
// REF: req-server-1
// SOURCE: n/a
// FORMAT THEOREM: ∀req: response(req) = toReply(dispatch(router, line(req)))
// PURITY: SHELL
// EFFECT: Effect<HttpServerResponse, never, HttpServerRequest>
// INVARIANT: every failed dispatch is logged once
// COMPLEXITY: O(h + n) per request

const toRequestLine = (request: HttpServerRequest.HttpServerRequest): RequestLine => {
  const url = new URL(request.url, "http://localhost")
  return { method: request.method, path: url.pathname, query: url.search.slice(1) }
}

/**
 * Build the HTTP application answering every request through the dispatcher.
 *
 * @param router - Registered controllers.
 * @param config - strict turns invalid documents into 500 replies.
 * @returns HttpApp effect.
 *
 * @pure false
 * @effect Logger
 * @invariant the response body is exactly toReply(result).body
 * @complexity O(h + n)
 */
export const makeHttpApp = (
  router: Router,
  config: ResolvedConfig
): Effect.Effect<HttpServerResponse.HttpServerResponse, never, HttpServerRequest.HttpServerRequest> =>
  Effect.gen(function*(_) {
    const request = yield* _(HttpServerRequest.HttpServerRequest)
    const line = toRequestLine(request)
    const result = dispatch(router, line, { strict: config.strict })
    if (Either.isLeft(result)) {
      yield* _(
        Effect.logWarning(describeDispatchError(result.left)).pipe(
          Effect.annotateLogs({ method: line.method, path: line.path })
        )
      )
    }
    const reply = toReply(result)
    return HttpServerResponse.text(reply.body, { status: reply.status, contentType: reply.contentType })
  })

export const serverLayer = (router: Router, config: ResolvedConfig) =>
  HttpServer.serve(makeHttpApp(router, config)).pipe(
    Layer.provide(NodeHttpServer.layer(createServer, { port: config.port }))
  )
