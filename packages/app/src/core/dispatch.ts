import * as Schema from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import { Match } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import { convert } from "./convert.js"
import { convertWith } from "./convert-schema.js"
import type { Document } from "./document.js"
import type { BadRequest, ConversionFailed, ConvertError, DispatchError, HandlerFailed } from "./errors.js"
import { badRequest, conversionFailed, handlerFailed, invalidDocument, methodNotAllowed, notFound } from "./errors.js"
import type { Params, Route } from "./route.js"
import { buildRoute, decodeSegment, joinMapping, matchRoute, parseQuery } from "./route.js"
import { stringify } from "./stringify.js"
import { describeViolation, listViolations } from "./validate.js"

// CHANGE: dispatch GET requests to controller endpoints and render JSON replies
// WHY: handlers return plain values; conversion, validation and serialization happen in one place
// QUOTE(TZ): n/a
// REF: req-dispatch-1
// SOURCE: n/a
// FORMAT THEOREM: ∀r: dispatch(r) = Right(d) → r.method = GET ∧ ∃h: matches(h, r.path)
// PURITY: CORE
// EFFECT: handler invocation
// INVARIANT: first registered matching route wins; handler exceptions never escape
// COMPLEXITY: O(h) route lookup where h = number of handlers

export type EndpointError = BadRequest | HandlerFailed | ConversionFailed

export interface Endpoint {
  readonly mapping: string
  readonly invoke: (params: Params) => Either.Either<Document, EndpointError>
}

export interface Controller {
  readonly mapping: string
  readonly endpoints: ReadonlyArray<Endpoint>
}

export interface Handler {
  readonly route: Route
  readonly endpoint: Endpoint
}

export interface Router {
  readonly handlers: ReadonlyArray<Handler>
}

export interface RequestLine {
  readonly method: string
  readonly path: string
  readonly query: string
}

export interface DispatchOptions {
  readonly strict: boolean
}

export interface Reply {
  readonly status: number
  readonly body: string
  readonly contentType: string
}

const runHandler = <B>(handle: () => B): Either.Either<B, HandlerFailed> =>
  Either.try({
    try: handle,
    catch: (error) => handlerFailed(error instanceof Error ? error.message : String(error))
  })

// Without a result schema only the runtime shape is known.
const converterFor = <A, I, R>(
  result: Schema.Schema<A, I, R> | undefined
): (value: A) => Either.Either<Document, ConvertError> => result === undefined ? convert : convertWith(result)

const runEndpoint = <A, B extends A>(
  handle: () => B,
  toDocument: (value: A) => Either.Either<Document, ConvertError>
): Either.Either<Document, HandlerFailed | ConversionFailed> =>
  Either.flatMap(runHandler(handle), (value) => Either.mapLeft(toDocument(value), conversionFailed))

/**
 * Endpoint without parameters.
 *
 * @param mapping - Path relative to the controller.
 * @param handle - Produces the result.
 * @param result - Declared shape of the result; members follow its order and
 * undeclared fields are dropped. Runtime conversion when omitted.
 * @returns Endpoint.
 *
 * @pure true
 * @invariant handler exceptions become HandlerFailed
 * @complexity O(1)
 */
export const route = <A, I, R, B extends A>(
  mapping: string,
  handle: () => B,
  result?: Schema.Schema<A, I, R>
): Endpoint => {
  const toDocument = converterFor(result)
  return {
    mapping,
    invoke: () => runEndpoint(handle, toDocument)
  }
}

/**
 * Endpoint whose path variables and query parameters are decoded by a schema.
 *
 * @param mapping - Path template relative to the controller, e.g. "path/{pathvar}".
 * @param params - Struct schema from raw strings to handler arguments.
 * @param handle - Receives the decoded arguments.
 * @param result - Declared shape of the result, as for route.
 * @returns Endpoint failing with BadRequest when decoding fails.
 *
 * @pure true
 * @invariant handle runs only on successfully decoded arguments
 * @complexity O(1)
 */
export const routeWith = <P, PI, A, I, R, B extends A>(
  mapping: string,
  params: Schema.Schema<P, PI>,
  handle: (args: P) => B,
  result?: Schema.Schema<A, I, R>
): Endpoint => {
  const decode = Schema.decodeUnknownEither(params)
  const toDocument = converterFor(result)
  return {
    mapping,
    invoke: (raw) =>
      Either.flatMap(
        Either.mapLeft(decode(raw), (error) => badRequest(TreeFormatter.formatErrorSync(error))),
        (args) => runEndpoint(() => handle(args), toDocument)
      )
  }
}

export const controller = (mapping: string, endpoints: ReadonlyArray<Endpoint>): Controller => ({
  mapping,
  endpoints
})

export const makeRouter = (controllers: ReadonlyArray<Controller>): Router => ({
  handlers: controllers.flatMap((entry) =>
    entry.endpoints.map((endpoint) => ({
      route: buildRoute(joinMapping(entry.mapping, endpoint.mapping)),
      endpoint
    }))
  )
})

interface Resolved {
  readonly handler: Handler
  readonly pathParams: Params
}

const findHandler = (router: Router, path: string): Option.Option<Resolved> => {
  for (const handler of router.handlers) {
    const matched = matchRoute(handler.route, path)
    if (Option.isSome(matched)) {
      return Option.some({ handler, pathParams: matched.value })
    }
  }
  return Option.none()
}

// Path variables win over query parameters with the same name.
const resolveParams = (pathParams: Params, query: string): Either.Either<Params, BadRequest> => {
  const parsed = parseQuery(query)
  if (Either.isLeft(parsed)) {
    return Either.left(parsed.left)
  }
  const result = new Map(Object.entries(parsed.right))
  for (const [name, raw] of Object.entries(pathParams)) {
    const decoded = decodeSegment(raw)
    if (Either.isLeft(decoded)) {
      return Either.left(decoded.left)
    }
    result.set(name, decoded.right)
  }
  return Either.right(Object.fromEntries(result))
}

const checkDocument = (document: Document, options: DispatchOptions): Either.Either<Document, DispatchError> => {
  if (!options.strict) {
    return Either.right(document)
  }
  const violations = listViolations(document)
  return violations.length === 0
    ? Either.right(document)
    : Either.left(invalidDocument(violations.map((violation) => describeViolation(violation))))
}

/**
 * Resolve a request to a handler and run it; the endpoint converts its result.
 *
 * @param router - Registered handlers.
 * @param request - Method, raw path and raw query string.
 * @param options - strict rejects results that fail validation.
 * @returns Document to serialize or a typed DispatchError.
 *
 * @pure false
 * @effect handler invocation
 * @invariant non-GET requests never reach a handler
 * @complexity O(h + n)
 */
export const dispatch = (
  router: Router,
  request: RequestLine,
  options: DispatchOptions = { strict: false }
): Either.Either<Document, DispatchError> => {
  if (request.method !== "GET") {
    return Either.left(methodNotAllowed(request.method))
  }
  const resolved = findHandler(router, request.path)
  if (Option.isNone(resolved)) {
    return Either.left(notFound(request.path))
  }
  const params = resolveParams(resolved.value.pathParams, request.query)
  if (Either.isLeft(params)) {
    return Either.left(params.left)
  }
  const document = resolved.value.handler.endpoint.invoke(params.right)
  if (Either.isLeft(document)) {
    return Either.left(document.left)
  }
  return checkDocument(document.right, options)
}

const JSON_CONTENT_TYPE = "application/json"
const TEXT_CONTENT_TYPE = "text/plain"

const textReply = (status: number, body: string): Reply => ({ status, body, contentType: TEXT_CONTENT_TYPE })

const errorReply = (error: DispatchError): Reply =>
  Match.value(error).pipe(
    Match.tag("NotFound", () => textReply(404, "Not Found")),
    Match.tag("MethodNotAllowed", () => textReply(405, "")),
    Match.tag("BadRequest", (failure) => textReply(400, failure.message)),
    Match.tag("HandlerFailed", "ConversionFailed", "InvalidDocument", () => textReply(500, "Internal server error")),
    Match.exhaustive
  )

export const toReply = (result: Either.Either<Document, DispatchError>): Reply =>
  Either.match(result, {
    onLeft: errorReply,
    onRight: (document) => ({ status: 200, body: stringify(document), contentType: JSON_CONTENT_TYPE })
  })

export const describeDispatchError = (error: DispatchError): string =>
  Match.value(error).pipe(
    Match.tag("NotFound", (failure) => `No route for ${failure.path}`),
    Match.tag("MethodNotAllowed", (failure) => `Method ${failure.method} is not allowed`),
    Match.tag("BadRequest", (failure) => failure.message),
    Match.tag("HandlerFailed", (failure) => `Handler failed: ${failure.message}`),
    Match.tag("ConversionFailed", (failure) => `Result conversion failed: ${failure.cause.message}`),
    Match.tag("InvalidDocument", (failure) => `Invalid document: ${failure.violations.join("; ")}`),
    Match.exhaustive
  )
