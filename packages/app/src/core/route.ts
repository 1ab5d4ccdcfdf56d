import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { BadRequest } from "./errors.js"
import { badRequest } from "./errors.js"

// CHANGE: compile path templates and decode query strings
// WHY: keep request matching pure and testable outside the HTTP listener
// QUOTE(TZ): n/a
// REF: req-route-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t,p: matchRoute(buildRoute(t), p) = Some(vars) → |vars| = |pathVars(t)|
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: patterns are anchored; literal template text never acts as regex syntax
// COMPLEXITY: O(n) where n = template/query length

export interface Route {
  readonly template: string
  readonly pattern: RegExp
  readonly pathVars: ReadonlyArray<string>
}

export type Params = Readonly<Record<string, string>>

const VARIABLE = /\{([^}]+)\}/gu

const trimSlashes = (value: string): string => value.replace(/^\/+|\/+$/gu, "")

const escapeRegExp = (value: string): string => value.replace(/[.*+?^$()|[\]\\]/gu, "\\$&")

/**
 * Join a controller mapping and an endpoint mapping into an absolute path.
 *
 * @param base - Controller mapping, may be empty.
 * @param mapping - Endpoint mapping.
 * @returns Path starting with a single slash.
 *
 * @pure true
 * @invariant result contains no "//"
 * @complexity O(n)
 */
export const joinMapping = (base: string, mapping: string): string =>
  `/${trimSlashes(base)}/${trimSlashes(mapping)}`.replaceAll("//", "/")

/**
 * Compile a template such as "/api/path/{pathvar}" into an anchored pattern.
 *
 * @pure true
 * @invariant pathVars preserve template order
 * @complexity O(n)
 */
export const buildRoute = (template: string): Route => {
  const pathVars: Array<string> = []
  let source = ""
  let cursor = 0
  for (const match of template.matchAll(VARIABLE)) {
    const start = match.index ?? cursor
    source += `${escapeRegExp(template.slice(cursor, start))}([^/]+)`
    pathVars.push(match[1] ?? "")
    cursor = start + match[0].length
  }
  source += escapeRegExp(template.slice(cursor))
  return { template, pattern: new RegExp(`^${source}$`, "u"), pathVars }
}

export const matchRoute = (route: Route, path: string): Option.Option<Params> => {
  const match = route.pattern.exec(path)
  if (match === null) {
    return Option.none()
  }
  return Option.some(
    Object.fromEntries(route.pathVars.map((name, index) => [name, match[index + 1] ?? ""] as const))
  )
}

/**
 * Percent-decode a path segment; "+" stays literal.
 *
 * @pure true
 * @invariant malformed escapes are reported, not passed through
 */
export const decodeSegment = (raw: string): Either.Either<string, BadRequest> =>
  Either.try({
    try: () => decodeURIComponent(raw),
    catch: () => badRequest(`Malformed URL component: ${raw}`)
  })

// Form encoding: "+" is a space.
export const decodeComponent = (raw: string): Either.Either<string, BadRequest> =>
  decodeSegment(raw.replaceAll("+", " "))

/**
 * Parse a raw query string ("a=1&b=2") into decoded parameters.
 *
 * @param raw - Query string without the leading "?".
 * @returns Parameters; pairs without exactly one "=" are skipped; the last duplicate wins.
 *
 * @pure true
 * @invariant keys and values are percent-decoded
 * @complexity O(n)
 */
export const parseQuery = (raw: string): Either.Either<Params, BadRequest> => {
  // Map keeps "__proto__" as an ordinary key.
  const params = new Map<string, string>()
  for (const pair of raw.split("&")) {
    const parts = pair.split("=")
    const [rawKey, rawValue] = parts
    if (parts.length !== 2 || rawKey === undefined || rawValue === undefined) {
      continue
    }
    const key = decodeComponent(rawKey)
    if (Either.isLeft(key)) {
      return Either.left(key.left)
    }
    const value = decodeComponent(rawValue)
    if (Either.isLeft(value)) {
      return Either.left(value.left)
    }
    params.set(key.right, value.right)
  }
  return Either.right(Object.fromEntries(params))
}
