import { dual } from "effect/Function"

import type { Document, JsonArray, JsonObject } from "./document.js"
import { entries, jsonArray, jsonObject, values } from "./document.js"

// CHANGE: provide pure map/filter over composite documents
// WHY: express every change as construction of a new document
// QUOTE(TZ): n/a
// REF: req-transform-1
// SOURCE: n/a
// FORMAT THEOREM: mapElements(a, id) ≡ a; filterElements(a, const(true)) ≡ a; filterElements(a, const(false)) = []
// PURITY: CORE
// EFFECT: callbacks only
// INVARIANT: the source composite is never modified; survivors keep their order
// COMPLEXITY: O(n)

export type Transform = (element: Document) => Document
export type ElementPredicate = (element: Document) => boolean
export type MemberPredicate = (key: string, value: Document) => boolean

/**
 * Apply a transform to every element of an array.
 *
 * @pure true
 * @invariant result has the same length as the source
 */
export const mapElements: {
  (transform: Transform): (self: JsonArray) => JsonArray
  (self: JsonArray, transform: Transform): JsonArray
} = dual(
  2,
  (self: JsonArray, transform: Transform): JsonArray =>
    jsonArray(values(self).map((element) => transform(element)))
)

export const filterElements: {
  (predicate: ElementPredicate): (self: JsonArray) => JsonArray
  (self: JsonArray, predicate: ElementPredicate): JsonArray
} = dual(
  2,
  (self: JsonArray, predicate: ElementPredicate): JsonArray =>
    jsonArray(values(self).filter((element) => predicate(element)))
)

export const filterMembers: {
  (predicate: MemberPredicate): (self: JsonObject) => JsonObject
  (self: JsonObject, predicate: MemberPredicate): JsonObject
} = dual(
  2,
  (self: JsonObject, predicate: MemberPredicate): JsonObject =>
    jsonObject(entries(self).filter(([key, value]) => predicate(key, value)))
)
