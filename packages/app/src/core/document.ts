import { Match } from "effect"
import * as Option from "effect/Option"

// CHANGE: introduce the closed Document union for JSON-like values
// WHY: every consumer matches the six variants exhaustively, so adding one is a compile-time decision
// QUOTE(TZ): n/a
// REF: req-document-1
// SOURCE: n/a
// FORMAT THEOREM: ∀d ∈ Document: d._tag ∈ {JsonNull, JsonBoolean, JsonNumber, JsonString, JsonArray, JsonObject}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: documents are frozen trees; composites own their children
// COMPLEXITY: O(n) construction, O(1) access

export type JsonNull = { readonly _tag: "JsonNull" }
export type JsonBoolean = { readonly _tag: "JsonBoolean"; readonly value: boolean }
export type JsonNumber = { readonly _tag: "JsonNumber"; readonly value: number }
export type JsonString = { readonly _tag: "JsonString"; readonly value: string }
export type JsonArray = { readonly _tag: "JsonArray"; readonly elements: ReadonlyArray<Document> }

export type JsonMember = readonly [key: string, value: Document]

export type JsonObject = { readonly _tag: "JsonObject"; readonly members: ReadonlyArray<JsonMember> }

export type Document =
  | JsonNull
  | JsonBoolean
  | JsonNumber
  | JsonString
  | JsonArray
  | JsonObject

export type DocumentTag = Document["_tag"]

const NULL: JsonNull = Object.freeze({ _tag: "JsonNull" })

export const jsonNull = (): JsonNull => NULL

export const jsonBoolean = (value: boolean): JsonBoolean => Object.freeze({ _tag: "JsonBoolean", value })

export const jsonNumber = (value: number): JsonNumber => Object.freeze({ _tag: "JsonNumber", value })

export const jsonString = (value: string): JsonString => Object.freeze({ _tag: "JsonString", value })

/**
 * Build an array document. Elements are copied; mixed tags are accepted and only
 * rejected by an explicit validation pass.
 *
 * @pure true
 * @invariant result.elements is frozen and preserves iteration order
 */
export const jsonArray = (elements: Iterable<Document> = []): JsonArray =>
  Object.freeze({ _tag: "JsonArray", elements: Object.freeze([...elements]) })

/**
 * Build an object document from key/value pairs in insertion order.
 * A repeated key is kept as a second member; validation reports it.
 *
 * @pure true
 * @invariant result.members is frozen and preserves iteration order
 */
export const jsonObject = (members: Iterable<readonly [string, Document]> = []): JsonObject => {
  const frozen: Array<JsonMember> = []
  for (const [key, value] of members) {
    frozen.push(Object.freeze([key, value] as const))
  }
  return Object.freeze({ _tag: "JsonObject", members: Object.freeze(frozen) })
}

export const jsonObjectFromRecord = (record: Readonly<Record<string, Document>>): JsonObject =>
  jsonObject(Object.entries(record))

export const values = (array: JsonArray): ReadonlyArray<Document> => array.elements

export const entries = (object: JsonObject): ReadonlyArray<JsonMember> => object.members

export const keys = (object: JsonObject): ReadonlyArray<string> => object.members.map(([key]) => key)

export const get = (object: JsonObject, key: string): Option.Option<Document> => {
  const member = object.members.find(([candidate]) => candidate === key)
  return member === undefined ? Option.none() : Option.some(member[1])
}

export const isNull = (document: Document): document is JsonNull => document._tag === "JsonNull"
export const isBoolean = (document: Document): document is JsonBoolean => document._tag === "JsonBoolean"
export const isNumber = (document: Document): document is JsonNumber => document._tag === "JsonNumber"
export const isString = (document: Document): document is JsonString => document._tag === "JsonString"
export const isArray = (document: Document): document is JsonArray => document._tag === "JsonArray"
export const isObject = (document: Document): document is JsonObject => document._tag === "JsonObject"

export const isComposite = (document: Document): document is JsonArray | JsonObject =>
  isArray(document) || isObject(document)

/**
 * Direct children of a document: elements of an array, member values of an object.
 *
 * @pure true
 * @invariant scalars have no children
 * @complexity O(n)
 */
export const children = (document: Document): ReadonlyArray<Document> =>
  Match.value(document).pipe(
    Match.tag("JsonNull", "JsonBoolean", "JsonNumber", "JsonString", () => []),
    Match.tag("JsonArray", (array) => values(array)),
    Match.tag("JsonObject", (object) => entries(object).map(([, value]) => value)),
    Match.exhaustive
  )

const sameNumber = (left: number, right: number): boolean =>
  left === right || (Number.isNaN(left) && Number.isNaN(right))

const sameElements = (left: ReadonlyArray<Document>, right: ReadonlyArray<Document>): boolean =>
  left.length === right.length && left.every((element, index) => {
    const other = right[index]
    return other !== undefined && equals(element, other)
  })

// Each member of `left` consumes a distinct equal member of `right`.
const sameMembers = (left: ReadonlyArray<JsonMember>, right: ReadonlyArray<JsonMember>): boolean => {
  if (left.length !== right.length) {
    return false
  }
  const used = new Set<number>()
  return left.every(([key, value]) => {
    const index = right.findIndex(([otherKey, otherValue], position) =>
      !used.has(position) && otherKey === key && equals(value, otherValue)
    )
    if (index === -1) {
      return false
    }
    used.add(index)
    return true
  })
}

/**
 * Structural equality between two documents.
 *
 * @param left - First document.
 * @param right - Second document.
 * @returns true when tags match and payloads or children are recursively equal;
 * object members compare as multisets, so order is ignored but repeats count.
 *
 * @pure true
 * @invariant equals(d, d) for every d
 * @complexity O(n) for arrays, O(n²) for objects
 */
export const equals = (left: Document, right: Document): boolean =>
  Match.value(left).pipe(
    Match.tag("JsonNull", () => isNull(right)),
    Match.tag("JsonBoolean", (node) => isBoolean(right) && node.value === right.value),
    Match.tag("JsonNumber", (node) => isNumber(right) && sameNumber(node.value, right.value)),
    Match.tag("JsonString", (node) => isString(right) && node.value === right.value),
    Match.tag("JsonArray", (node) => isArray(right) && sameElements(node.elements, right.elements)),
    Match.tag("JsonObject", (node) => isObject(right) && sameMembers(node.members, right.members)),
    Match.exhaustive
  )
