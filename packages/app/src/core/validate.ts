import type { Document, DocumentTag, JsonArray, JsonObject } from "./document.js"
import { entries, values } from "./document.js"
import { accept } from "./traversal.js"

// CHANGE: check object key uniqueness and array homogeneity on demand
// WHY: documents may be built in an invalid state; validity is a verdict, not a construction error
// QUOTE(TZ): n/a
// REF: req-validate-1
// SOURCE: n/a
// FORMAT THEOREM: validate(d) ↔ ∀o ∈ objects(d): unique(keys(o)) ∧ ∀a ∈ arrays(d): |tags(a)| ≤ 1
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: checks are per node; sibling objects never share a key set
// COMPLEXITY: O(n)

export type DuplicateKey = { readonly _tag: "DuplicateKey"; readonly key: string }
export type MixedArray = { readonly _tag: "MixedArray"; readonly tags: ReadonlyArray<DocumentTag> }

export type Violation = DuplicateKey | MixedArray

const duplicateKeys = (object: JsonObject): ReadonlyArray<DuplicateKey> => {
  const seen = new Set<string>()
  const result: Array<DuplicateKey> = []
  for (const [key] of entries(object)) {
    if (seen.has(key)) {
      result.push({ _tag: "DuplicateKey", key })
    }
    seen.add(key)
  }
  return result
}

const mixedTags = (array: JsonArray): ReadonlyArray<MixedArray> => {
  const tags = [...new Set(values(array).map((element) => element._tag))]
  return tags.length > 1 ? [{ _tag: "MixedArray", tags }] : []
}

/**
 * Collect every invariant violation in the document, in pre-order.
 *
 * @param document - Document to inspect.
 * @returns Violations; empty when the document is valid.
 *
 * @pure true
 * @invariant the whole tree is visited
 * @complexity O(n)
 */
export const listViolations = (document: Document): ReadonlyArray<Violation> => {
  const result: Array<Violation> = []
  accept(document, (node) => {
    if (node._tag === "JsonObject") {
      result.push(...duplicateKeys(node))
    }
    if (node._tag === "JsonArray") {
      result.push(...mixedTags(node))
    }
  })
  return result
}

export const validate = (document: Document): boolean => listViolations(document).length === 0

export const validateObjects = (document: Document): boolean =>
  listViolations(document).every((violation) => violation._tag !== "DuplicateKey")

export const validateArrays = (document: Document): boolean =>
  listViolations(document).every((violation) => violation._tag !== "MixedArray")

export const describeViolation = (violation: Violation): string =>
  violation._tag === "DuplicateKey"
    ? `duplicate key "${violation.key}"`
    : `array mixes ${violation.tags.join(", ")}`
