import { Match } from "effect"

import type { Document } from "./document.js"
import { entries, values } from "./document.js"

// CHANGE: walk documents in pre-order with a visitor callback
// WHY: validation and inspection share one recursive walk instead of bespoke recursion
// QUOTE(TZ): n/a
// REF: req-traversal-1
// SOURCE: n/a
// FORMAT THEOREM: ∀d: visits(accept(d)) = [d, ...visits(children(d))]
// PURITY: CORE
// EFFECT: visitor side effects only
// INVARIANT: each node is visited exactly once, parents before children
// COMPLEXITY: O(n)

export type Visitor = (node: Document) => void

/**
 * Visit a document and all of its descendants in pre-order.
 *
 * @param document - Root of the walk.
 * @param visitor - Called once per node, before the node's children.
 *
 * @pure false
 * @effect visitor
 * @invariant children are visited in element/insertion order
 * @complexity O(n)
 */
export const accept = (document: Document, visitor: Visitor): void => {
  visitor(document)
  Match.value(document).pipe(
    Match.tag("JsonNull", "JsonBoolean", "JsonNumber", "JsonString", () => undefined),
    Match.tag("JsonArray", (array) => {
      for (const element of values(array)) {
        accept(element, visitor)
      }
    }),
    Match.tag("JsonObject", (object) => {
      for (const [, value] of entries(object)) {
        accept(value, visitor)
      }
    }),
    Match.exhaustive
  )
}
