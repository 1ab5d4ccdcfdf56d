import { Match } from "effect"

import type { Document, JsonArray, JsonObject } from "./document.js"
import { entries, values } from "./document.js"
import type { Sink } from "./sink.js"
import { commaSink, curlySink, makeBufferSink, quoteSink, squareSink } from "./sink.js"

// CHANGE: serialize documents to compact JSON text through the sink pipeline
// WHY: recursive descent stays free of bracket/quote/comma concatenation
// QUOTE(TZ): n/a
// REF: req-stringify-1
// SOURCE: n/a
// FORMAT THEOREM: ∀d: stringify(d) = stringify(d) ∧ stringify(d) contains no insignificant whitespace
// PURITY: CORE
// EFFECT: writes to the supplied sink
// INVARIANT: only '"' is escaped inside strings and keys
// COMPLEXITY: O(n·d) where n = document size, d = nesting depth

// Backslashes and control characters pass through untouched.
const escapeQuotes = (text: string): string => text.replaceAll("\"", "\\\"")

const renderNumber = (value: number): string => String(value)

const writeArray = (array: JsonArray, sink: Sink): void => {
  const inner = makeBufferSink()
  const separated = commaSink(inner)
  for (const element of values(array)) {
    write(element, separated)
  }
  squareSink(sink).write(inner.snapshot())
}

const writeObject = (object: JsonObject, sink: Sink): void => {
  const inner = makeBufferSink()
  const separated = commaSink(inner)
  for (const [key, value] of entries(object)) {
    const member = makeBufferSink()
    quoteSink(member).write(escapeQuotes(key))
    member.write(":")
    write(value, member)
    separated.write(member.snapshot())
  }
  curlySink(sink).write(inner.snapshot())
}

const write = (document: Document, sink: Sink): void =>
  Match.value(document).pipe(
    Match.tag("JsonNull", () => sink.write("null")),
    Match.tag("JsonBoolean", (node) => sink.write(node.value ? "true" : "false")),
    Match.tag("JsonNumber", (node) => sink.write(renderNumber(node.value))),
    Match.tag("JsonString", (node) => quoteSink(sink).write(escapeQuotes(node.value))),
    Match.tag("JsonArray", (node) => writeArray(node, sink)),
    Match.tag("JsonObject", (node) => writeObject(node, sink)),
    Match.exhaustive
  )

/**
 * Serialize a document as compact JSON text.
 *
 * @param document - Document to serialize; it does not need to be valid.
 * @param sink - Output target, a fresh buffer by default.
 * @returns The sink's snapshot after writing.
 *
 * @pure true for the default sink
 * @invariant never fails; snapshot() is taken once per call
 * @complexity O(n·d) where d = nesting depth
 */
export const stringify = (document: Document, sink: Sink = makeBufferSink()): string => {
  write(document, sink)
  return sink.snapshot()
}
