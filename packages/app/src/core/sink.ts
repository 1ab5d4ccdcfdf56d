// CHANGE: add composable text sinks for serializer output
// WHY: keep quoting, bracketing and separation as independent, swappable wrappers
// QUOTE(TZ): n/a
// REF: req-sink-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s,t: snapshot(wrap(s)) = snapshot(s); wrap(s).write(t) = s.write(render(t))
// PURITY: CORE
// EFFECT: in-memory buffer mutation
// INVARIANT: wrappers forward newline and snapshot unchanged
// COMPLEXITY: O(1) per write

export interface Sink {
  readonly write: (text: string) => void
  readonly newline: () => void
  readonly snapshot: () => string
}

/**
 * Sink that accumulates every fragment in memory.
 *
 * @returns Fresh sink with an empty buffer.
 *
 * @pure false
 * @effect local buffer
 * @invariant snapshot() is the concatenation of all writes and newlines in order
 * @complexity O(1) per write, O(n) per snapshot
 */
export const makeBufferSink = (): Sink => {
  const chunks: Array<string> = []
  return {
    write: (text) => {
      chunks.push(text)
    },
    newline: () => {
      chunks.push("\n")
    },
    snapshot: () => chunks.join("")
  }
}

const wrapWith = (inner: Sink, render: (text: string) => string): Sink => ({
  write: (text) => inner.write(render(text)),
  newline: () => inner.newline(),
  snapshot: () => inner.snapshot()
})

export const quoteSink = (inner: Sink): Sink => wrapWith(inner, (text) => `"${text}"`)

export const curlySink = (inner: Sink): Sink => wrapWith(inner, (text) => `{${text}}`)

export const squareSink = (inner: Sink): Sink => wrapWith(inner, (text) => `[${text}]`)

// One instance per member list: the first-write flag never resets.
export const commaSink = (inner: Sink): Sink => {
  let first = true
  return {
    write: (text) => {
      if (!first) {
        inner.write(",")
      }
      inner.write(text)
      first = false
    },
    newline: () => inner.newline(),
    snapshot: () => inner.snapshot()
  }
}
