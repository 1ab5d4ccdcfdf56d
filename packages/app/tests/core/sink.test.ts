import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { commaSink, curlySink, makeBufferSink, quoteSink, squareSink } from "../../src/core/sink.js"

describe("sinks", () => {
  it.effect("buffer concatenates writes and newlines", () =>
    Effect.sync(() => {
      const sink = makeBufferSink()
      sink.write("a")
      sink.newline()
      sink.write("b")
      expect(sink.snapshot()).toBe("a\nb")
    }))

  it.effect("wrappers surround each fragment", () =>
    Effect.sync(() => {
      const buffer = makeBufferSink()
      quoteSink(buffer).write("q")
      curlySink(buffer).write("c")
      squareSink(buffer).write("s")
      expect(buffer.snapshot()).toBe("\"q\"{c}[s]")
    }))

  it.effect("comma separates fragments after the first", () =>
    Effect.sync(() => {
      const buffer = makeBufferSink()
      const separated = commaSink(buffer)
      separated.write("1")
      separated.write("2")
      separated.write("3")
      expect(separated.snapshot()).toBe("1,2,3")
    }))

  it.effect("wrappers compose", () =>
    Effect.sync(() => {
      const buffer = makeBufferSink()
      const quoted = quoteSink(commaSink(buffer))
      quoted.write("a")
      quoted.write("b")
      expect(quoted.snapshot()).toBe("\"a\",\"b\"")
    }))

  it.effect("wrappers forward newlines untouched", () =>
    Effect.sync(() => {
      const buffer = makeBufferSink()
      squareSink(buffer).newline()
      expect(buffer.snapshot()).toBe("\n")
    }))
})
