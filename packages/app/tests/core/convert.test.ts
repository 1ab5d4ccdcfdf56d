import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { EvalItem, EvalType, Pair, sampleCourse } from "../../src/app/controllers.js"
import { convert } from "../../src/core/convert.js"
import { stringify } from "../../src/core/stringify.js"

const render = (value: unknown): string =>
  Either.match(convert(value), {
    onLeft: (error) => `${error._tag}: ${error.message}`,
    onRight: (document) => stringify(document)
  })

class Counter {
  count = 2

  get doubled(): number {
    return this.count * 2
  }
}

class Empty {}

describe("convert scalars", () => {
  it.effect("converts numbers, booleans and strings", () =>
    Effect.sync(() => {
      expect(render(18)).toBe("18")
      expect(render(9.18)).toBe("9.18")
      expect(render(true)).toBe("true")
      expect(render(false)).toBe("false")
      expect(render("Hello world!")).toBe("\"Hello world!\"")
    }))

  it.effect("converts null and undefined to null", () =>
    Effect.sync(() => {
      expect(render(null)).toBe("null")
      expect(render(undefined)).toBe("null")
    }))

  it.effect("converts a string enum member to its value", () =>
    Effect.sync(() => {
      expect(render(EvalType.EXAM)).toBe("\"EXAM\"")
    }))
})

describe("convert composites", () => {
  it.effect("converts a heterogeneous list without validating it", () =>
    Effect.sync(() => {
      expect(render([18, true, "Hello world!"])).toBe("[18,true,\"Hello world!\"]")
    }))

  it.effect("converts class instances by field order", () =>
    Effect.sync(() => {
      expect(render(new EvalItem("project", 0.8, true, EvalType.PROJECT))).toBe(
        "{\"name\":\"project\",\"percentage\":0.8,\"mandatory\":true,\"type\":\"PROJECT\"}"
      )
      expect(render(new Pair("um", "dois"))).toBe("{\"first\":\"um\",\"second\":\"dois\"}")
    }))

  it.effect("converts nested instances", () =>
    Effect.sync(() => {
      expect(render(sampleCourse())).toBe(
        "{\"name\":\"PA\",\"credits\":6,\"evaluation\":[" +
          "{\"name\":\"quizzes\",\"percentage\":0.2,\"mandatory\":false,\"type\":null}," +
          "{\"name\":\"project\",\"percentage\":0.8,\"mandatory\":true,\"type\":\"PROJECT\"}]}"
      )
    }))

  it.effect("skips getters and converts empty instances to {}", () =>
    Effect.sync(() => {
      expect(render(new Counter())).toBe("{\"count\":2}")
      expect(render(new Empty())).toBe("{}")
    }))

  it.effect("converts plain records in insertion order", () =>
    Effect.sync(() => {
      expect(render({ b: 1, a: 2 })).toBe("{\"b\":1,\"a\":2}")
    }))

  it.effect("converts a map with string keys", () =>
    Effect.sync(() => {
      expect(render(new Map([["x", 1], ["y", 2]]))).toBe("{\"x\":1,\"y\":2}")
    }))

  it.effect("converts a value shared by siblings twice", () =>
    Effect.sync(() => {
      const leaf = { v: 1 }
      expect(render([leaf, leaf])).toBe("[{\"v\":1},{\"v\":1}]")
    }))
})

describe("convert failures", () => {
  it.effect("rejects a map with a non-string key", () =>
    Effect.sync(() => {
      const result = convert(new Map<unknown, string>([["a", "x"], [1, "y"]]))
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left._tag).toBe("InvalidArgument")
        expect(result.left.message).toBe("Map keys must be Strings")
      }
    }))

  it.effect("rejects a non-string key nested inside a list", () =>
    Effect.sync(() => {
      expect(render([new Map([[true, 1]])])).toBe("InvalidArgument: Map keys must be Strings")
    }))

  it.effect("rejects functions, symbols and bigints", () =>
    Effect.sync(() => {
      const functionResult = convert(() => 1)
      expect(Either.isLeft(functionResult) && functionResult.left._tag).toBe("UnsupportedShape")
      expect(Either.isLeft(convert(Symbol("s")))).toBe(true)
      expect(Either.isLeft(convert(BigInt(1)))).toBe(true)
    }))

  it.effect("reports nesting deeper than the call stack", () =>
    Effect.sync(() => {
      let deep: unknown = []
      for (let depth = 0; depth < 100_000; depth++) {
        deep = [deep]
      }
      expect(render(deep)).toBe("NestingTooDeep: Value is nested too deeply to convert")
    }))

  it.effect("rejects a value that contains itself", () =>
    Effect.sync(() => {
      const node: Record<string, unknown> = { name: "loop" }
      node["self"] = node
      const result = convert(node)
      expect(Either.isLeft(result) && result.left._tag).toBe("CyclicValue")
    }))
})
