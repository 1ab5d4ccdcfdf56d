import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import { pipe } from "effect/Function"

import type { Document } from "../../src/core/document.js"
import { equals, isNumber, jsonArray, jsonNumber, jsonObject, jsonString } from "../../src/core/document.js"
import { stringify } from "../../src/core/stringify.js"
import { filterElements, filterMembers, mapElements } from "../../src/core/transform.js"

const numbers = jsonArray([jsonNumber(1), jsonNumber(2), jsonNumber(3)])

const double = (element: Document): Document => isNumber(element) ? jsonNumber(element.value * 2) : element

describe("mapElements", () => {
  it.effect("applies the transform to every element", () =>
    Effect.sync(() => {
      expect(stringify(mapElements(numbers, double))).toBe("[2,4,6]")
    }))

  it.effect("leaves the source untouched", () =>
    Effect.sync(() => {
      mapElements(numbers, double)
      expect(stringify(numbers)).toBe("[1,2,3]")
    }))

  it.effect("returns an equal array for the identity", () =>
    Effect.sync(() => {
      expect(equals(mapElements(numbers, (element) => element), numbers)).toBe(true)
    }))

  it.effect("supports the data-last form", () =>
    Effect.sync(() => {
      expect(stringify(pipe(numbers, mapElements(double)))).toBe("[2,4,6]")
    }))

  it.effect("propagates a failing transform", () =>
    Effect.sync(() => {
      expect(() =>
        mapElements(numbers, () => {
          throw new Error("boom")
        })
      ).toThrow("boom")
    }))
})

describe("filterElements", () => {
  it.effect("keeps matching elements in order", () =>
    Effect.sync(() => {
      const kept = filterElements(numbers, (element) => isNumber(element) && element.value > 1)
      expect(stringify(kept)).toBe("[2,3]")
    }))

  it.effect("handles constant predicates", () =>
    Effect.sync(() => {
      expect(equals(filterElements(numbers, () => true), numbers)).toBe(true)
      expect(stringify(pipe(numbers, filterElements(() => false)))).toBe("[]")
    }))
})

describe("filterMembers", () => {
  it.effect("removes members by key", () =>
    Effect.sync(() => {
      const object = jsonObject([["a", jsonNumber(1)], ["b", jsonNumber(2)]])
      expect(stringify(filterMembers(object, (key) => key !== "a"))).toBe("{\"b\":2}")
      expect(stringify(object)).toBe("{\"a\":1,\"b\":2}")
    }))

  it.effect("filters by value", () =>
    Effect.sync(() => {
      const object = jsonObject([["a", jsonString("x")], ["b", jsonNumber(2)]])
      const kept = pipe(object, filterMembers((_key, value) => isNumber(value)))
      expect(stringify(kept)).toBe("{\"b\":2}")
    }))
})
