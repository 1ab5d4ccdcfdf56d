import * as Schema from "@effect/schema/Schema"
import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { EvalType } from "../../src/app/controllers.js"
import { convert } from "../../src/core/convert.js"
import { convertAst, convertWith } from "../../src/core/convert-schema.js"
import type { ConvertError } from "../../src/core/errors.js"
import type { Document } from "../../src/core/document.js"
import { stringify } from "../../src/core/stringify.js"

const render = (result: Either.Either<Document, ConvertError>): string =>
  Either.match(result, {
    onLeft: (error) => `${error._tag}: ${error.message}`,
    onRight: (document) => stringify(document)
  })

const EvalItemSchema = Schema.Struct({
  name: Schema.String,
  percentage: Schema.Number,
  mandatory: Schema.Boolean,
  type: Schema.NullOr(Schema.Enums(EvalType))
})

const CourseSchema = Schema.Struct({
  name: Schema.String,
  credits: Schema.Number,
  evaluation: Schema.Array(EvalItemSchema)
})

enum Grade {
  Pass,
  Fail
}

interface Tree {
  readonly label: string
  readonly children: ReadonlyArray<Tree>
}

const TreeSchema: Schema.Schema<Tree> = Schema.Struct({
  label: Schema.String,
  children: Schema.Array(Schema.suspend(() => TreeSchema))
})

describe("convertWith", () => {
  it.effect("emits struct members in declaration order", () =>
    Effect.sync(() => {
      const course = {
        evaluation: [
          { type: null, mandatory: false, percentage: 0.2, name: "quizzes" },
          { type: EvalType.PROJECT, mandatory: true, percentage: 0.8, name: "project" }
        ],
        credits: 6,
        name: "PA"
      }
      expect(render(convertWith(CourseSchema)(course))).toBe(
        "{\"name\":\"PA\",\"credits\":6,\"evaluation\":[" +
          "{\"name\":\"quizzes\",\"percentage\":0.2,\"mandatory\":false,\"type\":null}," +
          "{\"name\":\"project\",\"percentage\":0.8,\"mandatory\":true,\"type\":\"PROJECT\"}]}"
      )
    }))

  it.effect("drops undeclared fields", () =>
    Effect.sync(() => {
      const value = { a: 1, b: 2 }
      expect(render(convertWith(Schema.Struct({ a: Schema.Number }))(value))).toBe("{\"a\":1}")
    }))

  it.effect("omits absent optional fields", () =>
    Effect.sync(() => {
      const schema = Schema.Struct({ a: Schema.Number, b: Schema.optional(Schema.String) })
      expect(render(convertWith(schema)({ a: 1 }))).toBe("{\"a\":1}")
      expect(render(convertWith(schema)({ a: 1, b: "x" }))).toBe("{\"a\":1,\"b\":\"x\"}")
    }))

  it.effect("emits numeric enum members by name", () =>
    Effect.sync(() => {
      expect(render(convertWith(Schema.Enums(Grade))(Grade.Fail))).toBe("\"Fail\"")
      expect(render(convert(Grade.Fail))).toBe("1")
    }))

  it.effect("converts records through the index signature", () =>
    Effect.sync(() => {
      const schema = Schema.Record({ key: Schema.String, value: Schema.Number })
      expect(render(convertWith(schema)({ x: 1, y: 2 }))).toBe("{\"x\":1,\"y\":2}")
    }))

  it.effect("converts tuples position by position", () =>
    Effect.sync(() => {
      const schema = Schema.Tuple(Schema.String, Schema.Number)
      expect(render(convertWith(schema)(["a", 1]))).toBe("[\"a\",1]")
    }))

  it.effect("follows recursive schemas", () =>
    Effect.sync(() => {
      const tree: Tree = { children: [{ children: [], label: "leaf" }], label: "root" }
      expect(render(convertWith(TreeSchema)(tree))).toBe(
        "{\"label\":\"root\",\"children\":[{\"label\":\"leaf\",\"children\":[]}]}"
      )
    }))
})

describe("convertAst", () => {
  it.effect("rejects a scalar where a struct is declared", () =>
    Effect.sync(() => {
      const result = convertAst(EvalItemSchema.ast, 42, [])
      expect(render(result)).toBe("UnsupportedShape: Cannot convert a value of type number")
    }))

  it.effect("falls back to runtime conversion for plain schemas", () =>
    Effect.sync(() => {
      expect(render(convertAst(Schema.Unknown.ast, [1, "a"], []))).toBe("[1,\"a\"]")
    }))
})
