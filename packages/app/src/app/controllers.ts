import * as Schema from "@effect/schema/Schema"

import type { Controller } from "../core/dispatch.js"
import { controller, route, routeWith } from "../core/dispatch.js"

// CHANGE: declare the demo controllers served by the entrypoint
// WHY: exercise path variables, typed query parameters and record conversion end to end
// QUOTE(TZ): n/a
// REF: req-controllers-1
// SOURCE: n/a
// FORMAT THEOREM: GET /api/args?n=k&text=t → {t: t^k}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: handlers are pure functions of their decoded arguments
// COMPLEXITY: O(1) per handler

export class Pair<A, B> {
  constructor(readonly first: A, readonly second: B) {}
}

export enum EvalType {
  TEST = "TEST",
  PROJECT = "PROJECT",
  EXAM = "EXAM"
}

export class EvalItem {
  constructor(
    readonly name: string,
    readonly percentage: number,
    readonly mandatory: boolean,
    readonly type: EvalType | null
  ) {}
}

export class Course {
  constructor(
    readonly name: string,
    readonly credits: number,
    readonly evaluation: ReadonlyArray<EvalItem>
  ) {}
}

export const sampleCourse = (): Course =>
  new Course("PA", 6, [
    new EvalItem("quizzes", 0.2, false, null),
    new EvalItem("project", 0.8, true, EvalType.PROJECT)
  ])

const EvalItemJson = Schema.Struct({
  name: Schema.String,
  percentage: Schema.Number,
  mandatory: Schema.Boolean,
  type: Schema.NullOr(Schema.Enums(EvalType))
})

export const CourseJson = Schema.Struct({
  name: Schema.String,
  credits: Schema.Number,
  evaluation: Schema.Array(EvalItemJson)
})

const ArgsParams = Schema.Struct({
  n: Schema.NumberFromString.pipe(Schema.int(), Schema.nonNegative()),
  text: Schema.String
})

const PathParams = Schema.Struct({ pathvar: Schema.String })

export const apiController: Controller = controller("api", [
  route("ints", () => [1, 2, 3]),
  route("pair", () => new Pair("um", "dois")),
  routeWith("path/{pathvar}", PathParams, ({ pathvar }) => `${pathvar}!`),
  routeWith("args", ArgsParams, ({ n, text }) => new Map([[text, text.repeat(n)]])),
  route("course", sampleCourse, CourseJson)
])

export const controllers: ReadonlyArray<Controller> = [apiController]
