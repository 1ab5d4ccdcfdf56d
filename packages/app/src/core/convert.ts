import * as Either from "effect/Either"
import { identity } from "effect/Function"

import type { Document } from "./document.js"
import { jsonArray, jsonBoolean, jsonNull, jsonNumber, jsonObject, jsonString } from "./document.js"
import type { ConvertError } from "./errors.js"
import { cyclicValue, mapKeyNotString, nestingTooDeep, unsupportedShape } from "./errors.js"

// CHANGE: lift in-memory values into documents by runtime shape inspection
// WHY: handlers return plain values; the serializer only understands documents
// QUOTE(TZ): "Map keys must be Strings"
// REF: req-convert-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ Supported: convert(v) = Right(d); ∀m ∈ Map with k ∉ String: convert(m) = Left(InvalidArgument)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: record members follow own-property definition order
// COMPLEXITY: O(n) where n = number of reachable values

export type Ancestors = ReadonlyArray<object>

type Converted = Either.Either<Document, ConvertError>

export const isRecord = (value: unknown): value is object => typeof value === "object" && value !== null

const convertElements = (items: ReadonlyArray<unknown>, ancestors: Ancestors): Converted => {
  const result: Array<Document> = []
  for (const item of items) {
    const converted = convertValue(item, ancestors)
    if (Either.isLeft(converted)) {
      return Either.left(converted.left)
    }
    result.push(converted.right)
  }
  return Either.right(jsonArray(result))
}

const convertMap = (map: ReadonlyMap<unknown, unknown>, ancestors: Ancestors): Converted => {
  const members: Array<readonly [string, Document]> = []
  for (const [key, item] of map) {
    if (typeof key !== "string") {
      return Either.left(mapKeyNotString())
    }
    const converted = convertValue(item, ancestors)
    if (Either.isLeft(converted)) {
      return Either.left(converted.left)
    }
    members.push([key, converted.right])
  }
  return Either.right(jsonObject(members))
}

// Own enumerable string keys: prototype getters and methods stay out.
const convertFields = (record: object, ancestors: Ancestors): Converted => {
  const fields: ReadonlyArray<readonly [string, unknown]> = Object.entries(record)
  const members: Array<readonly [string, Document]> = []
  for (const [key, field] of fields) {
    const converted = convertValue(field, ancestors)
    if (Either.isLeft(converted)) {
      return Either.left(converted.left)
    }
    members.push([key, converted.right])
  }
  return Either.right(jsonObject(members))
}

const convertComposite = (value: object, ancestors: Ancestors): Converted => {
  if (ancestors.includes(value)) {
    return Either.left(cyclicValue())
  }
  const nested = [...ancestors, value]
  if (Array.isArray(value)) {
    return convertElements(value, nested)
  }
  if (value instanceof Map) {
    return convertMap(value, nested)
  }
  return convertFields(value, nested)
}

/**
 * Convert a value reachable below the given ancestors.
 *
 * @param value - Any in-memory value.
 * @param ancestors - Composite values currently being converted, outermost first.
 * @returns Document or a typed ConvertError.
 *
 * @pure true
 * @invariant a composite that appears among its own ancestors fails with CyclicValue
 * @complexity O(n·d) where d = nesting depth
 */
export const convertValue = (value: unknown, ancestors: Ancestors): Converted => {
  if (value === null || value === undefined) {
    return Either.right(jsonNull())
  }
  if (typeof value === "number") {
    return Either.right(jsonNumber(value))
  }
  if (typeof value === "boolean") {
    return Either.right(jsonBoolean(value))
  }
  if (typeof value === "string") {
    return Either.right(jsonString(value))
  }
  if (isRecord(value)) {
    return convertComposite(value, ancestors)
  }
  return Either.left(unsupportedShape(typeof value))
}

/**
 * Run a conversion, reporting call-stack exhaustion as NestingTooDeep.
 *
 * @pure true
 * @invariant errors other than RangeError are rethrown unchanged
 */
export const guardDepth = (run: () => Converted): Converted =>
  Either.flatMap(
    Either.try({
      try: run,
      catch: (error) => {
        if (error instanceof RangeError) {
          return nestingTooDeep()
        }
        throw error
      }
    }),
    identity
  )

/**
 * Convert an in-memory value into a Document.
 *
 * Numbers, booleans and strings become scalars; arrays become JsonArray;
 * null and undefined become JsonNull; a Map becomes JsonObject when every key
 * is a string; any other object becomes JsonObject of its own enumerable
 * fields in definition order. String enum members convert to their value.
 *
 * Own fields are all that is visible at run time: class-body fields are
 * emitted alongside constructor fields. Use convertWith for a declared shape.
 *
 * @param value - Value to convert.
 * @returns Document, InvalidArgument for non-string Map keys,
 * UnsupportedShape for functions, symbols and bigints, CyclicValue for
 * self-containing values, NestingTooDeep when the stack is exhausted.
 *
 * @pure true
 * @invariant failures are returned as ConvertError, except errors thrown by user-defined getters
 * @complexity O(n·d) where d = nesting depth
 */
export const convert = (value: unknown): Converted => guardDepth(() => convertValue(value, []))
