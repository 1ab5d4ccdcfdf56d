import * as AST from "@effect/schema/AST"
import * as Schema from "@effect/schema/Schema"
import { Match } from "effect"
import * as Either from "effect/Either"

import type { Ancestors } from "./convert.js"
import { convertValue, guardDepth, isRecord } from "./convert.js"
import type { Document } from "./document.js"
import { jsonArray, jsonObject, jsonString } from "./document.js"
import type { ConvertError } from "./errors.js"
import { cyclicValue, unsupportedShape } from "./errors.js"

// CHANGE: convert values along a declared schema instead of runtime shape
// WHY: field order and enum member names come from the declaration, not from the value
// QUOTE(TZ): n/a
// REF: req-convert-schema-1
// SOURCE: n/a
// FORMAT THEOREM: ∀S ∈ Struct, v ∈ S: keys(convertWith(S)(v)) = declared(S) \ absentOptional(v)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: schema nodes without structure defer to convertValue
// COMPLEXITY: O(n) plus union membership checks

type Converted = Either.Either<Document, ConvertError>

const shapeOf = (value: unknown): string => (value === null ? "null" : Array.isArray(value) ? "array" : typeof value)

const enter = (value: object, ancestors: Ancestors): Either.Either<Ancestors, ConvertError> =>
  ancestors.includes(value) ? Either.left(cyclicValue()) : Either.right([...ancestors, value])

const convertMember = (
  members: Array<readonly [string, Document]>,
  key: string,
  ast: AST.AST,
  field: unknown,
  ancestors: Ancestors
): ConvertError | undefined => {
  const converted = convertAst(ast, field, ancestors)
  if (Either.isLeft(converted)) {
    return converted.left
  }
  members.push([key, converted.right])
  return undefined
}

const convertTypeLiteral = (ast: AST.TypeLiteral, value: unknown, ancestors: Ancestors): Converted => {
  if (!isRecord(value) || Array.isArray(value)) {
    return Either.left(unsupportedShape(shapeOf(value)))
  }
  const entered = enter(value, ancestors)
  if (Either.isLeft(entered)) {
    return Either.left(entered.left)
  }
  const fields = new Map<string, unknown>(Object.entries(value))
  const members: Array<readonly [string, Document]> = []
  const declared = new Set<string>()
  for (const signature of ast.propertySignatures) {
    const name = signature.name
    if (typeof name !== "string") {
      continue
    }
    declared.add(name)
    const field = fields.get(name)
    if (field === undefined && signature.isOptional) {
      continue
    }
    const failure = convertMember(members, name, signature.type, field, entered.right)
    if (failure !== undefined) {
      return Either.left(failure)
    }
  }
  const index = ast.indexSignatures[0]
  if (index !== undefined) {
    for (const [key, field] of fields) {
      if (declared.has(key)) {
        continue
      }
      const failure = convertMember(members, key, index.type, field, entered.right)
      if (failure !== undefined) {
        return Either.left(failure)
      }
    }
  }
  return Either.right(jsonObject(members))
}

const convertTuple = (ast: AST.TupleType, value: unknown, ancestors: Ancestors): Converted => {
  if (!Array.isArray(value)) {
    return Either.left(unsupportedShape(shapeOf(value)))
  }
  const entered = enter(value, ancestors)
  if (Either.isLeft(entered)) {
    return Either.left(entered.left)
  }
  const items: ReadonlyArray<unknown> = value
  const rest = ast.rest[0]
  const result: Array<Document> = []
  for (const [position, item] of items.entries()) {
    const element = ast.elements[position] ?? rest
    const converted = element === undefined
      ? convertValue(item, entered.right)
      : convertAst(element.type, item, entered.right)
    if (Either.isLeft(converted)) {
      return Either.left(converted.left)
    }
    result.push(converted.right)
  }
  return Either.right(jsonArray(result))
}

const convertEnum = (ast: AST.Enums, value: unknown): Converted => {
  const member = ast.enums.find(([, candidate]) => candidate === value)
  return member === undefined
    ? Either.left(unsupportedShape(shapeOf(value)))
    : Either.right(jsonString(member[0]))
}

const convertUnion = (ast: AST.Union, value: unknown, ancestors: Ancestors): Converted => {
  const member = ast.types.find((candidate) => Schema.is(Schema.make(candidate))(value))
  return member === undefined ? convertValue(value, ancestors) : convertAst(member, value, ancestors)
}

/**
 * Convert a value along a schema AST node.
 *
 * @param ast - Schema node describing the value.
 * @param value - Value to convert.
 * @param ancestors - Composite values currently being converted.
 * @returns Document or a typed ConvertError.
 *
 * @pure true
 * @invariant unsupported AST nodes fall back to runtime inspection
 * @complexity O(n)
 */
export const convertAst = (ast: AST.AST, value: unknown, ancestors: Ancestors): Converted =>
  Match.value(ast).pipe(
    Match.tag("TypeLiteral", (node) => convertTypeLiteral(node, value, ancestors)),
    Match.tag("TupleType", (node) => convertTuple(node, value, ancestors)),
    Match.tag("Enums", (node) => convertEnum(node, value)),
    Match.tag("Union", (node) => convertUnion(node, value, ancestors)),
    Match.tag("Suspend", (node) => convertAst(node.f(), value, ancestors)),
    Match.tag("Refinement", (node) => convertAst(node.from, value, ancestors)),
    Match.orElse(() => convertValue(value, ancestors))
  )

/**
 * Build a converter that follows the schema's declared shape.
 *
 * Struct members come out in declaration order and undeclared fields are
 * dropped; enum members become their declared names.
 *
 * @param schema - Schema describing the values to convert.
 * @returns Function converting one value.
 *
 * @pure true
 * @invariant output member order equals the schema's property order
 * @complexity O(n)
 */
export const convertWith = <A, I, R>(
  schema: Schema.Schema<A, I, R>
): (value: A) => Converted =>
(value) => guardDepth(() => convertAst(schema.ast, value, []))
