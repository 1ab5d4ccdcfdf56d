export { convert } from "./core/convert.js"
export { convertAst, convertWith } from "./core/convert-schema.js"
export {
  controller,
  describeDispatchError,
  dispatch,
  makeRouter,
  route,
  routeWith,
  toReply
} from "./core/dispatch.js"
export type { Controller, DispatchOptions, Endpoint, EndpointError, Reply, RequestLine, Router } from "./core/dispatch.js"
export {
  children,
  entries,
  equals,
  get,
  isArray,
  isBoolean,
  isComposite,
  isNull,
  isNumber,
  isObject,
  isString,
  jsonArray,
  jsonBoolean,
  jsonNull,
  jsonNumber,
  jsonObject,
  jsonObjectFromRecord,
  jsonString,
  keys,
  values
} from "./core/document.js"
export type {
  Document,
  DocumentTag,
  JsonArray,
  JsonBoolean,
  JsonMember,
  JsonNull,
  JsonNumber,
  JsonObject,
  JsonString
} from "./core/document.js"
export type { ConvertError, DispatchError } from "./core/errors.js"
export { buildRoute, joinMapping, matchRoute, parseQuery } from "./core/route.js"
export type { Params, Route } from "./core/route.js"
export { commaSink, curlySink, makeBufferSink, quoteSink, squareSink } from "./core/sink.js"
export type { Sink } from "./core/sink.js"
export { stringify } from "./core/stringify.js"
export { filterElements, filterMembers, mapElements } from "./core/transform.js"
export type { ElementPredicate, MemberPredicate, Transform } from "./core/transform.js"
export { accept } from "./core/traversal.js"
export type { Visitor } from "./core/traversal.js"
export { describeViolation, listViolations, validate, validateArrays, validateObjects } from "./core/validate.js"
export type { Violation } from "./core/validate.js"
