import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for conversion, dispatch and the server program
// WHY: provide typed failures that callers can match exhaustively
// QUOTE(TZ): "Map keys must be Strings"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError ∪ DispatchError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type InvalidArgument = { readonly _tag: "InvalidArgument"; readonly message: string }
export type UnsupportedShape = {
  readonly _tag: "UnsupportedShape"
  readonly shape: string
  readonly message: string
}
export type CyclicValue = { readonly _tag: "CyclicValue"; readonly message: string }

export type NestingTooDeep = { readonly _tag: "NestingTooDeep"; readonly message: string }

export type ConvertError = InvalidArgument | UnsupportedShape | CyclicValue | NestingTooDeep

export type NotFound = { readonly _tag: "NotFound"; readonly path: string }
export type MethodNotAllowed = { readonly _tag: "MethodNotAllowed"; readonly method: string }
export type BadRequest = { readonly _tag: "BadRequest"; readonly message: string }
export type HandlerFailed = { readonly _tag: "HandlerFailed"; readonly message: string }
export type ConversionFailed = { readonly _tag: "ConversionFailed"; readonly cause: ConvertError }
export type InvalidDocument = {
  readonly _tag: "InvalidDocument"
  readonly violations: ReadonlyArray<string>
}

export type DispatchError =
  | NotFound
  | MethodNotAllowed
  | BadRequest
  | HandlerFailed
  | ConversionFailed
  | InvalidDocument

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type ServeError = { readonly _tag: "ServeError"; readonly message: string }

export type AppError = CliError | ConfigError | FileError | ServeError

export const mapKeyNotString = (): InvalidArgument => ({
  _tag: "InvalidArgument",
  message: "Map keys must be Strings"
})

export const unsupportedShape = (shape: string): UnsupportedShape => ({
  _tag: "UnsupportedShape",
  shape,
  message: `Cannot convert a value of type ${shape}`
})

export const cyclicValue = (): CyclicValue => ({
  _tag: "CyclicValue",
  message: "Cannot convert a value that contains itself"
})

export const nestingTooDeep = (): NestingTooDeep => ({
  _tag: "NestingTooDeep",
  message: "Value is nested too deeply to convert"
})

export const notFound = (path: string): NotFound => ({ _tag: "NotFound", path })

export const methodNotAllowed = (method: string): MethodNotAllowed => ({
  _tag: "MethodNotAllowed",
  method
})

export const badRequest = (message: string): BadRequest => ({ _tag: "BadRequest", message })

export const handlerFailed = (message: string): HandlerFailed => ({ _tag: "HandlerFailed", message })

export const conversionFailed = (cause: ConvertError): ConversionFailed => ({
  _tag: "ConversionFailed",
  cause
})

export const invalidDocument = (violations: ReadonlyArray<string>): InvalidDocument => ({
  _tag: "InvalidDocument",
  violations
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const serveError = (message: string): ServeError => ({
  _tag: "ServeError",
  message
})
