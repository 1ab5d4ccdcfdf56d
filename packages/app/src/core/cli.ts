import * as Either from "effect/Either"

// CHANGE: implement deterministic CLI parsing for the JSON route server
// WHY: keep CLI decoding pure and testable at the boundary
// QUOTE(TZ): n/a
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.port ∈ [1, 65535] ∪ {undefined}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and positional arguments are rejected
// COMPLEXITY: O(n) where n = argv length

export interface CliArgs {
  readonly port: number | undefined
  readonly configPath: string
  readonly configExplicit: boolean
  readonly strict: boolean | undefined
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-")

const parseBoolean = (value: string): Either.Either<boolean, CliError> => {
  if (value === "true" || value === "1") {
    return Either.right(true)
  }
  if (value === "false" || value === "0") {
    return Either.right(false)
  }
  return Either.left(cliError(`Invalid boolean value: ${value}`))
}

const parsePort = (value: string): Either.Either<number, CliError> => {
  const port = Number(value)
  if (!/^\d+$/u.test(value) || port < 1 || port > 65_535) {
    return Either.left(cliError(`Invalid port: ${value}`))
  }
  return Either.right(port)
}

export const defaultArgs: CliArgs = {
  port: undefined,
  configPath: "./.json-document.json",
  configExplicit: false,
  strict: undefined
}

type ParsedFlag = { readonly next: CliArgs; readonly consumed: number }

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => Either.Either<CliArgs, CliError>
): Either.Either<ParsedFlag, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (value) =>
    Either.map(update(current, value), (next) => ({
      next,
      consumed: inlineValue === undefined ? 2 : 1
    })))

const parseOptionalBooleanFlag = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: boolean) => CliArgs
): Either.Either<ParsedFlag, CliError> => {
  const useNext = inlineValue === undefined && nextValue !== undefined && !isFlag(nextValue)
  const nextValueResolved = inlineValue ?? (useNext ? nextValue : "true")
  return Either.map(parseBoolean(nextValueResolved), (value) => ({
    next: update(current, value),
    consumed: useNext ? 2 : 1
  }))
}

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<ParsedFlag, CliError>

const flagParsers: Record<string, FlagParser> = {
  port: (current, inlineValue, nextValue) =>
    parseValueFlag("port", current, inlineValue, nextValue, (args, value) =>
      Either.map(parsePort(value), (port) => ({ ...args, port }))),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) =>
      Either.right({ ...args, configPath: value, configExplicit: true })),
  strict: (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      strict: value
    }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<ParsedFlag, CliError> => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const [name = "", inlineValue] = raw.slice(2).split("=", 2)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant values not given on the command line stay undefined
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  let args = defaultArgs
  let index = 0
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      return Either.left(cliError(`Unexpected positional argument: ${current}`))
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}
