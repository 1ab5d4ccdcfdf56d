import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { defaultArgs, parseCliArgs } from "../../src/core/cli.js"

const parse = (...args: ReadonlyArray<string>) => parseCliArgs(["node", "cli", ...args])

const failure = (...args: ReadonlyArray<string>): string | undefined => {
  const result = parse(...args)
  return Either.isLeft(result) ? result.left.message : undefined
}

describe("parseCliArgs", () => {
  it.effect("returns defaults without flags", () =>
    Effect.sync(() => {
      expect(parse()).toEqual(Either.right(defaultArgs))
    }))

  it.effect("reads port and strict flags", () =>
    Effect.sync(() => {
      expect(parse("--port", "9000", "--strict")).toEqual(
        Either.right({ ...defaultArgs, port: 9000, strict: true })
      )
      expect(parse("--port=9001", "--strict", "false")).toEqual(
        Either.right({ ...defaultArgs, port: 9001, strict: false })
      )
    }))

  it.effect("marks an explicit config path", () =>
    Effect.sync(() => {
      expect(parse("--config", "custom.json")).toEqual(
        Either.right({ ...defaultArgs, configPath: "custom.json", configExplicit: true })
      )
    }))

  it.effect("rejects bad input", () =>
    Effect.sync(() => {
      expect(failure("--port=abc")).toBe("Invalid port: abc")
      expect(failure("--port", "70000")).toBe("Invalid port: 70000")
      expect(failure("--port")).toBe("Missing value for --port")
      expect(failure("--bogus")).toBe("Unknown flag: --bogus")
      expect(failure("serve")).toBe("Unexpected positional argument: serve")
      expect(failure("--strict=maybe")).toBe("Invalid boolean value: maybe")
    }))
})
