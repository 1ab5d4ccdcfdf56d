import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { defaultArgs } from "../../src/core/cli.js"
import { DEFAULT_PORT, resolveConfig } from "../../src/core/config.js"

describe("resolveConfig", () => {
  it.effect("falls back to defaults", () =>
    Effect.sync(() => {
      expect(resolveConfig(defaultArgs, undefined)).toEqual({ port: DEFAULT_PORT, strict: false })
    }))

  it.effect("uses file values when flags are absent", () =>
    Effect.sync(() => {
      expect(resolveConfig(defaultArgs, { port: 9100, strict: true })).toEqual({ port: 9100, strict: true })
    }))

  it.effect("lets flags override the file", () =>
    Effect.sync(() => {
      const cli = { ...defaultArgs, port: 9200, strict: false }
      expect(resolveConfig(cli, { port: 9100, strict: true })).toEqual({ port: 9200, strict: false })
    }))
})
