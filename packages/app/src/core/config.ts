import type { CliArgs } from "./cli.js"

// CHANGE: define config merging rules and defaults for the server
// WHY: ensure CLI flags override the config file and defaults deterministically
// QUOTE(TZ): n/a
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved port is always defined
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly port?: number
  readonly strict?: boolean
}

export interface ResolvedConfig {
  readonly port: number
  readonly strict: boolean
}

export const DEFAULT_PORT = 8080

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .json-document.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @invariant strict defaults to false
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  port: cli.port ?? fileConfig?.port ?? DEFAULT_PORT,
  strict: cli.strict ?? fileConfig?.strict ?? false
})
