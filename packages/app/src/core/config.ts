import type { Base64Alphabet } from "./base64.js"
import type { CliArgs } from "./cli.js"
import type { BytePolicy } from "./json-print.js"
import type { TranscodeSettings } from "./transcode.js"
import { DEFAULT_MAX_DEPTH } from "./value.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override config file and defaults deterministically
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: 1 ≤ maxDepth ≤ MAX_DEPTH_LIMIT
// COMPLEXITY: O(1)/O(1)

export const DEFAULT_CONFIG_PATH = "./.cbdrc.json"

export interface FileConfig {
  readonly maxDepth?: number
  readonly bytes?: BytePolicy
  readonly compact?: boolean
  readonly base64Alphabet?: Base64Alphabet
}

/**
 * Resolve the effective transcoding settings from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .cbdrc.json.
 * @returns Settings for the transcode pipeline.
 *
 * @pure true
 * @invariant mode and base64 routing come from the CLI only
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): TranscodeSettings => ({
  mode: cli.mode,
  base64: cli.base64,
  base64Alphabet: cli.base64Alphabet ?? fileConfig?.base64Alphabet ?? "standard",
  maxDepth: cli.maxDepth ?? fileConfig?.maxDepth ?? DEFAULT_MAX_DEPTH,
  bytes: cli.bytes ?? fileConfig?.bytes ?? "base64",
  compact: cli.compact ?? fileConfig?.compact ?? false
})
