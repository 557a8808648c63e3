import { Match } from "effect"

import type { AppError } from "./errors.js"

// CHANGE: render typed failures as one stderr line and an exit code
// WHY: lower layers never print; the program decides presentation
// REF: req-errors-render-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: exitCode(e) ≠ 0
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every rendered message names the error kind and, where known, its position
// COMPLEXITY: O(1)

export const renderError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CborDecodeError", (e) => `CBOR decode error (${e.reason}) at byte ${e.offset}: ${e.message}`),
    Match.tag("CborEncodeError", (e) => `CBOR encode error (${e.reason}): ${e.message}`),
    Match.tag(
      "JsonParseError",
      (e) => `JSON parse error (${e.reason}) at line ${e.line}, column ${e.column} (offset ${e.offset}): ${e.message}`
    ),
    Match.tag("JsonPrintError", (e) => `JSON print error (${e.reason}): ${e.message}`),
    Match.tag("Base64Error", (e) => `base64 error (${e.reason}) at offset ${e.offset}: ${e.message}`),
    Match.tag("IoError", (e) => `I/O error: ${e.message}`),
    Match.tag("ConfigError", (e) => `invalid config: ${e.message}`),
    Match.tag("FileError", (e) => `file error: ${e.message}`),
    Match.tag("CliError", (e) => `${e.message}\nRun 'cbd --help' for usage.`),
    Match.exhaustive
  )

// Usage errors exit with 2, everything else with 1.
export const exitCodeFor = (error: AppError): number => error._tag === "CliError" ? 2 : 1
