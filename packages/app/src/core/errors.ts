import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for the transcoder
// WHY: every stage returns typed failures so the program decides presentation and exit code
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique; positions are zero-based byte or code-unit offsets
// COMPLEXITY: O(1)/O(1)

export type CborDecodeReason =
  | "UnexpectedEof"
  | "InvalidAdditionalInfo"
  | "UnexpectedBreak"
  | "MalformedIndefiniteString"
  | "InvalidTextString"
  | "DepthExceeded"
  | "TrailingData"

export type CborDecodeError = {
  readonly _tag: "CborDecodeError"
  readonly reason: CborDecodeReason
  readonly offset: number
  readonly message: string
}

export type CborEncodeError = {
  readonly _tag: "CborEncodeError"
  readonly reason: "UnsupportedValue"
  readonly message: string
}

export type JsonParseReason = "SyntaxError" | "InvalidEscape" | "TrailingData" | "DepthExceeded"

export type JsonParseError = {
  readonly _tag: "JsonParseError"
  readonly reason: JsonParseReason
  readonly offset: number
  readonly line: number
  readonly column: number
  readonly message: string
}

export type JsonPrintReason = "NonStringMapKey" | "UnsupportedValue"

export type JsonPrintError = {
  readonly _tag: "JsonPrintError"
  readonly reason: JsonPrintReason
  readonly message: string
}

export type Base64Reason = "InvalidCharacter" | "InvalidLength"

export type Base64Error = {
  readonly _tag: "Base64Error"
  readonly reason: Base64Reason
  readonly offset: number
  readonly message: string
}

export type IoError = { readonly _tag: "IoError"; readonly message: string }
export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }

export type TranscodeError =
  | CborDecodeError
  | CborEncodeError
  | JsonParseError
  | JsonPrintError
  | Base64Error

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | IoError
  | TranscodeError

export const cborDecodeError = (
  reason: CborDecodeReason,
  offset: number,
  message: string
): CborDecodeError => ({
  _tag: "CborDecodeError",
  reason,
  offset,
  message
})

export const cborEncodeError = (message: string): CborEncodeError => ({
  _tag: "CborEncodeError",
  reason: "UnsupportedValue",
  message
})

export const jsonParseError = (
  reason: JsonParseReason,
  position: { readonly offset: number; readonly line: number; readonly column: number },
  message: string
): JsonParseError => ({
  _tag: "JsonParseError",
  reason,
  offset: position.offset,
  line: position.line,
  column: position.column,
  message
})

export const jsonPrintError = (reason: JsonPrintReason, message: string): JsonPrintError => ({
  _tag: "JsonPrintError",
  reason,
  message
})

export const base64Error = (reason: Base64Reason, offset: number, message: string): Base64Error => ({
  _tag: "Base64Error",
  reason,
  offset,
  message
})

export const ioError = (message: string): IoError => ({
  _tag: "IoError",
  message
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})
