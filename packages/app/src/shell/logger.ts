import { Effect, Layer, Logger } from "effect"

import { Stdio } from "./stdio.js"

// CHANGE: route Effect log output to the stderr side of the Stdio service
// WHY: stdout carries the transcoded document and must stay clean
// REF: req-logging-1
// SOURCE: n/a
// PURITY: SHELL
// EFFECT: Layer<never, never, Stdio>
// INVARIANT: nothing is logged to stdout
// COMPLEXITY: O(1)

const formatMessage = (message: unknown): string =>
  Array.isArray(message) ? message.map((part) => String(part)).join(" ") : String(message)

export const makeStdioLogger = (logLine: (line: string) => void) =>
  Logger.make(({ logLevel, message }) => {
    logLine(`cbd [${logLevel.label}] ${formatMessage(message)}\n`)
  })

export const StdioLoggerLive: Layer.Layer<never, never, Stdio> = Layer.unwrapEffect(
  Effect.map(Stdio, (stdio) => Logger.replace(Logger.defaultLogger, makeStdioLogger(stdio.logLine)))
)
