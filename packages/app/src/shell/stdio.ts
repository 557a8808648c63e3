import { Context, Effect, Layer } from "effect"

import type { IoError } from "../core/errors.js"
import { ioError } from "../core/errors.js"

// CHANGE: expose standard streams as an Effect service
// WHY: the program reads the whole input and writes one output unit; tests swap in memory buffers
// REF: req-stdio-1
// SOURCE: n/a
// FORMAT THEOREM: readInput completes once with every byte of stdin
// PURITY: SHELL
// EFFECT: Effect<Uint8Array | void, IoError, never>
// INVARIANT: output is written in a single call per stream
// COMPLEXITY: O(n)

export interface StdioService {
  readonly readInput: Effect.Effect<Uint8Array, IoError>
  readonly writeOutput: (data: Uint8Array | string) => Effect.Effect<void, IoError>
  readonly writeError: (data: string) => Effect.Effect<void, IoError>
  /** Synchronous stderr line for the logger, which cannot run effects. */
  readonly logLine: (line: string) => void
}

export class Stdio extends Context.Tag("cbd/Stdio")<Stdio, StdioService>() {}

const readStream = (stream: NodeJS.ReadableStream): Effect.Effect<Uint8Array, IoError> =>
  Effect.async<Uint8Array, IoError>((resume) => {
    const chunks: Array<Buffer> = []
    const onData = (chunk: Buffer | string): void => {
      chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk)
    }
    const onEnd = (): void => {
      resume(Effect.succeed(Buffer.concat(chunks)))
    }
    const onError = (error: Error): void => {
      resume(Effect.fail(ioError(`failed to read stdin: ${error.message}`)))
    }
    stream.on("data", onData)
    stream.once("end", onEnd)
    stream.once("error", onError)
    return Effect.sync(() => {
      stream.off("data", onData)
      stream.off("end", onEnd)
      stream.off("error", onError)
    })
  })

const writeStream = (
  stream: NodeJS.WritableStream,
  label: string,
  data: Uint8Array | string
): Effect.Effect<void, IoError> =>
  Effect.async<void, IoError>((resume) => {
    stream.write(data, (error) => {
      resume(error ? Effect.fail(ioError(`failed to write ${label}: ${error.message}`)) : Effect.void)
    })
  })

export const NodeStdioLive: Layer.Layer<Stdio> = Layer.succeed(Stdio, {
  readInput: readStream(process.stdin),
  writeOutput: (data) => writeStream(process.stdout, "stdout", data),
  writeError: (data) => writeStream(process.stderr, "stderr", data),
  logLine: (line) => {
    process.stderr.write(line)
  }
})
