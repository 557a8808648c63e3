import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger, LogLevel } from "effect"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs, usage } from "../core/cli.js"
import { DEFAULT_CONFIG_PATH, resolveConfig } from "../core/config.js"
import type { AppError, IoError } from "../core/errors.js"
import { exitCodeFor, renderError } from "../core/render-error.js"
import { transcode } from "../core/transcode.js"
import { loadConfigFile } from "../shell/config-file.js"
import { StdioLoggerLive } from "../shell/logger.js"
import { Stdio } from "../shell/stdio.js"

// CHANGE: orchestrate one transcoding run with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and all-or-nothing output
// QUOTE(README): "Decode CBOR from stdin and output JSON"
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: run(argv) returns exitCode ∈ {0,1,2}
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, IoError, FileSystem | Stdio>
// INVARIANT: stdout is written at most once and only on success
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly exitCode: number
}

type ProgramEnv = FileSystemService | Stdio

const handleHelp: Effect.Effect<ProgramResult, IoError, Stdio> = Effect.gen(function*(_) {
  const stdio = yield* _(Stdio)
  yield* _(stdio.writeOutput(`${usage}\n`))
  return { exitCode: 0 }
})

const handleTranscode = (
  cli: CliArgs
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const configPath = cli.configPath ?? DEFAULT_CONFIG_PATH
    const fileConfig = yield* _(loadConfigFile(configPath, cli.configPath !== undefined))
    const settings = resolveConfig(cli, fileConfig)
    yield* _(Effect.logDebug(`config ${configPath} ${fileConfig === undefined ? "not found" : "loaded"}`))
    const stdio = yield* _(Stdio)
    const input = yield* _(stdio.readInput)
    yield* _(
      Effect.logDebug(
        `${settings.mode} ${input.length} byte(s), base64=${settings.base64}, maxDepth=${settings.maxDepth}`
      )
    )
    const output = yield* _(transcode(input, settings))
    yield* _(Effect.logDebug(`writing ${output.length} byte(s)`))
    yield* _(stdio.writeOutput(output))
    return { exitCode: 0 }
  }).pipe(
    Logger.withMinimumLogLevel(cli.verbose ? LogLevel.Debug : LogLevel.Info),
    Effect.provide(StdioLoggerLive)
  )

const reportFailure = (error: AppError): Effect.Effect<ProgramResult, IoError, Stdio> =>
  Effect.gen(function*(_) {
    const stdio = yield* _(Stdio)
    yield* _(stdio.writeError(`cbd: ${renderError(error)}\n`))
    return { exitCode: exitCodeFor(error) }
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with the exit code; failures are already reported on stderr.
 *
 * @pure false
 * @effect FileSystem, Stdio
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, IoError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const cli = yield* _(parseCliArgs(argv))
    if (cli.help) {
      return yield* _(handleHelp)
    }
    return yield* _(handleTranscode(cli))
  }).pipe(Effect.catchAll(reportFailure))
