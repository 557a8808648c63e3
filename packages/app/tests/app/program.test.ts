import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { runCli } from "../../src/app/program.js"
import { usage } from "../../src/core/cli.js"
import type { MemoryStdio } from "./test-helpers.js"
import { makeMemoryStdio, provideNodeContext, withTempDir } from "./test-helpers.js"

const keyValueCbor = Uint8Array.from([0xa1, 0x63, 0x6b, 0x65, 0x79, 0x65, 0x76, 0x61, 0x6c, 0x75, 0x65])

const run = (io: MemoryStdio, ...args: ReadonlyArray<string>) =>
  runCli(["node", "cbd", ...args]).pipe(Effect.provide(io.layer))

describe("runCli", () => {
  it.effect("decodes CBOR from stdin to JSON on stdout", () =>
    Effect.gen(function*(_) {
      const io = makeMemoryStdio(keyValueCbor)
      const result = yield* _(run(io))
      expect(result.exitCode).toBe(0)
      expect(io.stdoutText()).toBe(`{"key": "value"}\n`)
      expect(io.stderrText()).toBe("")
    }).pipe(provideNodeContext))

  it.effect("decodes base64 input with -b", () =>
    Effect.gen(function*(_) {
      const io = makeMemoryStdio("oWNrZXlldmFsdWU")
      const result = yield* _(run(io, "-b"))
      expect(result.exitCode).toBe(0)
      expect(io.stdoutText()).toBe(`{"key": "value"}\n`)
    }).pipe(provideNodeContext))

  it.effect("encodes JSON to raw CBOR and to base64", () =>
    Effect.gen(function*(_) {
      const raw = makeMemoryStdio(`{"k":"v"}`)
      yield* _(run(raw, "-e"))
      expect(raw.stdout()).toEqual([0xa1, 0x61, 0x6b, 0x61, 0x76])

      const text = makeMemoryStdio(`{"k":"v"}`)
      yield* _(run(text, "-eb"))
      expect(text.stdoutText()).toBe("oWFrYXY")
    }).pipe(provideNodeContext))

  it.effect("reports truncated CBOR on stderr and writes nothing to stdout", () =>
    Effect.gen(function*(_) {
      const io = makeMemoryStdio(Uint8Array.from([0xa1]))
      const result = yield* _(run(io))
      expect(result.exitCode).toBe(1)
      expect(io.stdout()).toEqual([])
      expect(io.stderrText()).toBe("cbd: CBOR decode error (UnexpectedEof) at byte 1: unexpected end of input\n")
    }).pipe(provideNodeContext))

  it.effect("reports malformed JSON with its position", () =>
    Effect.gen(function*(_) {
      const io = makeMemoryStdio(`{"a`)
      const result = yield* _(run(io, "-e"))
      expect(result.exitCode).toBe(1)
      expect(io.stdout()).toEqual([])
      expect(io.stderrText()).toBe(
        "cbd: JSON parse error (SyntaxError) at line 1, column 2 (offset 1): unterminated string\n"
      )
    }).pipe(provideNodeContext))

  it.effect("exits with 2 on usage errors", () =>
    Effect.gen(function*(_) {
      const io = makeMemoryStdio("")
      const result = yield* _(run(io, "--nope"))
      expect(result.exitCode).toBe(2)
      expect(io.stderrText()).toBe("cbd: Unknown flag: --nope\nRun 'cbd --help' for usage.\n")
    }).pipe(provideNodeContext))

  it.effect("detects base64 input without -b", () =>
    Effect.gen(function*(_) {
      const io = makeMemoryStdio("oWNrZXlldmFsdWU")
      const result = yield* _(run(io))
      expect(result.exitCode).toBe(0)
      expect(io.stdoutText()).toBe(`{"key": "value"}\n`)
    }).pipe(provideNodeContext))

  it.effect("rejects Object.prototype names and an over-limit depth as usage errors", () =>
    Effect.gen(function*(_) {
      const io = makeMemoryStdio("")
      expect((yield* _(run(io, "--toString"))).exitCode).toBe(2)
      expect(io.stderrText()).toBe("cbd: Unknown flag: --toString\nRun 'cbd --help' for usage.\n")

      const deep = makeMemoryStdio("")
      expect((yield* _(run(deep, "--max-depth", "513"))).exitCode).toBe(2)
      expect(deep.stderrText()).toBe(
        "cbd: --max-depth must be an integer from 1 to 512: 513\nRun 'cbd --help' for usage.\n"
      )
    }).pipe(provideNodeContext))

  it.effect("writes debug lines to stderr with -v", () =>
    Effect.gen(function*(_) {
      const io = makeMemoryStdio(keyValueCbor)
      const result = yield* _(run(io, "-v"))
      expect(result.exitCode).toBe(0)
      expect(io.stdoutText()).toBe(`{"key": "value"}\n`)
      expect(io.stderrText()).toBe(
        "cbd [DEBUG] config ./.cbdrc.json not found\n" +
          "cbd [DEBUG] decode 11 byte(s), base64=false, maxDepth=256\n" +
          "cbd [DEBUG] writing 17 byte(s)\n"
      )
    }).pipe(provideNodeContext))

  it.effect("prints usage with --help", () =>
    Effect.gen(function*(_) {
      const io = makeMemoryStdio("")
      const result = yield* _(run(io, "--help"))
      expect(result.exitCode).toBe(0)
      expect(io.stdoutText()).toBe(`${usage}\n`)
    }).pipe(provideNodeContext))

  it.effect("applies settings from an explicit config file", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const configPath = path.join(tempDir, "cbd.json")
        yield* _(fs.writeFileString(configPath, `{"compact": true}`))
        const io = makeMemoryStdio(keyValueCbor)
        const result = yield* _(run(io, "--config", configPath))
        expect(result.exitCode).toBe(0)
        expect(io.stdoutText()).toBe(`{"key":"value"}\n`)
      })
    ).pipe(provideNodeContext))

  it.effect("fails when an explicit config file is missing or invalid", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const missingPath = path.join(tempDir, "missing.json")
        const missing = makeMemoryStdio(keyValueCbor)
        expect((yield* _(run(missing, "--config", missingPath))).exitCode).toBe(1)
        expect(missing.stderrText()).toBe(`cbd: file error: Config file not found: ${missingPath}\n`)

        const invalidPath = path.join(tempDir, "invalid.json")
        yield* _(fs.writeFileString(invalidPath, `{"bytes": "hex"}`))
        const invalid = makeMemoryStdio(keyValueCbor)
        expect((yield* _(run(invalid, "--config", invalidPath))).exitCode).toBe(1)
        expect(invalid.stderrText().startsWith("cbd: invalid config:")).toBe(true)
        expect(invalid.stdout()).toEqual([])
      })
    ).pipe(provideNodeContext))
})
