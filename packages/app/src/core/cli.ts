import { Match } from "effect"
import * as Either from "effect/Either"

import type { Base64Alphabet } from "./base64.js"
import type { BytePolicy } from "./json-print.js"
import type { TranscodeMode } from "./transcode.js"
import { MAX_DEPTH_LIMIT } from "./value.js"

// CHANGE: implement deterministic CLI parsing for cbd
// WHY: keep CLI decoding pure and testable at the boundary
// QUOTE(README): "cat file.json | cbd -e"
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.mode ∈ {decode, encode}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and positional arguments are rejected; 1 ≤ maxDepth ≤ MAX_DEPTH_LIMIT
// COMPLEXITY: O(n) where n = argv length

export interface CliArgs {
  readonly mode: TranscodeMode
  readonly base64: boolean
  readonly base64Alphabet: Base64Alphabet | undefined
  readonly compact: boolean | undefined
  readonly bytes: BytePolicy | undefined
  readonly maxDepth: number | undefined
  readonly configPath: string | undefined
  readonly verbose: boolean
  readonly help: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

export const usage = [
  "Usage: cbd [options] < input > output",
  "",
  "Decode CBOR from stdin and print JSON, or encode JSON from stdin as CBOR.",
  "",
  "Options:",
  "  -e, --encode             JSON -> CBOR (default is CBOR -> JSON)",
  "  -b, --base64             CBOR side is base64 text (decode also detects it)",
  "  -u, --url-safe           write base64 with the URL-safe alphabet",
  "  -c, --compact            no space after ':' in JSON output",
  "      --bytes <policy>     byte strings in JSON: base64 | array | reject",
  "      --max-depth <n>      nesting limit, 1..512 (default 256)",
  "      --config <path>      config file (default ./.cbdrc.json)",
  "  -v, --verbose            debug logging on stderr",
  "  -h, --help               show this help"
].join("\n")

const isFlag = (value: string): boolean => value.startsWith("-") && value.length > 1

const defaultArgs: CliArgs = {
  mode: "decode",
  base64: false,
  base64Alphabet: undefined,
  compact: undefined,
  bytes: undefined,
  maxDepth: undefined,
  configPath: undefined,
  verbose: false,
  help: false
}

const parseBytePolicy = (value: string): Either.Either<BytePolicy, CliError> =>
  Match.value(value).pipe(
    Match.when("base64", () => Either.right<BytePolicy>("base64")),
    Match.when("array", () => Either.right<BytePolicy>("array")),
    Match.when("reject", () => Either.right<BytePolicy>("reject")),
    Match.orElse(() => Either.left(cliError(`Invalid --bytes policy: ${value}`)))
  )

const parseMaxDepth = (value: string): Either.Either<number, CliError> => {
  const parsed = /^\d+$/.test(value) ? Number(value) : Number.NaN
  if (!Number.isSafeInteger(parsed) || parsed < 1 || parsed > MAX_DEPTH_LIMIT) {
    return Either.left(cliError(`--max-depth must be an integer from 1 to ${MAX_DEPTH_LIMIT}: ${value}`))
  }
  return Either.right(parsed)
}

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

interface ParsedFlag {
  readonly next: CliArgs
  readonly consumed: number
}

const setParsedFlag = (next: CliArgs, consumed: number): Either.Either<ParsedFlag, CliError> =>
  Either.right({ next, consumed })

const parseValueFlag = <A>(
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  decode: (value: string) => Either.Either<A, CliError>,
  update: (args: CliArgs, value: A) => CliArgs
): Either.Either<ParsedFlag, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (raw) =>
    Either.map(decode(raw), (value) => ({
      next: update(current, value),
      consumed: inlineValue === undefined ? 2 : 1
    })))

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<ParsedFlag, CliError>

const flagParsers: Record<string, FlagParser> = {
  encode: (current) => setParsedFlag({ ...current, mode: "encode" }, 1),
  base64: (current) => setParsedFlag({ ...current, base64: true }, 1),
  "url-safe": (current) => setParsedFlag({ ...current, base64Alphabet: "url" }, 1),
  compact: (current) => setParsedFlag({ ...current, compact: true }, 1),
  verbose: (current) => setParsedFlag({ ...current, verbose: true }, 1),
  help: (current) => setParsedFlag({ ...current, help: true }, 1),
  bytes: (current, inlineValue, nextValue) =>
    parseValueFlag("bytes", current, inlineValue, nextValue, parseBytePolicy, (args, value) => ({
      ...args,
      bytes: value
    })),
  "max-depth": (current, inlineValue, nextValue) =>
    parseValueFlag(
      "max-depth",
      current,
      inlineValue,
      nextValue,
      parseMaxDepth,
      (args, value) => ({ ...args, maxDepth: value })
    ),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, Either.right, (args, value) => ({
      ...args,
      configPath: value
    }))
}

const shortFlags: Readonly<Record<string, string>> = {
  e: "encode",
  b: "base64",
  u: "url-safe",
  c: "compact",
  v: "verbose",
  h: "help"
}

// Own keys only: "--toString" must not reach Object.prototype.
const lookup = <A>(record: Readonly<Record<string, A>>, key: string): A | undefined =>
  Object.hasOwn(record, key) ? record[key] : undefined

// Clustered short flags ("-eb"); all of them are switches.
const parseShortFlags = (raw: string, current: CliArgs): Either.Either<ParsedFlag, CliError> => {
  let args = current
  for (const letter of raw.slice(1)) {
    const name = lookup(shortFlags, letter)
    const parser = name === undefined ? undefined : lookup(flagParsers, name)
    if (parser === undefined) {
      return Either.left(cliError(`Unknown flag: -${letter}`))
    }
    const parsed = parser(args, undefined, undefined)
    if (Either.isLeft(parsed)) {
      return parsed
    }
    args = parsed.right.next
  }
  return setParsedFlag(args, 1)
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<ParsedFlag, CliError> => {
  if (!raw.startsWith("--")) {
    return parseShortFlags(raw, current)
  }
  const separator = raw.indexOf("=")
  const name = separator === -1 ? raw.slice(2) : raw.slice(2, separator)
  const inlineValue = separator === -1 ? undefined : raw.slice(separator + 1)
  const parser = lookup(flagParsers, name)
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant mode defaults to decode when -e is absent
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  let args = defaultArgs
  let index = 0
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      return Either.left(cliError(`Unexpected positional argument: ${current}`))
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}
