/**
 * ShellService - wraps process execution for testability.
 *
 * Commands are spawned directly from an argv (no intermediate shell).
 * `execElevated` routes one command through the macOS authorization prompt
 * via `osascript`, so every elevated call may show its own dialog.
 */

import { Command, CommandExecutor } from "@effect/platform"
import { Context, Data, Effect, Layer, Stream, pipe } from "effect"
import { administratorScript } from "../lib/shellQuote"

// =============================================================================
// Errors
// =============================================================================

export class ShellError extends Data.TaggedError("ShellError")<{
  readonly message: string
  readonly command: string
}> {}

// =============================================================================
// Types
// =============================================================================

export interface ShellResult {
  readonly stdout: string
  readonly stderr: string
  readonly exitCode: number
}

// =============================================================================
// Service interface
// =============================================================================

export interface ShellService {
  readonly exec: (path: string, args: ReadonlyArray<string>) => Effect.Effect<ShellResult, ShellError>
  readonly execElevated: (
    path: string,
    args: ReadonlyArray<string>
  ) => Effect.Effect<ShellResult, ShellError>
}

export class ShellServiceTag extends Context.Tag("ShellService")<ShellServiceTag, ShellService>() {}

export const OSASCRIPT = "/usr/bin/osascript"

// =============================================================================
// Live implementation (@effect/platform Command)
// =============================================================================

const collect = <E>(stream: Stream.Stream<Uint8Array, E>) =>
  pipe(stream, Stream.decodeText(), Stream.mkString)

/**
 * The process lives in the scope: interrupting the returned effect (for
 * example from a timeout) kills the child before the interruption completes.
 */
export const ShellServiceLive = Layer.effect(
  ShellServiceTag,
  Effect.gen(function* () {
    const executor = yield* CommandExecutor.CommandExecutor

    const exec = (path: string, args: ReadonlyArray<string>) =>
      pipe(
        Effect.scoped(
          Effect.gen(function* () {
            const proc = yield* executor.start(Command.make(path, ...args))
            const [stdout, stderr, exitCode] = yield* Effect.all(
              [collect(proc.stdout), collect(proc.stderr), proc.exitCode],
              { concurrency: "unbounded" }
            )
            return { stdout, stderr, exitCode: Number(exitCode) }
          })
        ),
        Effect.mapError(
          (e) =>
            new ShellError({
              message: `Failed to run ${path}: ${e.message}`,
              command: [path, ...args].join(" "),
            })
        )
      )

    return {
      exec,
      execElevated: (path, args) => exec(OSASCRIPT, ["-e", administratorScript(path, args)]),
    }
  })
)
