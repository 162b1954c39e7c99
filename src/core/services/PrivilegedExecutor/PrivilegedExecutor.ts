/**
 * PrivilegedExecutor - runs external commands with a deadline and writes the
 * audit trail (command, then output or error) into the StatusModel log.
 *
 * No retries here; rollback belongs to the orchestrator.
 */

import { Context, Duration, Effect, Layer, pipe } from "effect"
import plist, { type PlistObject, type PlistValue } from "plist"
import { EngineConfigTag } from "../../config/EngineConfig"
import { commandLine } from "../../domain/LogEntry"
import { CommandExecutionFailed, CommandTimedOut, type CommandError } from "../../domain/SwapError"
import { ShellServiceTag, type ShellError, type ShellResult } from "../../infra/ShellService"
import { StatusModelTag } from "../StatusModel"

// =============================================================================
// Service interface
// =============================================================================

export interface PrivilegedExecutor {
  /** Non-zero exit statuses are returned, not failed. */
  readonly run: (
    path: string,
    args: ReadonlyArray<string>,
    timeout: Duration.DurationInput
  ) => Effect.Effect<ShellResult, CommandError>

  /** One authorization prompt per call. Non-zero exit fails with the captured stderr. */
  readonly runElevated: (
    path: string,
    args: ReadonlyArray<string>,
    timeout?: Duration.DurationInput
  ) => Effect.Effect<ShellResult, CommandError>

  /** Parses stdout as a property list. Unparseable output yields `{}`. */
  readonly runStructured: (
    path: string,
    args: ReadonlyArray<string>,
    timeout: Duration.DurationInput
  ) => Effect.Effect<PlistObject, CommandError>
}

export class PrivilegedExecutorTag extends Context.Tag("PrivilegedExecutor")<
  PrivilegedExecutorTag,
  PrivilegedExecutor
>() {}

// =============================================================================
// Property list helpers
// =============================================================================

export const isPlistObject = (value: PlistValue | undefined): value is PlistObject =>
  typeof value === "object" &&
  value !== null &&
  !Array.isArray(value) &&
  !(value instanceof Date) &&
  !Buffer.isBuffer(value)

export const parsePlist = (text: string): PlistObject | undefined => {
  try {
    const parsed = plist.parse(text)
    return isPlistObject(parsed) ? parsed : undefined
  } catch {
    return undefined
  }
}

export const readString = (record: PlistObject, key: string): string | undefined => {
  const value = record[key]
  return typeof value === "string" ? value : undefined
}

export const readBoolean = (record: PlistObject, key: string): boolean | undefined => {
  const value = record[key]
  return typeof value === "boolean" ? value : undefined
}

export const readRecord = (record: PlistObject, key: string): PlistObject | undefined => {
  const value = record[key]
  return isPlistObject(value) ? value : undefined
}

// =============================================================================
// Live implementation
// =============================================================================

const firstLine = (text: string) => text.trim().split("\n")[0] ?? ""

const emptyRecord: PlistObject = {}

export const PrivilegedExecutorLive = Layer.effect(
  PrivilegedExecutorTag,
  Effect.gen(function* () {
    const shell = yield* ShellServiceTag
    const status = yield* StatusModelTag
    const config = yield* EngineConfigTag

    const withDeadline = (
      command: string,
      timeout: Duration.DurationInput,
      effect: Effect.Effect<ShellResult, ShellError>
    ): Effect.Effect<ShellResult, CommandError> => {
      const timeoutMillis = Duration.toMillis(Duration.decode(timeout))
      return pipe(
        effect,
        Effect.mapError((e) => new CommandExecutionFailed({ command, detail: e.message })),
        // Once the timer wins the process fiber is interrupted, and the
        // interruption (which kills the child) completes before we fail.
        Effect.timeoutFail({
          duration: timeout,
          onTimeout: () => new CommandTimedOut({ command, timeoutMillis }),
        }),
        Effect.tapError((e) =>
          status.appendLog(
            "error",
            e._tag === "CommandTimedOut"
              ? `${command} timed out after ${timeoutMillis}ms and was terminated`
              : `${command} failed: ${e.detail}`
          )
        )
      )
    }

    const logResult = (command: string, result: ShellResult) =>
      result.exitCode === 0
        ? status.appendLog("output", result.stdout.trimEnd() || `${command} exited with status 0`)
        : status.appendLog(
            "error",
            `${command} exited with status ${result.exitCode}${
              result.stderr.trim() ? `: ${result.stderr.trim()}` : ""
            }`
          )

    const run: PrivilegedExecutor["run"] = (path, args, timeout) => {
      const command = commandLine(path, args)
      return pipe(
        status.appendLog("command", command),
        Effect.zipRight(withDeadline(command, timeout, shell.exec(path, args))),
        Effect.tap((result) => logResult(command, result))
      )
    }

    const runElevated: PrivilegedExecutor["runElevated"] = (
      path,
      args,
      timeout = config.timeouts.elevated
    ) => {
      const command = commandLine(path, args)
      return pipe(
        status.appendLog("command", command),
        Effect.zipRight(status.appendLog("info", `Requesting administrator authorization for ${path}`)),
        Effect.zipRight(withDeadline(command, timeout, shell.execElevated(path, args))),
        Effect.tap((result) => logResult(command, result)),
        Effect.filterOrFail(
          (result) => result.exitCode === 0,
          (result) =>
            new CommandExecutionFailed({
              command,
              detail: firstLine(result.stderr) || `exited with status ${result.exitCode}`,
            })
        )
      )
    }

    const runStructured: PrivilegedExecutor["runStructured"] = (path, args, timeout) =>
      pipe(
        run(path, args, timeout),
        Effect.flatMap((result) => {
          const parsed = parsePlist(result.stdout)
          return parsed
            ? Effect.succeed(parsed)
            : Effect.as(
                status.appendLog("warning", `Could not parse property list from ${commandLine(path, args)}`),
                emptyRecord
              )
        })
      )

    return { run, runElevated, runStructured }
  })
)
