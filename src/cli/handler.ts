import { Effect, Layer, pipe } from "effect"
import { Console } from "effect"
import { Prompt } from "@effect/cli"
import type { Terminal } from "@effect/platform/Terminal"

import type { GlobalOptions, MoveOptions } from "./options"
import { fromDomainError, invalidOption } from "./errors"

import {
  createAppLayer,
  initialize,
  relocate,
  selectVolume,
  snapshot,
  type EngineConfigOverrides,
} from "../core"
import { EngineConfigTag } from "../core/config/EngineConfig"
import { DriveNotFound } from "../core/domain/SwapError"
import { describeLocation } from "../core/domain/SwapLocation"
import { findVolume, isSelectableTarget } from "../core/domain/Volume"
import { parseSwapFileSize } from "../core/lib/parseSize"
import { LoggerServiceLive, LoggerServiceTag } from "../services/LoggerService"

/**
 * Error handling wrapper for CLI commands
 */
export const withErrorHandling = <A, R>(
  effect: Effect.Effect<A, unknown, R>
): Effect.Effect<void, never, R> =>
  pipe(
    effect,
    Effect.catchAll((error) => {
      const appError = fromDomainError(error)
      return Console.error(`\n${appError.format()}`)
    }),
    Effect.asVoid
  )

/**
 * Convert CLI options to engine config overrides
 */
export const toOverrides = (options: GlobalOptions) =>
  Effect.gen(function* () {
    const newSwapFileBytes =
      options.swapSize === undefined
        ? undefined
        : yield* pipe(
            parseSwapFileSize(options.swapSize),
            Effect.mapError((e) => invalidOption(`--swap-size: ${e.message}`))
          )

    const overrides: EngineConfigOverrides = {
      targetPolicy: options.policy,
      ...(newSwapFileBytes === undefined ? {} : { newSwapFileBytes }),
    }
    return overrides
  })

/**
 * Provide the live engine, configured from the options, plus console output.
 */
export const withApp =
  (options: GlobalOptions) =>
  <A, E, R>(effect: Effect.Effect<A, E, R>) =>
    Effect.flatMap(toOverrides(options), (overrides) =>
      Effect.provide(effect, Layer.merge(createAppLayer(overrides), LoggerServiceLive))
    )

const printLog = Effect.gen(function* () {
  const logger = yield* LoggerServiceTag
  const state = yield* snapshot()
  yield* logger.log(state.log)
})

/**
 * Run the status command
 */
export const runStatus = (options: GlobalOptions) =>
  Effect.gen(function* () {
    const logger = yield* LoggerServiceTag
    const state = yield* initialize()

    yield* logger.status.header
    yield* logger.status.security(state.security)
    yield* logger.status.location(
      describeLocation(state.swapLocation, state.volumes),
      state.currentVolume
    )
    if (state.lastError !== undefined) {
      yield* logger.status.lastError(state.lastError)
    }
    if (options.showLog) {
      yield* logger.log(state.log)
    }
  })

/**
 * Run the drives command
 */
export const runDrives = (options: GlobalOptions) =>
  Effect.gen(function* () {
    const logger = yield* LoggerServiceTag
    const config = yield* EngineConfigTag
    const state = yield* initialize()

    yield* logger.drives.header(config.targetPolicy)
    if (state.volumes.length === 0) {
      yield* logger.drives.none
    }
    yield* Effect.forEach(
      state.volumes,
      (volume) =>
        logger.drives.volume(volume, isSelectableTarget(volume, config.targetPolicy, config.rootPath)),
      { discard: true }
    )
    if (state.lastError !== undefined) {
      yield* logger.status.lastError(state.lastError)
    }
    if (options.showLog) {
      yield* logger.log(state.log)
    }
  })

export type Confirm<R> = (message: string) => Effect.Effect<boolean, never, R>

export const autoConfirm: Confirm<never> = () => Effect.succeed(true)

/** Ctrl+C at the prompt counts as "no". */
export const confirmInTerminal: Confirm<Terminal> = (message) =>
  pipe(
    Prompt.confirm({ message, initial: false }),
    Effect.catchTag("QuitException", () => Effect.succeed(false))
  )

/**
 * Run the move command
 */
export const runMove = <R>(options: MoveOptions, confirm: Confirm<R>) =>
  Effect.gen(function* () {
    const logger = yield* LoggerServiceTag

    yield* logger.move.header
    const state = yield* initialize()

    const destination = findVolume(state.volumes, options.volume)
    if (destination === undefined) {
      return yield* Effect.fail(new DriveNotFound({ volumeId: options.volume }))
    }
    yield* selectVolume(destination.id)

    yield* logger.move.plan(describeLocation(state.swapLocation, state.volumes), destination)
    const confirmed = yield* confirm(`Move the swap file to ${destination.name}?`)
    if (!confirmed) {
      yield* logger.move.cancelled
      return
    }

    const outcome = yield* pipe(
      relocate(destination.id),
      Effect.ensuring(options.showLog ? printLog : Effect.void)
    )

    yield* outcome._tag === "AlreadyInPlace"
      ? logger.move.alreadyInPlace(outcome.destination)
      : logger.move.relocated(outcome.destination)
  })
