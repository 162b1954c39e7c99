/**
 * RelocationOrchestrator - moves the swap file to another volume.
 *
 * Phases run strictly in order:
 *
 *   ValidatingPreconditions -> AcquiringPrivileges -> DisablingAccounting
 *     -> Relocating -> ReenablingAccounting -> Completed
 *
 * Any failure ends in Failed. Once swap accounting may have been disabled,
 * a failure (or interruption) first tries to turn it back on.
 */

import { Context, Effect, Layer, Ref, pipe } from "effect"
import { EngineConfigTag } from "../../config/EngineConfig"
import type { RelocationOutcome } from "../../domain/RelocationPhase"
import {
  CommandExecutionFailed,
  DriveNotFound,
  InsufficientPermissions,
  NoSwapFileDetected,
  RelocationInProgress,
  SIPEnabled,
  describeSwapError,
  type CommandError,
  type SwapError,
} from "../../domain/SwapError"
import { describeLocation } from "../../domain/SwapLocation"
import { isSelectableTarget, type Volume } from "../../domain/Volume"
import { DriveInventoryTag } from "../DriveInventory"
import { PrivilegedExecutorTag } from "../PrivilegedExecutor"
import { StatusModelTag } from "../StatusModel"
import { RM, TEST, planRelocation, type RelocationStep } from "./RelocationPlan"

export const SUDO = "/usr/bin/sudo"
export const SYSCTL = "/usr/sbin/sysctl"
export const ECHO = "/bin/echo"

const SWAP_ENABLED = "vm.swap_enabled"

// =============================================================================
// Service interface
// =============================================================================

export interface RelocationOrchestrator {
  /** Fails fast with RelocationInProgress while another relocation runs. */
  readonly relocate: (volumeId: string) => Effect.Effect<RelocationOutcome, SwapError>
}

export class RelocationOrchestratorTag extends Context.Tag("RelocationOrchestrator")<
  RelocationOrchestratorTag,
  RelocationOrchestrator
>() {}

// =============================================================================
// Live implementation
// =============================================================================

type Validated =
  | { readonly _tag: "Proceed"; readonly destination: Volume }
  | { readonly _tag: "AlreadyInPlace"; readonly destination: Volume }

export const RelocationOrchestratorLive = Layer.effect(
  RelocationOrchestratorTag,
  Effect.gen(function* () {
    const executor = yield* PrivilegedExecutorTag
    const inventory = yield* DriveInventoryTag
    const status = yield* StatusModelTag
    const config = yield* EngineConfigTag
    const inFlight = yield* Ref.make(false)

    // -------------------------------------------------------------------------
    // ValidatingPreconditions
    // -------------------------------------------------------------------------

    const validate = (
      volumeId: string
    ): Effect.Effect<Validated, SIPEnabled | DriveNotFound | NoSwapFileDetected> =>
      Effect.gen(function* () {
        const snapshot = yield* status.snapshot

        if (!snapshot.security.sipDisabled) {
          return yield* Effect.fail(new SIPEnabled())
        }

        const destination = snapshot.volumes.find((v) => v.id === volumeId)
        if (
          destination === undefined ||
          !isSelectableTarget(destination, config.targetPolicy, config.rootPath)
        ) {
          return yield* Effect.fail(new DriveNotFound({ volumeId }))
        }

        if (destination.hostsSwapFile) {
          return { _tag: "AlreadyInPlace", destination } as const
        }

        const location = snapshot.swapLocation
        if (
          location._tag === "Linked" &&
          snapshot.currentVolume === undefined &&
          destination.mountPath !== config.rootPath
        ) {
          return yield* Effect.fail(new NoSwapFileDetected({ target: location.target }))
        }

        yield* status.appendLog(
          "info",
          `Moving swap from ${describeLocation(location, snapshot.volumes)} to ${destination.name}`
        )
        return { _tag: "Proceed", destination } as const
      })

    // -------------------------------------------------------------------------
    // AcquiringPrivileges
    // -------------------------------------------------------------------------

    const acquirePrivileges = pipe(
      executor.run(SUDO, ["-n", "true"], config.timeouts.short),
      Effect.map((result) => result.exitCode === 0),
      Effect.orElseSucceed(() => false),
      Effect.flatMap((cached) =>
        cached
          ? status.appendLog("info", "Administrator credentials already cached")
          : pipe(
              executor.runElevated(ECHO, ["Admin privileges granted"]),
              Effect.mapError((e) => new InsufficientPermissions({ reason: describeSwapError(e) })),
              Effect.asVoid
            )
      )
    )

    // -------------------------------------------------------------------------
    // DisablingAccounting / ReenablingAccounting
    // -------------------------------------------------------------------------

    const setSwapEnabled = (enabled: boolean) =>
      executor.runElevated(SYSCTL, ["-w", `${SWAP_ENABLED}=${enabled ? 1 : 0}`])

    // Files are only touched once the flag is known to be off.
    const disableAccounting = pipe(
      executor.run(SYSCTL, [SWAP_ENABLED], config.timeouts.short),
      Effect.flatMap((result): Effect.Effect<void, CommandError> => {
        if (result.exitCode !== 0) {
          return Effect.fail(
            new CommandExecutionFailed({
              command: `${SYSCTL} ${SWAP_ENABLED}`,
              detail: result.stderr.trim().split("\n")[0] || `exited with status ${result.exitCode}`,
            })
          )
        }
        if (result.stdout.includes(`${SWAP_ENABLED}: 1`)) {
          return Effect.asVoid(setSwapEnabled(false))
        }
        if (result.stdout.includes(`${SWAP_ENABLED}: 0`)) {
          return status.appendLog("info", "Swap accounting already disabled")
        }
        return Effect.fail(
          new CommandExecutionFailed({
            command: `${SYSCTL} ${SWAP_ENABLED}`,
            detail: `unexpected output: ${result.stdout.trim()}`,
          })
        )
      })
    )

    const reenableAccounting = pipe(
      setSwapEnabled(true),
      Effect.mapError(
        (e) =>
          new CommandExecutionFailed({
            command: `${SYSCTL} -w ${SWAP_ENABLED}=1`,
            detail: e._tag === "CommandTimedOut" ? describeSwapError(e) : e.detail,
          })
      ),
      Effect.asVoid
    )

    const rollback = pipe(
      status.appendLog("warning", "Relocation failed; re-enabling swap accounting"),
      Effect.zipRight(setSwapEnabled(true)),
      Effect.asVoid,
      Effect.catchAll((e) =>
        status.appendLog("warning", `Rollback could not re-enable swap: ${describeSwapError(e)}`)
      )
    )

    // -------------------------------------------------------------------------
    // Relocating
    // -------------------------------------------------------------------------

    const runStep = (step: RelocationStep): Effect.Effect<void, CommandError> => {
      switch (step._tag) {
        case "Run":
          return pipe(
            status.appendLog("info", step.summary),
            Effect.zipRight(executor.runElevated(step.path, step.args)),
            Effect.asVoid
          )
        case "RemoveIfPresent":
          return pipe(
            executor.run(TEST, ["-f", step.path], config.timeouts.short),
            Effect.flatMap((probe) =>
              probe.exitCode === 0
                ? pipe(
                    status.appendLog("info", `Removing existing file at ${step.path}`),
                    Effect.zipRight(executor.runElevated(RM, [step.path])),
                    Effect.asVoid
                  )
                : Effect.void
            )
          )
      }
    }

    const relocateFile = (destination: Volume) =>
      Effect.gen(function* () {
        const snapshot = yield* status.snapshot
        const plan = planRelocation({
          destination,
          location: snapshot.swapLocation,
          swapPath: config.swapPath,
          rootPath: config.rootPath,
          newSwapFileBytes: config.newSwapFileBytes,
        })
        yield* Effect.forEach(plan.steps, runStep, { discard: true })
      })

    // -------------------------------------------------------------------------
    // Refresh after success
    // -------------------------------------------------------------------------

    const refreshInventory = pipe(
      inventory.refresh(),
      Effect.flatMap(({ volumes, location }) => status.setInventory(volumes, location)),
      Effect.catchAll((e) =>
        status.recordError(`Relocation finished but refresh failed: ${describeSwapError(e)}`)
      )
    )

    const run = (volumeId: string): Effect.Effect<RelocationOutcome, SwapError> =>
      pipe(
        Effect.gen(function* () {
          yield* status.setPhase("ValidatingPreconditions")
          const validated = yield* validate(volumeId)

          if (validated._tag === "AlreadyInPlace") {
            yield* status.appendLog("info", `Swap is already on ${validated.destination.name}`)
            yield* status.setPhase("Completed")
            return { _tag: "AlreadyInPlace", destination: validated.destination } as const
          }

          yield* status.setPhase("AcquiringPrivileges")
          yield* acquirePrivileges

          yield* pipe(
            status.setPhase("DisablingAccounting"),
            Effect.zipRight(disableAccounting),
            Effect.zipRight(status.setPhase("Relocating")),
            Effect.zipRight(relocateFile(validated.destination)),
            Effect.onError(() => rollback)
          )

          yield* status.setPhase("ReenablingAccounting")
          yield* reenableAccounting

          yield* refreshInventory
          yield* status.appendLog("info", `Swap relocated to ${validated.destination.name}`)
          yield* status.setPhase("Completed")
          return { _tag: "Relocated", destination: validated.destination } as const
        }),
        Effect.tapError(() => status.setPhase("Failed"))
      )

    const relocate = (volumeId: string): Effect.Effect<RelocationOutcome, SwapError> =>
      pipe(
        Ref.modify(inFlight, (running) => [!running, true] as const),
        Effect.flatMap((claimed) =>
          claimed
            ? Effect.ensuring(run(volumeId), Ref.set(inFlight, false))
            : Effect.fail(new RelocationInProgress())
        )
      )

    return { relocate }
  })
)
