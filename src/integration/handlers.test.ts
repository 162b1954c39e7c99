/**
 * Integration tests for CLI handlers using TestContext.
 *
 * Runs the handlers against the simulated Mac and checks which commands
 * reached the shell and where the swap file ended up.
 */

import { describe, expect, test } from "vitest"
import { Effect, Layer, pipe } from "effect"

import {
  autoConfirm,
  runDrives,
  runMove,
  runStatus,
  toOverrides,
  withErrorHandling,
  type Confirm,
} from "../cli/handler"
import type { MoveOptions } from "../cli/options"
import { MiB } from "../core/config/EngineConfig"
import { snapshot } from "../core"
import { LoggerServiceLive } from "../services/LoggerService"
import { createTestContext, testEngine, type TestContext } from "../test/TestContext"

const EXT_SWAP = "/Volumes/Ext/private/var/vm/swapfile"

/**
 * Build the full test layer: the engine over the simulated Mac, plus
 * console output.
 */
function buildTestLayer(ctx: TestContext) {
  return Layer.merge(testEngine(ctx), LoggerServiceLive)
}

const setup = () => {
  const ctx = createTestContext()
  ctx.addSystemVolume()
  ctx.addExternal("Ext")
  return ctx
}

const moveOptions = (volume: string): MoveOptions => ({
  volume,
  policy: "external-only",
  swapSize: undefined,
  showLog: false,
})

// =============================================================================
// Tests: toOverrides
// =============================================================================

describe("toOverrides", () => {
  test("maps the policy and leaves the size out when not given", async () => {
    const overrides = await Effect.runPromise(
      toOverrides({ policy: "all-volumes", swapSize: undefined, showLog: false })
    )

    expect(overrides).toEqual({ targetPolicy: "all-volumes" })
  })

  test("parses the swap size into bytes", async () => {
    const overrides = await Effect.runPromise(
      toOverrides({ policy: "external-only", swapSize: "512MiB", showLog: false })
    )

    expect(overrides).toEqual({ targetPolicy: "external-only", newSwapFileBytes: 512 * MiB })
  })

  test("rejects an unparseable size as an invalid option", async () => {
    const error = await pipe(
      toOverrides({ policy: "external-only", swapSize: "lots", showLog: false }),
      Effect.flip,
      Effect.runPromise
    )

    expect(error.title).toBe("Invalid option")
    expect(error.detail.startsWith("--swap-size: ")).toBe(true)
  })
})

// =============================================================================
// Tests: runStatus / runDrives
// =============================================================================

describe("runStatus", () => {
  test("reads SIP and the swap location without elevated commands", async () => {
    const ctx = setup()

    const state = await pipe(
      runStatus({ policy: "external-only", swapSize: undefined, showLog: true }),
      Effect.zipRight(snapshot()),
      Effect.provide(buildTestLayer(ctx)),
      Effect.runPromise
    )

    expect(state.security.sipDisabled).toBe(true)
    expect(state.swapLocation).toEqual({ _tag: "InPlace" })
    expect(state.currentVolume?.id).toBe("UUID-SYSTEM")
    expect(ctx.elevated()).toEqual([])
  })
})

describe("runDrives", () => {
  test("lists the system volume and the external volume", async () => {
    const ctx = setup()

    const state = await pipe(
      runDrives({ policy: "external-only", swapSize: undefined, showLog: false }),
      Effect.zipRight(snapshot()),
      Effect.provide(buildTestLayer(ctx)),
      Effect.runPromise
    )

    expect(state.volumes.map((v) => v.name)).toEqual(["Macintosh HD", "Ext"])
    expect(ctx.elevated()).toEqual([])
  })
})

// =============================================================================
// Tests: runMove
// =============================================================================

describe("runMove", () => {
  test("moves the swap file to a volume named on the command line", async () => {
    const ctx = setup()

    const state = await pipe(
      runMove(moveOptions("Ext"), autoConfirm),
      Effect.zipRight(snapshot()),
      Effect.provide(buildTestLayer(ctx)),
      Effect.runPromise
    )

    expect(ctx.mac.swap).toEqual({ kind: "link", target: EXT_SWAP })
    expect(ctx.mac.swapEnabled).toBe(true)
    expect(state.currentVolume?.id).toBe("UUID-EXT")
    expect(state.selectedVolumeId).toBe("UUID-EXT")
  })

  test("accepts a mount path as the destination", async () => {
    const ctx = setup()

    await pipe(
      runMove(moveOptions("/Volumes/Ext"), autoConfirm),
      Effect.provide(buildTestLayer(ctx)),
      Effect.runPromise
    )

    expect(ctx.mac.swap).toEqual({ kind: "link", target: EXT_SWAP })
  })

  test("declining the confirmation changes nothing", async () => {
    const ctx = setup()
    const asked: string[] = []
    const decline: Confirm<never> = (message) =>
      Effect.sync(() => {
        asked.push(message)
        return false
      })

    await pipe(
      runMove(moveOptions("Ext"), decline),
      Effect.provide(buildTestLayer(ctx)),
      Effect.runPromise
    )

    expect(asked).toEqual(["Move the swap file to Ext?"])
    expect(ctx.elevated()).toEqual([])
    expect(ctx.mac.swap).toEqual({ kind: "file" })
  })

  test("an unknown volume fails with DriveNotFound", async () => {
    const ctx = setup()

    const error = await pipe(
      runMove(moveOptions("Nowhere"), autoConfirm),
      Effect.flip,
      Effect.provide(buildTestLayer(ctx)),
      Effect.runPromise
    )

    expect(error).toMatchObject({ _tag: "DriveNotFound", volumeId: "Nowhere" })
    expect(ctx.elevated()).toEqual([])
  })

  test("withErrorHandling reports a SIP failure instead of failing", async () => {
    const ctx = setup()
    ctx.mac.sipDisabled = false

    const state = await pipe(
      withErrorHandling(runMove(moveOptions("Ext"), autoConfirm)),
      Effect.zipRight(snapshot()),
      Effect.provide(buildTestLayer(ctx)),
      Effect.runPromise
    )

    expect(state.lastError).toBe("System Integrity Protection is enabled")
    expect(state.phase).toBe("Failed")
    expect(ctx.elevated()).toEqual([])
  })
})
