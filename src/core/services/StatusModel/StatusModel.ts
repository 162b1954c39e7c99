/**
 * StatusModel - the single source of truth observed by hosts.
 *
 * State lives in a SubscriptionRef and is only changed through the update
 * functions below, each applied atomically. Hosts get a read-only snapshot
 * and a stream of snapshots.
 */

import { Clock, Context, Effect, Layer, Stream, SubscriptionRef, pipe } from "effect"
import type { LogEntry, LogKind } from "../../domain/LogEntry"
import type { RelocationPhase } from "../../domain/RelocationPhase"
import { initialSecurityState, type SecurityState } from "../../domain/SecurityState"
import { Unknown, type SwapLocation } from "../../domain/SwapLocation"
import { currentHost, type Volume } from "../../domain/Volume"

// =============================================================================
// Types
// =============================================================================

export interface StatusSnapshot {
  readonly security: SecurityState
  readonly swapLocation: SwapLocation
  readonly currentVolume: Volume | undefined
  readonly volumes: ReadonlyArray<Volume>
  readonly selectedVolumeId: string | undefined
  readonly busy: boolean
  readonly phase: RelocationPhase
  readonly lastError: string | undefined
  readonly log: ReadonlyArray<LogEntry>
}

interface State extends Omit<StatusSnapshot, "busy" | "currentVolume"> {
  readonly pendingOperations: number
}

const initialState: State = {
  security: initialSecurityState,
  swapLocation: Unknown,
  volumes: [],
  selectedVolumeId: undefined,
  pendingOperations: 0,
  phase: "Idle",
  lastError: undefined,
  log: [],
}

const toSnapshot = ({ pendingOperations, ...state }: State): StatusSnapshot => ({
  ...state,
  currentVolume: currentHost(state.volumes),
  busy: pendingOperations > 0,
})

// =============================================================================
// Service interface
// =============================================================================

export interface StatusModel {
  readonly snapshot: Effect.Effect<StatusSnapshot>
  readonly changes: Stream.Stream<StatusSnapshot>

  readonly setSecurity: (security: SecurityState) => Effect.Effect<void>
  readonly setInventory: (volumes: ReadonlyArray<Volume>, location: SwapLocation) => Effect.Effect<void>
  readonly selectVolume: (volumeId: string | undefined) => Effect.Effect<void>
  readonly setPhase: (phase: RelocationPhase) => Effect.Effect<void>
  readonly recordError: (message: string) => Effect.Effect<void>
  readonly clearError: Effect.Effect<void>
  readonly appendLog: (kind: LogKind, message: string) => Effect.Effect<void>
  readonly clearLogs: Effect.Effect<void>

  /** Marks the snapshot busy for exactly the lifetime of `effect`. */
  readonly withBusy: <A, E, R>(effect: Effect.Effect<A, E, R>) => Effect.Effect<A, E, R>
}

export class StatusModelTag extends Context.Tag("StatusModel")<StatusModelTag, StatusModel>() {}

// =============================================================================
// Live implementation
// =============================================================================

// Error entries also cover expected probe misses (`test -f`, `sudo -n`), so
// only `recordError` reaches the logger at Error level.
const mirror = (kind: LogKind, message: string) =>
  kind === "warning" ? Effect.logWarning(message) : Effect.logDebug(`[${kind}] ${message}`)

export const makeStatusModel = Effect.gen(function* () {
  const ref = yield* SubscriptionRef.make(initialState)

  const update = (f: (state: State) => State) => SubscriptionRef.update(ref, f)

  const appendLog = (kind: LogKind, message: string) =>
    Effect.gen(function* () {
      const timestamp = new Date(yield* Clock.currentTimeMillis)
      yield* update((s) => ({ ...s, log: [...s.log, { kind, message, timestamp }] }))
      yield* mirror(kind, message)
    })

  const model: StatusModel = {
    snapshot: Effect.map(SubscriptionRef.get(ref), toSnapshot),
    changes: Stream.map(ref.changes, toSnapshot),

    setSecurity: (security) => update((s) => ({ ...s, security })),
    setInventory: (volumes, swapLocation) =>
      update((s) => ({
        ...s,
        volumes,
        swapLocation,
        selectedVolumeId: volumes.some((v) => v.id === s.selectedVolumeId)
          ? s.selectedVolumeId
          : undefined,
      })),
    selectVolume: (selectedVolumeId) => update((s) => ({ ...s, selectedVolumeId })),
    setPhase: (phase) => update((s) => ({ ...s, phase })),
    recordError: (message) =>
      pipe(
        update((s) => ({ ...s, lastError: message })),
        Effect.zipRight(appendLog("error", message)),
        Effect.zipRight(Effect.logError(message))
      ),
    clearError: update((s) => ({ ...s, lastError: undefined })),
    appendLog,
    clearLogs: update((s) => ({ ...s, log: [] })),

    withBusy: (effect) =>
      Effect.acquireUseRelease(
        update((s) => ({ ...s, pendingOperations: s.pendingOperations + 1 })),
        () => effect,
        () => update((s) => ({ ...s, pendingOperations: s.pendingOperations - 1 }))
      ),
  }

  return model
})

export const StatusModelLive = Layer.effect(StatusModelTag, makeStatusModel)
