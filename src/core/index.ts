import { Effect, Layer, pipe } from "effect";
import { FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";

import { EngineConfigLive, EngineConfigTag, type EngineConfigOverrides } from "./config/EngineConfig";
import { DiskStatsServiceLive } from "./infra/DiskStatsService";
import { ShellServiceLive } from "./infra/ShellService";
import { DriveNotFound, UnknownError, describeSwapError, type SwapError } from "./domain/SwapError";
import { markSwapHost } from "./domain/SwapLocation";
import { DriveInventoryLive, DriveInventoryTag } from "./services/DriveInventory";
import { PrivilegedExecutorLive } from "./services/PrivilegedExecutor";
import { RelocationOrchestratorLive, RelocationOrchestratorTag } from "./services/Relocation";
import { SecurityGateLive, SecurityGateTag } from "./services/SecurityGate";
import { StatusModelLive, StatusModelTag } from "./services/StatusModel";

export type { Volume, TargetPolicy } from "./domain/Volume";
export type { SwapLocation } from "./domain/SwapLocation";
export type { SecurityState } from "./domain/SecurityState";
export type { LogEntry, LogKind } from "./domain/LogEntry";
export type { RelocationPhase, RelocationOutcome } from "./domain/RelocationPhase";
export type { StatusSnapshot } from "./services/StatusModel";
export type { Inventory } from "./services/DriveInventory";
export type { EngineConfig, EngineConfigOverrides } from "./config/EngineConfig";
export type {
  SwapError,
  SIPEnabled,
  InsufficientPermissions,
  CommandExecutionFailed,
  DriveNotFound,
  NoSwapFileDetected,
  CommandTimedOut,
  UnknownError,
  InventoryUnavailable,
  RelocationInProgress
} from "./domain/SwapError";

// =============================================================================
// Operations
// =============================================================================

/**
 * Writes a failure into `lastError` and the log feed before passing it on.
 * Defects surface as `UnknownError`.
 */
const recorded = <A, E extends SwapError, R>(effect: Effect.Effect<A, E, R>) =>
  Effect.flatMap(StatusModelTag, (status) =>
    pipe(
      effect,
      Effect.catchAllDefect((defect) =>
        Effect.fail(
          new UnknownError({ detail: defect instanceof Error ? defect.message : String(defect) })
        )
      ),
      Effect.tapError((e) => status.recordError(describeSwapError(e)))
    )
  );

const refreshInto = Effect.gen(function* () {
  const status = yield* StatusModelTag;
  const inventory = yield* DriveInventoryTag;

  const result = yield* inventory.refresh();
  yield* status.setInventory(result.volumes, result.location);
  return result;
});

/**
 * Checks that the swap directory is readable. Detection still runs when it is
 * not; the warning explains an `unknown` location.
 */
const preflight = Effect.gen(function* () {
  const fs = yield* FileSystem.FileSystem;
  const status = yield* StatusModelTag;
  const config = yield* EngineConfigTag;
  const directory = config.swapPath.replace(/\/[^/]+$/, "") || "/";

  yield* pipe(
    fs.readDirectory(directory),
    Effect.catchAll((e) =>
      status.appendLog("warning", `Cannot read ${directory}: ${e.message}; swap location may be unknown`)
    )
  );
});

/**
 * Populates the status model: SIP state and the drive inventory are read
 * concurrently. Never fails; problems end up in `lastError` and the log.
 */
export const initialize = () =>
  Effect.gen(function* () {
    const status = yield* StatusModelTag;
    const gate = yield* SecurityGateTag;

    yield* status.withBusy(
      Effect.gen(function* () {
        yield* status.clearError;
        yield* status.appendLog("info", "Initializing");
        yield* preflight;
        yield* Effect.all(
          [
            // the gate records its own failures
            Effect.either(gate.check()),
            Effect.either(recorded(refreshInto))
          ],
          { concurrency: "unbounded" }
        );
      })
    );

    return yield* status.snapshot;
  });

export const refreshDrives = () =>
  Effect.gen(function* () {
    const status = yield* StatusModelTag;
    return yield* status.withBusy(recorded(refreshInto));
  });

export const checkSecurity = () =>
  Effect.gen(function* () {
    const status = yield* StatusModelTag;
    const gate = yield* SecurityGateTag;
    return yield* status.withBusy(gate.check());
  });

/** Re-reads the swap path and re-marks the host among the listed volumes. */
export const detectLocation = () =>
  Effect.gen(function* () {
    const status = yield* StatusModelTag;
    const inventory = yield* DriveInventoryTag;
    const config = yield* EngineConfigTag;

    return yield* status.withBusy(
      Effect.gen(function* () {
        const location = yield* inventory.detectSwapLocation();
        const { volumes } = yield* status.snapshot;
        yield* status.setInventory(markSwapHost(volumes, location, config), location);
        return location;
      })
    );
  });

/** `undefined` clears the selection. */
export const selectVolume = (volumeId: string | undefined) =>
  Effect.gen(function* () {
    const status = yield* StatusModelTag;
    const { volumes } = yield* status.snapshot;

    if (volumeId !== undefined && !volumes.some((v) => v.id === volumeId)) {
      return yield* recorded(Effect.fail(new DriveNotFound({ volumeId })));
    }
    yield* status.selectVolume(volumeId);
  });

export const relocate = (volumeId: string) =>
  Effect.gen(function* () {
    const status = yield* StatusModelTag;
    const orchestrator = yield* RelocationOrchestratorTag;

    return yield* status.withBusy(
      pipe(
        status.clearError,
        Effect.zipRight(recorded(orchestrator.relocate(volumeId)))
      )
    );
  });

/** Relocates to the currently selected volume. */
export const relocateSelected = () =>
  Effect.gen(function* () {
    const status = yield* StatusModelTag;
    const { selectedVolumeId } = yield* status.snapshot;

    if (selectedVolumeId === undefined) {
      return yield* recorded(Effect.fail(new DriveNotFound({ volumeId: "(none selected)" })));
    }
    return yield* relocate(selectedVolumeId);
  });

export const clearLogs = () => Effect.flatMap(StatusModelTag, (status) => status.clearLogs);

export const snapshot = () => Effect.flatMap(StatusModelTag, (status) => status.snapshot);

export const changes = () => Effect.map(StatusModelTag, (status) => status.changes);

// =============================================================================
// Layers
// =============================================================================

/**
 * The engine's services over whatever infrastructure is provided: a
 * ShellService, a DiskStatsService and a FileSystem.
 */
export const createEngineLayer = (overrides: EngineConfigOverrides = {}) => {
  const foundation = Layer.mergeAll(StatusModelLive, EngineConfigLive(overrides));
  const executor = pipe(PrivilegedExecutorLive, Layer.provideMerge(foundation));
  const services = pipe(
    Layer.mergeAll(DriveInventoryLive, SecurityGateLive),
    Layer.provideMerge(executor)
  );
  return pipe(RelocationOrchestratorLive, Layer.provideMerge(services));
};

export const InfraLive = pipe(
  Layer.mergeAll(ShellServiceLive, DiskStatsServiceLive),
  Layer.provideMerge(NodeContext.layer)
);

export const createAppLayer = (overrides: EngineConfigOverrides = {}) =>
  pipe(createEngineLayer(overrides), Layer.provideMerge(InfraLive));
