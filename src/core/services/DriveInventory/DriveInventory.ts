import { Context, Effect, Layer, Option, pipe } from "effect"
import { FileSystem } from "@effect/platform"
import type { PlistObject } from "plist"
import { EngineConfigTag } from "../../config/EngineConfig"
import { InventoryUnavailable } from "../../domain/SwapError"
import { Unknown, markSwapHost, parseListing, type SwapLocation } from "../../domain/SwapLocation"
import { isSelectableTarget, type Volume } from "../../domain/Volume"
import { DiskStatsServiceTag } from "../../infra/DiskStatsService"
import { PrivilegedExecutorTag } from "../PrivilegedExecutor"
import { StatusModelTag } from "../StatusModel"
import { isPhysicalExternal, isSystemVolume, volumeId, volumeName } from "./classify"

export const DISKUTIL = "/usr/sbin/diskutil"
export const LS = "/bin/ls"

export interface Inventory {
  /** Volumes offered under the configured target policy plus the swap host, which is marked. */
  readonly volumes: ReadonlyArray<Volume>
  readonly location: SwapLocation
}

export interface DriveInventory {
  readonly refresh: () => Effect.Effect<Inventory, InventoryUnavailable>
  readonly detectSwapLocation: () => Effect.Effect<SwapLocation>
}

export class DriveInventoryTag extends Context.Tag("DriveInventory")<DriveInventoryTag, DriveInventory>() {}

export const DriveInventoryLive = Layer.effect(
  DriveInventoryTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const stats = yield* DiskStatsServiceTag
    const executor = yield* PrivilegedExecutorTag
    const status = yield* StatusModelTag
    const config = yield* EngineConfigTag

    // Raw `diskutil info -plist` record, `{}` when the command fails.
    const describe = (mountPath: string): Effect.Effect<PlistObject> =>
      pipe(
        executor.runStructured(DISKUTIL, ["info", "-plist", mountPath], config.timeouts.short),
        Effect.orElseSucceed((): PlistObject => ({}))
      )

    const detectSwapLocation = (): Effect.Effect<SwapLocation> =>
      pipe(
        executor.run(LS, ["-la", config.swapPath], config.timeouts.short),
        Effect.map((result) => (result.exitCode === 0 ? parseListing(result.stdout) : Unknown)),
        Effect.orElseSucceed(() => Unknown)
      )

    const listMountPoints = pipe(
      fs.readDirectory(config.volumesDirectory),
      Effect.mapError(
        (e) => new InventoryUnavailable({ path: config.volumesDirectory, reason: e.message })
      ),
      Effect.map((entries) => [
        config.rootPath,
        ...entries
          .filter((name) => !name.startsWith("."))
          .sort()
          .map((name) => `${config.volumesDirectory}/${name}`),
      ])
    )

    // /Volumes usually holds an alias of the root volume; it is not a second disk.
    const isRootAlias = (mountPath: string) =>
      mountPath === config.rootPath
        ? Effect.succeed(false)
        : Effect.map(fs.realPath(mountPath), (real) => real === config.rootPath)

    const readVolume = (mountPath: string): Effect.Effect<Option.Option<Volume>> =>
      pipe(
        Effect.gen(function* () {
          if (yield* isRootAlias(mountPath)) {
            return Option.none()
          }

          const capacity = yield* stats.getCapacity(mountPath)
          const info = yield* describe(mountPath)
          const name = volumeName(info, mountPath, config.systemVolumeName)

          return Option.some<Volume>({
            id: volumeId(info, mountPath),
            name,
            mountPath,
            totalBytes: capacity.totalBytes,
            availableBytes: capacity.availableBytes,
            isSystemVolume: isSystemVolume(info, {
              mountPath,
              name,
              rootPath: config.rootPath,
              systemVolumeName: config.systemVolumeName,
            }),
            isPhysicalExternal: isPhysicalExternal(info),
            hostsSwapFile: false,
          })
        }),
        Effect.catchAll((e) =>
          Effect.as(
            status.appendLog("warning", `Skipping ${mountPath}: ${e.message || e._tag}`),
            Option.none()
          )
        )
      )

    const refresh = () =>
      Effect.gen(function* () {
        const mountPoints = yield* listMountPoints
        const volumes = (yield* Effect.forEach(mountPoints, readVolume)).flatMap(Option.toArray)
        const location = yield* detectSwapLocation()

        const marked = markSwapHost(volumes, location, config)
        const selectable = (volume: Volume) =>
          isSelectableTarget(volume, config.targetPolicy, config.rootPath)
        // The current host stays listed even when the policy would not offer it.
        const listed = marked.filter((volume) => volume.hostsSwapFile || selectable(volume))

        yield* status.appendLog(
          "info",
          `Found ${volumes.length} volume(s), ${listed.filter(selectable).length} offered under ${config.targetPolicy}`
        )
        return { volumes: listed, location }
      })

    return { refresh, detectSwapLocation }
  })
)
