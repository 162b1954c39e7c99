/**
 * DiskStatsService - wraps check-disk-space for testability.
 *
 * Reports capacity for a mounted volume. On macOS check-disk-space shells out
 * to `df`; failures are converted to typed errors so the inventory can skip a
 * single unreadable volume.
 */

import { Context, Data, Effect, Layer, pipe } from "effect"
import checkDiskSpace from "check-disk-space"

// =============================================================================
// Typed errors
// =============================================================================

export class DiskStatsPermissionDenied extends Data.TaggedError("DiskStatsPermissionDenied")<{
  readonly path: string
}> {}

export class DiskStatsUnavailable extends Data.TaggedError("DiskStatsUnavailable")<{
  readonly path: string
  readonly cause: string
}> {}

export type DiskStatsError = DiskStatsPermissionDenied | DiskStatsUnavailable

export interface VolumeCapacity {
  readonly totalBytes: number
  readonly availableBytes: number
}

// =============================================================================
// Service interface
// =============================================================================

export interface DiskStatsService {
  readonly getCapacity: (mountPath: string) => Effect.Effect<VolumeCapacity, DiskStatsError>
}

export class DiskStatsServiceTag extends Context.Tag("DiskStatsService")<
  DiskStatsServiceTag,
  DiskStatsService
>() {}

// =============================================================================
// Error detection
// =============================================================================

const errorText = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)

const errorCode = (error: unknown): string | undefined =>
  typeof error === "object" && error !== null && "code" in error && typeof error.code === "string"
    ? error.code.toUpperCase()
    : undefined

export const toDiskStatsError = (path: string, error: unknown): DiskStatsError => {
  const code = errorCode(error)
  const message = errorText(error)
  const lower = message.toLowerCase()

  if (
    code === "EACCES" ||
    code === "EPERM" ||
    lower.includes("permission denied") ||
    lower.includes("operation not permitted")
  ) {
    return new DiskStatsPermissionDenied({ path })
  }

  return new DiskStatsUnavailable({ path, cause: message })
}

// =============================================================================
// Live implementation (check-disk-space)
// =============================================================================

export const DiskStatsServiceLive = Layer.succeed(DiskStatsServiceTag, {
  getCapacity: (mountPath) =>
    pipe(
      Effect.tryPromise({
        try: () => checkDiskSpace(mountPath),
        catch: (e) => toDiskStatsError(mountPath, e),
      }),
      Effect.map(({ free, size }) => ({ totalBytes: size, availableBytes: free }))
    ),
})
