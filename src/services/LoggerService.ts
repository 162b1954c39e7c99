/**
 * LoggerService - formatted console output for the status, drives and move commands
 */

import { Context, Effect, Layer, Console } from "effect"
import { formatTimestamp, type LogEntry, type LogKind } from "../core/domain/LogEntry"
import type { SecurityState } from "../core/domain/SecurityState"
import { usagePercent, usedBytes, type TargetPolicy, type Volume } from "../core/domain/Volume"
import { formatCapacity } from "../core/lib/parseSize"

// =============================================================================
// Service interface
// =============================================================================

export interface LoggerService {
  readonly status: {
    readonly header: Effect.Effect<void>
    readonly security: (security: SecurityState) => Effect.Effect<void>
    readonly location: (description: string, volume: Volume | undefined) => Effect.Effect<void>
    readonly lastError: (message: string) => Effect.Effect<void>
  }
  readonly drives: {
    readonly header: (policy: TargetPolicy) => Effect.Effect<void>
    readonly none: Effect.Effect<void>
    readonly volume: (volume: Volume, selectable: boolean) => Effect.Effect<void>
  }
  readonly move: {
    readonly header: Effect.Effect<void>
    readonly plan: (from: string, to: Volume) => Effect.Effect<void>
    readonly cancelled: Effect.Effect<void>
    readonly alreadyInPlace: (volume: Volume) => Effect.Effect<void>
    readonly relocated: (volume: Volume) => Effect.Effect<void>
  }
  readonly log: (entries: ReadonlyArray<LogEntry>) => Effect.Effect<void>
}

export class LoggerServiceTag extends Context.Tag("LoggerService")<
  LoggerServiceTag,
  LoggerService
>() {}

// =============================================================================
// Formatting
// =============================================================================

const KIND_LABELS: Record<LogKind, string> = {
  info: "INFO ",
  warning: "WARN ",
  error: "ERROR",
  command: "$    ",
  output: "  >  ",
}

export const formatLogEntry = (entry: LogEntry): string =>
  `${formatTimestamp(entry.timestamp)} ${KIND_LABELS[entry.kind]} ${entry.message}`

export const formatVolume = (volume: Volume, selectable: boolean): string => {
  const marker = volume.hostsSwapFile ? "→" : " "
  const tags = [
    volume.isSystemVolume ? "system" : undefined,
    volume.isPhysicalExternal ? "external" : undefined,
    volume.hostsSwapFile ? "swap" : undefined,
    selectable ? undefined : "not offered",
  ].filter((tag) => tag !== undefined)

  return (
    `${marker} ${volume.name} (${volume.mountPath}): ` +
    `${formatCapacity(usedBytes(volume))}/${formatCapacity(volume.totalBytes)} ` +
    `(${usagePercent(volume).toFixed(1)}% full, ${formatCapacity(volume.availableBytes)} free)` +
    (tags.length > 0 ? ` [${tags.join(", ")}]` : "")
  )
}

// =============================================================================
// Implementation
// =============================================================================

export const LoggerServiceLive = Layer.succeed(LoggerServiceTag, {
  status: {
    header: Console.log("\n🔄 swapshift - Status\n"),
    security: (security) =>
      security.checkedAt === undefined
        ? Console.log("   SIP: unknown (check failed)")
        : Console.log(
            security.sipDisabled
              ? "   SIP: disabled - relocation allowed"
              : "   SIP: enabled - relocation locked"
          ),
    location: (description, volume) =>
      Console.log(
        volume === undefined
          ? `   Swap: ${description}`
          : `   Swap: ${description}, ${formatCapacity(volume.availableBytes)} free`
      ),
    lastError: (message) => Console.error(`\n⚠️  ${message}`),
  },
  drives: {
    header: (policy) => Console.log(`\n💽 Volumes (${policy})\n`),
    none: Console.error("❌ No volumes found"),
    volume: (volume, selectable) => Console.log(`  ${formatVolume(volume, selectable)}`),
  },
  move: {
    header: Console.log("\n🔄 swapshift - Move\n"),
    plan: (from, to) => Console.log(`   Moving swap from ${from} to ${to.name} (${to.mountPath})`),
    cancelled: Console.log("\n✗ Cancelled, nothing was changed\n"),
    alreadyInPlace: (volume) => Console.log(`\n✓ Swap is already on ${volume.name}, nothing to do\n`),
    relocated: (volume) => Console.log(`\n✅ Swap relocated to ${volume.name}\n`),
  },
  log: (entries) =>
    Effect.gen(function* () {
      yield* Console.log("\n📜 Command log:")
      yield* Effect.forEach(entries, (entry) => Console.log(`   ${formatLogEntry(entry)}`), {
        discard: true,
      })
    }),
})
