/**
 * EngineConfig - paths, policy and timeouts the engine runs with.
 *
 * Defaults describe a stock macOS install. Hosts override individual fields
 * (the CLI maps its options onto `EngineConfigOverrides`).
 */

import { Context, Duration, Layer } from "effect"
import type { TargetPolicy } from "../domain/Volume"

export interface EngineTimeouts {
  /** cheap queries: ls, sysctl read, diskutil, sudo probe */
  readonly short: Duration.Duration
  /** csrutil */
  readonly medium: Duration.Duration
  /** every call routed through the authorization prompt, copies and dd included */
  readonly elevated: Duration.Duration
}

export interface EngineConfig {
  readonly swapPath: string
  readonly volumesDirectory: string
  readonly rootPath: string
  readonly systemVolumeName: string
  readonly targetPolicy: TargetPolicy
  readonly newSwapFileBytes: number
  readonly timeouts: EngineTimeouts
}

export interface EngineConfigOverrides {
  readonly swapPath?: string
  readonly volumesDirectory?: string
  readonly rootPath?: string
  readonly systemVolumeName?: string
  readonly targetPolicy?: TargetPolicy
  readonly newSwapFileBytes?: number
  readonly timeouts?: Partial<EngineTimeouts>
}

export const MiB = 1024 * 1024

export const defaultEngineConfig: EngineConfig = {
  swapPath: "/private/var/vm/swapfile",
  volumesDirectory: "/Volumes",
  rootPath: "/",
  systemVolumeName: "Macintosh HD",
  targetPolicy: "external-only",
  newSwapFileBytes: 1024 * MiB,
  timeouts: {
    short: Duration.seconds(3),
    medium: Duration.seconds(5),
    elevated: Duration.seconds(120),
  },
}

export const makeEngineConfig = (overrides: EngineConfigOverrides = {}): EngineConfig => {
  const base = defaultEngineConfig
  const timeouts = overrides.timeouts ?? {}
  return {
    swapPath: overrides.swapPath ?? base.swapPath,
    volumesDirectory: overrides.volumesDirectory ?? base.volumesDirectory,
    rootPath: overrides.rootPath ?? base.rootPath,
    systemVolumeName: overrides.systemVolumeName ?? base.systemVolumeName,
    targetPolicy: overrides.targetPolicy ?? base.targetPolicy,
    newSwapFileBytes: overrides.newSwapFileBytes ?? base.newSwapFileBytes,
    timeouts: {
      short: timeouts.short ?? base.timeouts.short,
      medium: timeouts.medium ?? base.timeouts.medium,
      elevated: timeouts.elevated ?? base.timeouts.elevated,
    },
  }
}

export class EngineConfigTag extends Context.Tag("EngineConfig")<EngineConfigTag, EngineConfig>() {}

export const EngineConfigLive = (overrides: EngineConfigOverrides = {}) =>
  Layer.succeed(EngineConfigTag, makeEngineConfig(overrides))
