import { describe, expect, test } from "vitest"
import type { Volume } from "../core/domain/Volume"
import { formatLogEntry, formatVolume } from "./LoggerService"

const volume: Volume = {
  id: "UUID-EXT",
  name: "Ext",
  mountPath: "/Volumes/Ext",
  totalBytes: 2_000_000_000_000,
  availableBytes: 500_000_000_000,
  isSystemVolume: false,
  isPhysicalExternal: true,
  hostsSwapFile: false,
}

describe("formatVolume", () => {
  test("shows usage and the external tag", () => {
    expect(formatVolume(volume, true)).toBe(
      "  Ext (/Volumes/Ext): 1.50 TB/2.00 TB (75.0% full, 500.0 GB free) [external]"
    )
  })

  test("marks the swap host and volumes the policy does not offer", () => {
    expect(formatVolume({ ...volume, isPhysicalExternal: false, hostsSwapFile: true }, false)).toBe(
      "→ Ext (/Volumes/Ext): 1.50 TB/2.00 TB (75.0% full, 500.0 GB free) [swap, not offered]"
    )
  })
})

describe("formatLogEntry", () => {
  test("prefixes the local time and a fixed-width kind label", () => {
    const timestamp = new Date(2026, 0, 2, 9, 5, 7, 42)

    expect(formatLogEntry({ kind: "command", message: "/bin/ls -la /tmp", timestamp })).toBe(
      "09:05:07.042 $     /bin/ls -la /tmp"
    )
    expect(formatLogEntry({ kind: "warning", message: "careful", timestamp })).toBe(
      "09:05:07.042 WARN  careful"
    )
  })
})
