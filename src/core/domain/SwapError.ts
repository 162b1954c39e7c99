import { Data, Match } from "effect"

// =============================================================================
// Errors shared by the executor, the inventory and the orchestrator
// =============================================================================

export class SIPEnabled extends Data.TaggedError("SIPEnabled")<{}> {}

export class InsufficientPermissions extends Data.TaggedError("InsufficientPermissions")<{
  readonly reason: string
}> {}

export class CommandExecutionFailed extends Data.TaggedError("CommandExecutionFailed")<{
  readonly command: string
  readonly detail: string
}> {}

export class DriveNotFound extends Data.TaggedError("DriveNotFound")<{
  readonly volumeId: string
}> {}

export class NoSwapFileDetected extends Data.TaggedError("NoSwapFileDetected")<{
  readonly target: string
}> {}

export class CommandTimedOut extends Data.TaggedError("CommandTimedOut")<{
  readonly command: string
  readonly timeoutMillis: number
}> {}

export class UnknownError extends Data.TaggedError("UnknownError")<{
  readonly detail: string
}> {}

export class InventoryUnavailable extends Data.TaggedError("InventoryUnavailable")<{
  readonly path: string
  readonly reason: string
}> {}

export class RelocationInProgress extends Data.TaggedError("RelocationInProgress")<{}> {}

export type CommandError = CommandExecutionFailed | CommandTimedOut

export type SwapError =
  | SIPEnabled
  | InsufficientPermissions
  | CommandExecutionFailed
  | DriveNotFound
  | NoSwapFileDetected
  | CommandTimedOut
  | UnknownError
  | InventoryUnavailable
  | RelocationInProgress

/** One-line description used for `lastError` and the log feed. */
export const describeSwapError = Match.typeTags<SwapError>()({
  SIPEnabled: () => "System Integrity Protection is enabled",
  InsufficientPermissions: (e) => `Administrator privileges not granted: ${e.reason}`,
  CommandExecutionFailed: (e) => `Command failed: ${e.command}: ${e.detail}`,
  DriveNotFound: (e) => `Volume not available as a destination: ${e.volumeId}`,
  NoSwapFileDetected: (e) => `Swap file not found at ${e.target}`,
  CommandTimedOut: (e) => `Command timed out after ${e.timeoutMillis}ms: ${e.command}`,
  UnknownError: (e) => `Unknown error: ${e.detail}`,
  InventoryUnavailable: (e) => `Cannot read ${e.path}: ${e.reason}`,
  RelocationInProgress: () => "Another relocation is already running",
})
