import { Match } from "effect";

import type { SwapError } from "../core/domain/SwapError";

export class AppError extends Error {
  readonly _tag = "AppError";

  constructor(
    readonly title: string,
    readonly detail: string,
    readonly suggestion: string
  ) {
    super(`${title}: ${detail}`);
  }

  format(): string {
    return [
      `ERROR: ${this.title}`,
      ``,
      `   ${this.detail}`,
      ``,
      `   Hint: ${this.suggestion}`
    ].join("\n");
  }
}

const errors = {
  sipEnabled: () =>
    new AppError(
      "System Integrity Protection is enabled",
      "The swap file lives on a protected system path and cannot be moved while SIP is on.",
      "Restart into Recovery, run 'csrutil disable', restart again, then retry."
    ),

  insufficientPermissions: (reason: string) =>
    new AppError(
      "Administrator privileges required",
      reason,
      "Approve the authorization prompt, or run 'sudo -v' first to cache your credentials."
    ),

  commandFailed: (command: string, detail: string) =>
    new AppError(
      "Command failed",
      `"${command}" failed: ${detail}`,
      "Run again with --show-log to see every command that ran. Swap accounting is re-enabled before this error is reported."
    ),

  volumeNotAvailable: (reference: string) =>
    new AppError(
      "Volume not available",
      `No destination volume matches "${reference}".`,
      "Run 'swapshift drives' to list the volumes that can receive the swap file, or use --policy all-volumes."
    ),

  swapFileMissing: (target: string) =>
    new AppError(
      "Swap file not found",
      `The swap path links to "${target}", which is not on any mounted volume.`,
      "Reconnect that volume, or move the swap file back to the system volume."
    ),

  commandTimedOut: (command: string, timeoutMillis: number) =>
    new AppError(
      "Command timed out",
      `"${command}" did not finish within ${timeoutMillis}ms and was stopped.`,
      "Check that the destination volume is responsive, then try again."
    ),

  inventoryUnavailable: (path: string, reason: string) =>
    new AppError(
      "Cannot list volumes",
      `Could not read "${path}": ${reason}`,
      "Grant your terminal Full Disk Access in System Settings > Privacy & Security."
    ),

  relocationInProgress: () =>
    new AppError(
      "Relocation already running",
      "Another relocation is in progress.",
      "Wait for it to finish before starting a new one."
    ),

  invalidOption: (message: string) =>
    new AppError(
      "Invalid option",
      message,
      "Sizes look like 512MB or 2GB and must be a whole number of MiB."
    ),

  unexpected: (message: string) =>
    new AppError("Unexpected error", message, `If this persists, please report this issue.`),

  permissionDenied: (message: string) =>
    new AppError(
      "Permission denied",
      message,
      `Check that you have the required permissions. You may need to run with elevated privileges.`
    )
};

const matchSwapError = Match.typeTags<SwapError>()({
  SIPEnabled: () => errors.sipEnabled(),
  InsufficientPermissions: (e) => errors.insufficientPermissions(e.reason),
  CommandExecutionFailed: (e) => errors.commandFailed(e.command, e.detail),
  DriveNotFound: (e) => errors.volumeNotAvailable(e.volumeId),
  NoSwapFileDetected: (e) => errors.swapFileMissing(e.target),
  CommandTimedOut: (e) => errors.commandTimedOut(e.command, e.timeoutMillis),
  UnknownError: (e) => errors.unexpected(e.detail),
  InventoryUnavailable: (e) => errors.inventoryUnavailable(e.path, e.reason),
  RelocationInProgress: () => errors.relocationInProgress()
});

const SWAP_ERROR_TAGS: ReadonlySet<string> = new Set<SwapError["_tag"]>([
  "SIPEnabled",
  "InsufficientPermissions",
  "CommandExecutionFailed",
  "DriveNotFound",
  "NoSwapFileDetected",
  "CommandTimedOut",
  "UnknownError",
  "InventoryUnavailable",
  "RelocationInProgress"
]);

const isSwapError = (e: unknown): e is SwapError =>
  e instanceof Error && "_tag" in e && typeof e._tag === "string" && SWAP_ERROR_TAGS.has(e._tag);

const isPermissionError = (message: string): boolean =>
  message.toLowerCase().includes("permission denied") ||
  message.toLowerCase().includes("eacces") ||
  message.toLowerCase().includes("operation not permitted") ||
  message.toLowerCase().includes("eperm");

export const fromDomainError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }

  if (isSwapError(error)) {
    return matchSwapError(error);
  }

  if (error instanceof Error) {
    return isPermissionError(error.message)
      ? errors.permissionDenied(error.message)
      : errors.unexpected(error.message);
  }

  return errors.unexpected(String(error));
};

export const {
  sipEnabled,
  insufficientPermissions,
  commandFailed,
  volumeNotAvailable,
  swapFileMissing,
  commandTimedOut,
  inventoryUnavailable,
  relocationInProgress,
  invalidOption,
  unexpected,
  permissionDenied
} = errors;
