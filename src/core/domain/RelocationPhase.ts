import type { Volume } from "./Volume";

export type RelocationPhase =
  | "Idle"
  | "ValidatingPreconditions"
  | "AcquiringPrivileges"
  | "DisablingAccounting"
  | "Relocating"
  | "ReenablingAccounting"
  | "Completed"
  | "Failed";

export type RelocationOutcome =
  | { readonly _tag: "Relocated"; readonly destination: Volume }
  | { readonly _tag: "AlreadyInPlace"; readonly destination: Volume };
