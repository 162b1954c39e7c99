import { Args, Options } from "@effect/cli";
import { TARGET_POLICIES, type TargetPolicy } from "../core/domain/Volume";

export const policy = Options.choice("policy", TARGET_POLICIES).pipe(
  Options.withDescription(
    "Which volumes may receive the swap file: external-only (system + physical external disks) or all-volumes"
  ),
  Options.withDefault("external-only" as const)
);

export const swapSize = Options.text("swap-size").pipe(
  Options.withDescription("Size of a newly created swap file when none exists (e.g., 512MB, 2GB)"),
  Options.optional
);

export const showLog = Options.boolean("show-log").pipe(
  Options.withDescription("Print the engine's command log after the command finishes"),
  Options.withDefault(false)
);

export const debug = Options.boolean("debug").pipe(
  Options.withDescription("Enable verbose debug logging"),
  Options.withDefault(false)
);

export const yes = Options.boolean("yes").pipe(
  Options.withAlias("y"),
  Options.withDescription("Move without asking for confirmation"),
  Options.withDefault(false)
);

export const volume = Args.text({ name: "volume" }).pipe(
  Args.withDescription("Destination volume: name, mount path or volume UUID")
);

export interface GlobalOptions {
  readonly policy: TargetPolicy;
  readonly swapSize: string | undefined;
  readonly showLog: boolean;
  readonly debug?: boolean;
}

export interface MoveOptions extends GlobalOptions {
  readonly volume: string;
}
