/**
 * RelocationPlan - the ordered file operations for one relocation.
 *
 * Pure: given where the swap file is now and where it should go, produce the
 * steps. Every `Run` step is executed elevated; `RemoveIfPresent` probes with
 * `test -f` first and only then removes.
 */

import { MiB } from "../../config/EngineConfig";
import type { SwapLocation } from "../../domain/SwapLocation";
import { swapTargetPath, type Volume } from "../../domain/Volume";

export const MKDIR = "/bin/mkdir";
export const RM = "/bin/rm";
export const CP = "/bin/cp";
export const CHMOD = "/bin/chmod";
export const LN = "/bin/ln";
export const DD = "/bin/dd";
export const TEST = "/bin/test";
export const DYNAMIC_PAGER = "/usr/sbin/dynamic_pager";

export type RelocationStep =
  | {
      readonly _tag: "Run";
      readonly path: string;
      readonly args: ReadonlyArray<string>;
      readonly summary: string;
    }
  | { readonly _tag: "RemoveIfPresent"; readonly path: string };

export interface PlanInput {
  readonly destination: Volume;
  readonly location: SwapLocation;
  readonly swapPath: string;
  readonly rootPath: string;
  readonly newSwapFileBytes: number;
}

export interface RelocationPlan {
  readonly targetPath: string;
  readonly steps: ReadonlyArray<RelocationStep>;
}

const run = (path: string, args: ReadonlyArray<string>, summary: string): RelocationStep => ({
  _tag: "Run",
  path,
  args,
  summary
});

const parentDirectory = (path: string): string => path.replace(/\/[^/]+\/?$/, "") || "/";

const zeroFill = (target: string, bytes: number): RelocationStep =>
  run(
    DD,
    ["if=/dev/zero", `of=${target}`, "bs=1m", `count=${Math.ceil(bytes / MiB)}`],
    `Create a ${Math.ceil(bytes / MiB)} MiB swap file at ${target}`
  );

const prepareTarget = (target: string): ReadonlyArray<RelocationStep> => [
  run(MKDIR, ["-p", parentDirectory(target)], `Create ${parentDirectory(target)}`),
  { _tag: "RemoveIfPresent", path: target }
];

const permissions = (target: string) => run(CHMOD, ["644", target], `Set permissions on ${target}`);

const link = (target: string, swapPath: string) =>
  run(LN, ["-s", target, swapPath], `Link ${swapPath} to ${target}`);

export const isRootDestination = (destination: Volume, rootPath: string): boolean =>
  destination.mountPath === rootPath;

export const planRelocation = (input: PlanInput): RelocationPlan => {
  const { destination, location, swapPath, rootPath, newSwapFileBytes } = input;
  const targetPath = swapTargetPath(destination, swapPath, rootPath);

  if (isRootDestination(destination, rootPath)) {
    switch (location._tag) {
      case "Linked":
        return {
          targetPath,
          steps: [
            run(RM, [swapPath], `Remove the link at ${swapPath}`),
            run(DYNAMIC_PAGER, ["-F", swapPath], `Regenerate the default swap file`)
          ]
        };
      case "Unknown":
        return {
          targetPath,
          steps: [
            run(MKDIR, ["-p", parentDirectory(swapPath)], `Create ${parentDirectory(swapPath)}`),
            zeroFill(swapPath, newSwapFileBytes),
            permissions(swapPath)
          ]
        };
      case "InPlace":
        return { targetPath, steps: [] };
    }
  }

  switch (location._tag) {
    case "Unknown":
      return {
        targetPath,
        steps: [
          ...prepareTarget(targetPath),
          zeroFill(targetPath, newSwapFileBytes),
          permissions(targetPath),
          link(targetPath, swapPath)
        ]
      };
    case "InPlace":
      return {
        targetPath,
        steps: [
          ...prepareTarget(targetPath),
          run(CP, [swapPath, targetPath], `Copy the swap file to ${targetPath}`),
          permissions(targetPath),
          run(RM, [swapPath], `Remove the original at ${swapPath}`),
          link(targetPath, swapPath)
        ]
      };
    case "Linked":
      return {
        targetPath,
        steps: [
          ...prepareTarget(targetPath),
          run(CP, [swapPath, targetPath], `Copy the swap file to ${targetPath}`),
          permissions(targetPath),
          run(RM, [swapPath], `Remove the link at ${swapPath}`),
          link(targetPath, swapPath),
          run(RM, [location.target], `Remove the previous file at ${location.target}`)
        ]
      };
  }
};
