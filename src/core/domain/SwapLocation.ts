import { containsPath, currentHost, volumeContaining, type Volume } from "./Volume";

/** Where the canonical swap path currently points. */
export type SwapLocation =
  | { readonly _tag: "Unknown" }
  | { readonly _tag: "InPlace" }
  | { readonly _tag: "Linked"; readonly target: string };

export const Unknown: SwapLocation = { _tag: "Unknown" };
export const InPlace: SwapLocation = { _tag: "InPlace" };
export const Linked = (target: string): SwapLocation => ({ _tag: "Linked", target });

/**
 * Parse one `ls -la <path>` line. A leading `l` in the mode column marks a
 * symbolic link; everything after the last " -> " is its target.
 */
export const parseListing = (output: string): SwapLocation => {
  const line = output
    .split("\n")
    .map((l) => l.trim())
    .find((l) => l.length > 0);

  if (!line) return Unknown;

  const arrow = line.lastIndexOf(" -> ");
  if (line.startsWith("l") && arrow !== -1) {
    const target = line.slice(arrow + " -> ".length).trim();
    return target.length > 0 ? Linked(target) : Unknown;
  }

  return line.startsWith("-") ? InPlace : Unknown;
};

export interface HostPaths {
  readonly rootPath: string;
  readonly volumesDirectory: string;
}

/**
 * Volume that a location resolves to, before any hostsSwapFile marking.
 * A link into the volumes directory that no mounted volume contains is
 * dangling; it does not fall back to the root volume.
 */
export const resolveHost = (
  volumes: ReadonlyArray<Volume>,
  location: SwapLocation,
  paths: HostPaths
): Volume | undefined => {
  switch (location._tag) {
    case "Unknown":
      return undefined;
    case "InPlace":
      return (
        volumes.find((v) => v.mountPath === paths.rootPath) ?? volumes.find((v) => v.isSystemVolume)
      );
    case "Linked": {
      const host = volumeContaining(volumes, location.target);
      const dangling =
        host !== undefined &&
        host.mountPath === paths.rootPath &&
        containsPath(paths.volumesDirectory, location.target);
      return dangling ? undefined : host;
    }
  }
};

/** Rebuild the list with exactly the resolved host flagged, or none. */
export const markSwapHost = (
  volumes: ReadonlyArray<Volume>,
  location: SwapLocation,
  paths: HostPaths
): ReadonlyArray<Volume> => {
  const host = resolveHost(volumes, location, paths);
  return volumes.map((volume) => ({ ...volume, hostsSwapFile: volume === host }));
};

export const describeLocation = (location: SwapLocation, volumes: ReadonlyArray<Volume>): string => {
  const host = currentHost(volumes);
  switch (location._tag) {
    case "Unknown":
      return "unknown";
    case "InPlace":
      return host ? `${host.name} (in place)` : "system volume (in place)";
    case "Linked":
      return host ? `${host.name} (${location.target})` : `unmounted target ${location.target}`;
  }
};
