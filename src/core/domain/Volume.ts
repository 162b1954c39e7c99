export interface Volume {
  readonly id: string;
  readonly name: string;
  readonly mountPath: string;
  readonly totalBytes: number;
  readonly availableBytes: number;
  readonly isSystemVolume: boolean;
  readonly isPhysicalExternal: boolean;
  readonly hostsSwapFile: boolean;
}

export type TargetPolicy = "external-only" | "all-volumes";

export const TARGET_POLICIES: ReadonlyArray<TargetPolicy> = ["external-only", "all-volumes"];

export const usedBytes = (volume: Volume): number => volume.totalBytes - volume.availableBytes;

export const usagePercent = (volume: Volume): number =>
  volume.totalBytes === 0 ? 0 : (usedBytes(volume) / volume.totalBytes) * 100;

/**
 * Whether a volume may be offered as a relocation destination.
 *
 * `external-only` keeps the root system volume (the way back) and every
 * non-system physical external volume. `all-volumes` offers everything that
 * was enumerated.
 */
export const isSelectableTarget = (
  volume: Volume,
  policy: TargetPolicy,
  rootPath: string
): boolean => {
  if (policy === "all-volumes") return true;
  if (volume.mountPath === rootPath) return true;
  return !volume.isSystemVolume && volume.isPhysicalExternal;
};

const withTrailingSlash = (path: string): string => (path.endsWith("/") ? path : `${path}/`);

export const containsPath = (mountPath: string, path: string): boolean =>
  path === mountPath || path.startsWith(withTrailingSlash(mountPath));

/**
 * Pick the volume whose mount path is the longest prefix of `path`.
 * The root volume matches everything, so nested mounts win over it.
 */
export const volumeContaining = (
  volumes: ReadonlyArray<Volume>,
  path: string
): Volume | undefined =>
  volumes
    .filter((volume) => containsPath(volume.mountPath, path))
    .reduce<Volume | undefined>(
      (best, volume) =>
        best === undefined || volume.mountPath.length > best.mountPath.length ? volume : best,
      undefined
    );

export const currentHost = (volumes: ReadonlyArray<Volume>): Volume | undefined =>
  volumes.find((volume) => volume.hostsSwapFile);

export const findVolume = (
  volumes: ReadonlyArray<Volume>,
  reference: string
): Volume | undefined =>
  volumes.find((volume) => volume.id === reference) ??
  volumes.find((volume) => volume.mountPath === reference) ??
  volumes.find((volume) => volume.name === reference);

export const swapTargetPath = (volume: Volume, swapPath: string, rootPath: string): string =>
  volume.mountPath === rootPath ? swapPath : `${volume.mountPath.replace(/\/+$/, "")}${swapPath}`;
