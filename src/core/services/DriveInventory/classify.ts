import type { PlistObject } from "plist";
import { readBoolean, readRecord, readString } from "../PrivilegedExecutor";

export const EXTERNAL_PROTOCOLS = ["USB", "Thunderbolt", "SATA", "SAS", "FireWire", "External"];

/** Filesystem markers of network shares, pseudo filesystems and pinned system containers. */
export const VIRTUAL_FILESYSTEMS = [
  "autofs",
  "nfs",
  "cifs",
  "smbfs",
  "afpfs",
  "webdav",
  "ftp",
  "devfs",
  "vmware",
  "synthetics"
];

export interface SystemVolumeHints {
  readonly mountPath: string;
  readonly name: string;
  readonly rootPath: string;
  readonly systemVolumeName: string;
}

const bootsFromThisVolume = (info: PlistObject): boolean => {
  const volumeInfo = readRecord(info, "VolumeInfo");
  return (
    (volumeInfo !== undefined && readBoolean(volumeInfo, "BootFromThisVolume") === true) ||
    readBoolean(info, "BootFromThisVolume") === true
  );
};

/** Any one signal is enough. */
export const isSystemVolume = (info: PlistObject, hints: SystemVolumeHints): boolean =>
  bootsFromThisVolume(info) ||
  hints.mountPath === hints.rootPath ||
  hints.name === hints.systemVolumeName;

export const isVirtualFilesystem = (info: PlistObject): boolean => {
  const type = readString(info, "FilesystemType")?.toLowerCase();
  return type !== undefined && VIRTUAL_FILESYSTEMS.some((marker) => type.includes(marker));
};

/**
 * A block device (`/dev/disk*`) that either speaks an external protocol or
 * is flagged removable/external. The virtual filesystem exclusion is checked
 * last and overrides everything before it.
 */
export const isPhysicalExternal = (info: PlistObject): boolean => {
  const deviceNode = readString(info, "DeviceNode");
  if (deviceNode === undefined || !deviceNode.startsWith("/dev/disk")) {
    return false;
  }

  const protocol = readString(info, "Protocol") ?? "";
  const external =
    EXTERNAL_PROTOCOLS.some((p) => protocol.includes(p)) ||
    readBoolean(info, "RemovableMedia") === true ||
    readBoolean(info, "External") === true;

  return external && !isVirtualFilesystem(info);
};

export const volumeName = (info: PlistObject, mountPath: string, fallback: string): string =>
  readString(info, "VolumeName") ?? (mountPath.split("/").filter(Boolean).pop() || fallback);

export const volumeId = (info: PlistObject, mountPath: string): string =>
  readString(info, "VolumeUUID") ?? mountPath;
