import { describe, expect, test } from "vitest";
import type { PlistObject } from "plist";
import { isPhysicalExternal, isSystemVolume, volumeId, volumeName } from "./classify";

const usbDisk: PlistObject = {
  DeviceNode: "/dev/disk4s1",
  Protocol: "USB",
  FilesystemType: "apfs",
  RemovableMedia: false
};

const hints = {
  mountPath: "/Volumes/Ext",
  name: "Ext",
  rootPath: "/",
  systemVolumeName: "Macintosh HD"
};

describe("isPhysicalExternal", () => {
  test.each(["USB", "Thunderbolt", "SATA", "PCI-Express External", "FireWire"])(
    "accepts a block device on %s",
    (protocol) => {
      expect(isPhysicalExternal({ ...usbDisk, Protocol: protocol })).toBe(true);
    }
  );

  test("accepts a removable or external flag without a known protocol", () => {
    expect(isPhysicalExternal({ DeviceNode: "/dev/disk5s2", RemovableMedia: true })).toBe(true);
    expect(isPhysicalExternal({ DeviceNode: "/dev/disk5s2", External: true })).toBe(true);
  });

  test("rejects an internal disk", () => {
    expect(
      isPhysicalExternal({ DeviceNode: "/dev/disk3s5", Protocol: "Apple Fabric", RemovableMedia: false })
    ).toBe(false);
  });

  test("requires a /dev/disk device node", () => {
    expect(isPhysicalExternal({ ...usbDisk, DeviceNode: "//user@nas/share" })).toBe(false);
    expect(isPhysicalExternal({ Protocol: "USB", FilesystemType: "apfs" })).toBe(false);
  });

  test.each(["nfs", "smbfs", "autofs", "webdav", "afpfs"])(
    "never treats a %s filesystem as physical, whatever else it reports",
    (filesystemType) => {
      expect(
        isPhysicalExternal({ ...usbDisk, FilesystemType: filesystemType, RemovableMedia: true, External: true })
      ).toBe(false);
    }
  );

  test("matches filesystem markers case-insensitively", () => {
    expect(isPhysicalExternal({ ...usbDisk, FilesystemType: "SMBFS" })).toBe(false);
  });
});

describe("isSystemVolume", () => {
  test("reads the nested boot flag", () => {
    expect(isSystemVolume({ VolumeInfo: { BootFromThisVolume: true } }, hints)).toBe(true);
  });

  test("reads the top-level boot flag", () => {
    expect(isSystemVolume({ BootFromThisVolume: true }, hints)).toBe(true);
  });

  test("treats the root mount and the configured name as system", () => {
    expect(isSystemVolume({}, { ...hints, mountPath: "/" })).toBe(true);
    expect(isSystemVolume({}, { ...hints, name: "Macintosh HD" })).toBe(true);
  });

  test("an ordinary external volume is not system", () => {
    expect(isSystemVolume(usbDisk, hints)).toBe(false);
  });
});

describe("volume naming", () => {
  test("prefers the diskutil name", () => {
    expect(volumeName({ VolumeName: "Backup" }, "/Volumes/Backup 1", "Macintosh HD")).toBe("Backup");
  });

  test("falls back to the directory name, and to the system name for the root", () => {
    expect(volumeName({}, "/Volumes/Backup", "Macintosh HD")).toBe("Backup");
    expect(volumeName({}, "/", "Macintosh HD")).toBe("Macintosh HD");
  });

  test("ids come from the volume UUID, else the mount path", () => {
    expect(volumeId({ VolumeUUID: "UUID-1" }, "/Volumes/Ext")).toBe("UUID-1");
    expect(volumeId({}, "/Volumes/Ext")).toBe("/Volumes/Ext");
  });
});
