export { DriveInventoryTag, DriveInventoryLive, DISKUTIL, LS } from "./DriveInventory"
export type { DriveInventory, Inventory } from "./DriveInventory"
export {
  EXTERNAL_PROTOCOLS,
  VIRTUAL_FILESYSTEMS,
  isPhysicalExternal,
  isSystemVolume,
  isVirtualFilesystem,
} from "./classify"
