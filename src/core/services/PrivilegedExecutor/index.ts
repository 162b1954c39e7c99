export {
  PrivilegedExecutorTag,
  PrivilegedExecutorLive,
  isPlistObject,
  parsePlist,
  readBoolean,
  readRecord,
  readString,
} from "./PrivilegedExecutor"
export type { PrivilegedExecutor } from "./PrivilegedExecutor"
