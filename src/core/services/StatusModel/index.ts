export { StatusModelTag, StatusModelLive, makeStatusModel } from "./StatusModel"
export type { StatusModel, StatusSnapshot } from "./StatusModel"
