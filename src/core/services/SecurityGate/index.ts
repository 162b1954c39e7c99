export { SecurityGateTag, SecurityGateLive, CSRUTIL } from "./SecurityGate"
export type { SecurityGate } from "./SecurityGate"
