export {
  RelocationOrchestratorTag,
  RelocationOrchestratorLive,
  SUDO,
  SYSCTL,
  ECHO,
} from "./RelocationOrchestrator"
export type { RelocationOrchestrator } from "./RelocationOrchestrator"
export {
  planRelocation,
  isRootDestination,
  MKDIR,
  RM,
  CP,
  CHMOD,
  LN,
  DD,
  TEST,
  DYNAMIC_PAGER,
} from "./RelocationPlan"
export type { PlanInput, RelocationPlan, RelocationStep } from "./RelocationPlan"
