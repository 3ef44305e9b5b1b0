export type {
  StackVariant,
  StackEndpoint,
  VariantProfile,
  BootstrapState,
  HealthHint,
  ServiceState,
  ProbeResult,
  StackStatus,
} from "./types/stack.js";
export type {
  UpOptions,
  DownOptions,
  LogsOptions,
  IOrchestrator,
} from "./types/orchestrator.js";
