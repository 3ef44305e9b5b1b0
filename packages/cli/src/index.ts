export { run, createBootstrapper, CLI_NAME, USAGE } from "./cli.js";
export type { RunOptions } from "./cli.js";
export { StackBootstrapper } from "./bootstrap/bootstrapper.js";
export type { StackBootstrapperOptions } from "./bootstrap/bootstrapper.js";
export { VARIANTS, MONITORING_PROFILE, GRAFANA_CREDENTIALS } from "./bootstrap/variants.js";
export { renderReport, renderStatus, formatEndpoint } from "./bootstrap/report.js";
export type { ReportContext } from "./bootstrap/report.js";
export { probeEndpoint, probeEndpoints } from "./bootstrap/endpoint-probe.js";
export { DashboardProvisioner } from "./monitoring/dashboard-provisioner.js";
export { loadConfig, composeProjectName, DEFAULT_STACK_DIR } from "./config.js";
export type { StackConfig } from "./config.js";
export { StackError, ConfigError, OrchestrationError } from "./errors.js";
export { createLogger } from "./logger.js";
export * from "./orchestrator/index.js";
