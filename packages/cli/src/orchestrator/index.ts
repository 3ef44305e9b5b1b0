/**
 * Orchestrator Module
 *
 * Everything that talks to Docker: the compose CLI for lifecycle commands,
 * the Engine API (dockerode) for read-only inspection.
 *
 * This module must not print operator-facing text; that is the
 * bootstrapper's job.
 */

export { ComposeOrchestrator } from "./compose-orchestrator.js";
export type { ComposeOrchestratorOptions } from "./compose-orchestrator.js";
export { StackInspector, parseHealthStatus } from "./stack-inspector.js";
export type { IOrchestrator } from "@whisper-stack/shared";
