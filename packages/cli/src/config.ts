/**
 * CLI configuration, read from the environment and validated with Typebox.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { basename, dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigError } from "./errors.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

/** `stack/` at the repository root, next to `packages/` */
export const DEFAULT_STACK_DIR = join(__dirname, "../../../stack");

export const LogLevel = Type.Union([
  Type.Literal("fatal"),
  Type.Literal("error"),
  Type.Literal("warn"),
  Type.Literal("info"),
  Type.Literal("debug"),
  Type.Literal("trace"),
  Type.Literal("silent"),
]);

export type LogLevel = Static<typeof LogLevel>;

export const StackConfig = Type.Object({
  /** Directory holding the compose file; commands run from here */
  stackDir: Type.String({ minLength: 1 }),
  composeFile: Type.String({ minLength: 1, default: "docker-compose.yml" }),
  /** Compose project name (compose derives one from the compose file's directory if unset) */
  projectName: Type.Optional(Type.String({ pattern: "^[a-z0-9][a-z0-9_-]*$" })),
  /** Compose command split into argv, e.g. ["docker", "compose"] */
  composeCommand: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
  /** Service whose output `logs` streams when none is named */
  logService: Type.String({ minLength: 1, default: "whisper-api" }),
  /** Engine API socket; unset lets dockerode pick (DOCKER_HOST, npipe on Windows) */
  dockerSocket: Type.Optional(Type.String({ minLength: 1 })),
  logLevel: Type.Union(LogLevel.anyOf, { default: "info" }),
});

export type StackConfig = Static<typeof StackConfig>;

/**
 * Build the configuration from environment variables.
 * Empty variables count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): StackConfig {
  const raw: Record<string, unknown> = {
    stackDir: env.WHISPER_STACK_DIR || DEFAULT_STACK_DIR,
    // Array defaults are merged slot by slot, so this one is set here
    composeCommand: env.WHISPER_STACK_COMPOSE_BIN
      ? env.WHISPER_STACK_COMPOSE_BIN.trim().split(/\s+/).filter(Boolean)
      : ["docker", "compose"],
  };
  if (env.WHISPER_STACK_COMPOSE_FILE) raw.composeFile = env.WHISPER_STACK_COMPOSE_FILE;
  // The compose child inherits COMPOSE_PROJECT_NAME and honours it
  const projectName = env.WHISPER_STACK_PROJECT || env.COMPOSE_PROJECT_NAME;
  if (projectName) raw.projectName = projectName;
  if (env.WHISPER_STACK_LOG_SERVICE) raw.logService = env.WHISPER_STACK_LOG_SERVICE;
  if (env.DOCKER_SOCKET) raw.dockerSocket = env.DOCKER_SOCKET;
  if (env.LOG_LEVEL) raw.logLevel = env.LOG_LEVEL;

  const config = Value.Default(StackConfig, raw);
  if (!Value.Check(StackConfig, config)) {
    const details = [...Value.Errors(StackConfig, config)].map(
      (e) => `${e.path || "/"}: ${e.message}`,
    );
    throw new ConfigError(`Invalid configuration (${details.join("; ")})`);
  }
  return config;
}

/**
 * The project name compose would pick: the basename of the first compose
 * file's directory, lowercased, with anything outside [a-z0-9_-] dropped.
 */
export function composeProjectName(config: StackConfig): string {
  if (config.projectName) return config.projectName;
  const base = basename(dirname(resolve(config.stackDir, config.composeFile)));
  return base.toLowerCase().replace(/[^a-z0-9_-]/g, "").replace(/^[_-]+/, "");
}
