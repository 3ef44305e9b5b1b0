/**
 * Command dispatch for `whisper-stack`.
 *
 * `run()` never calls process.exit; it resolves to the exit code so the bin
 * wrapper (and tests) decide what to do with it.
 */

import { join } from "node:path";
import { parseArgs } from "node:util";
import { StackBootstrapper } from "./bootstrap/bootstrapper.js";
import { composeProjectName, loadConfig, type StackConfig } from "./config.js";
import { StackError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { DashboardProvisioner } from "./monitoring/dashboard-provisioner.js";
import { ComposeOrchestrator } from "./orchestrator/compose-orchestrator.js";
import { StackInspector } from "./orchestrator/stack-inspector.js";

export const CLI_NAME = "whisper-stack";

export const USAGE = [
  `Usage: ${CLI_NAME} <command>`,
  "",
  "Commands:",
  "  start          Build and start the Whisper API",
  "  start --all    Build and start the API with Prometheus and Grafana",
  "  stop           Stop and remove all services",
  "  logs [service] Follow a service's output (default: whisper-api)",
  "  status [--all] Show containers and probe endpoints",
  "  help           Show this message",
];

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
  out?: (line: string) => void;
  err?: (line: string) => void;
  /** Replace the wiring (tests) */
  createBootstrapper?: (config: StackConfig, logger: Logger, out: (line: string) => void) => StackBootstrapper;
  createLogger?: (config: StackConfig) => Logger;
}

/** Wire the real orchestrator, inspector and provisioner from config */
export function createBootstrapper(
  config: StackConfig,
  logger: Logger,
  out: (line: string) => void,
): StackBootstrapper {
  const monitoringDir = join(config.stackDir, "monitoring");
  return new StackBootstrapper({
    orchestrator: new ComposeOrchestrator({
      cwd: config.stackDir,
      composeFile: config.composeFile,
      projectName: config.projectName,
      command: config.composeCommand,
      logger,
    }),
    inspector: new StackInspector(composeProjectName(config), {
      socketPath: config.dockerSocket,
    }),
    provisioner: new DashboardProvisioner({
      sourceDir: join(monitoringDir, "dashboards"),
      targetDir: join(monitoringDir, "grafana", "dashboards"),
      logger,
    }),
    logger,
    out,
    report: {
      monitoringDir,
      logService: config.logService,
      cliName: CLI_NAME,
    },
  });
}

interface ParsedCommand {
  command: string;
  all: boolean;
  positionals: string[];
}

function parseCommand(argv: string[]): ParsedCommand {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      all: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
  const [command = "help", ...rest] = positionals;
  return {
    command: values.help ? "help" : command,
    all: values.all ?? false,
    positionals: rest,
  };
}

export async function run(argv: string[], options: RunOptions = {}): Promise<number> {
  const out = options.out ?? ((line: string) => console.log(line));
  const err = options.err ?? ((line: string) => console.error(line));
  const usage = (): void => USAGE.forEach((line) => err(line));

  let parsed: ParsedCommand;
  try {
    parsed = parseCommand(argv);
  } catch (e) {
    err(e instanceof Error ? e.message : String(e));
    usage();
    return 1;
  }
  const { command, all, positionals } = parsed;

  if (command === "help") {
    USAGE.forEach((line) => out(line));
    return 0;
  }

  const maxPositionals = command === "logs" ? 1 : 0;
  const known = ["start", "stop", "logs", "status"];
  if (!known.includes(command) || positionals.length > maxPositionals) {
    err(known.includes(command) ? `Unexpected argument: ${positionals[maxPositionals]}` : `Unknown command: ${command}`);
    usage();
    return 1;
  }
  if (all && command !== "start" && command !== "status") {
    err(`--all is not supported by "${command}"`);
    return 1;
  }

  let config: StackConfig;
  try {
    config = loadConfig(options.env ?? process.env);
  } catch (e) {
    err(e instanceof Error ? e.message : String(e));
    return 1;
  }

  const logger = (options.createLogger ?? ((c: StackConfig) => createLogger(c.logLevel)))(config);
  const bootstrapper = (options.createBootstrapper ?? createBootstrapper)(config, logger, out);
  const variant = all ? "all" : "single";

  try {
    switch (command) {
      case "start":
        await bootstrapper.start(variant);
        break;
      case "stop":
        await bootstrapper.stop();
        break;
      case "logs":
        await bootstrapper.logs(positionals[0]);
        break;
      case "status":
        await bootstrapper.status(variant);
        break;
    }
    return 0;
  } catch (e) {
    logger.debug({ err: e }, `${command} failed`);
    err(`❌ ${command} failed: ${e instanceof Error ? e.message : String(e)}`);
    return e instanceof StackError ? e.exitCode : 1;
  }
}
