/**
 * Docker Compose orchestrator.
 *
 * Runs the compose CLI as a child process attached to the operator's
 * terminal. Build output, pull progress and errors are the engine's own;
 * this class only decides the argv and turns a non-zero exit into an
 * OrchestrationError.
 *
 * IMPORTANT: No readiness checks, retries or output parsing here. The
 * bootstrapper owns the flow; the orchestrator owns the process.
 */

import { spawn } from "node:child_process";
import type {
  IOrchestrator,
  UpOptions,
  DownOptions,
  LogsOptions,
} from "@whisper-stack/shared";
import { OrchestrationError } from "../errors.js";
import type { Logger } from "../logger.js";

export interface ComposeOrchestratorOptions {
  /** Directory the compose command runs in */
  cwd: string;
  /** Compose file, relative to cwd */
  composeFile: string;
  projectName?: string;
  /** Compose command as argv, e.g. ["docker", "compose"] or ["docker-compose"] */
  command: string[];
  logger: Logger;
  /** Defaults to process.platform; win32 resolves the binary through the shell */
  platform?: NodeJS.Platform;
}

export class ComposeOrchestrator implements IOrchestrator {
  private bin: string;
  private prefixArgs: string[];
  private cwd: string;
  private composeFile: string;
  private projectName?: string;
  private logger: Logger;
  private useShell: boolean;

  constructor(options: ComposeOrchestratorOptions) {
    const [bin, ...prefixArgs] = options.command;
    if (!bin) throw new Error("Compose command must not be empty");
    this.bin = bin;
    this.prefixArgs = prefixArgs;
    this.cwd = options.cwd;
    this.composeFile = options.composeFile;
    this.projectName = options.projectName;
    this.logger = options.logger;
    // .cmd/.exe shims (docker-compose from Docker Desktop) need cmd.exe
    this.useShell = (options.platform ?? process.platform) === "win32";
  }

  async up(options: UpOptions): Promise<void> {
    const args = ["up"];
    if (options.build) args.push("--build");
    if (options.detached) args.push("-d");
    await this.run(options.profiles, args);
  }

  async down(options: DownOptions): Promise<void> {
    await this.run(options.profiles, ["down"]);
  }

  async logs(service: string, options: LogsOptions): Promise<void> {
    const args = ["logs"];
    if (options.follow) args.push("-f");
    args.push(service);
    await this.run([], args);
  }

  /** Full argv (without the binary) for a compose subcommand */
  buildArgs(profiles: string[], subcommand: string[]): string[] {
    const args = [...this.prefixArgs, "-f", this.composeFile];
    if (this.projectName) args.push("-p", this.projectName);
    for (const profile of profiles) args.push("--profile", profile);
    return [...args, ...subcommand];
  }

  private run(profiles: string[], subcommand: string[]): Promise<void> {
    const args = this.buildArgs(profiles, subcommand);
    const command = [this.bin, ...args];
    this.logger.debug({ command, cwd: this.cwd }, "Running orchestrator");

    return new Promise((resolve, reject) => {
      const options = { cwd: this.cwd, stdio: "inherit" as const };
      // cmd.exe joins argv unquoted, so hand it one pre-quoted line
      const child = this.useShell
        ? spawn(command.map(quoteForCmd).join(" "), { ...options, shell: true })
        : spawn(this.bin, args, { ...options, shell: false });

      child.on("error", (err: Error) => {
        reject(new OrchestrationError(command, { code: null, signal: null }, err));
      });

      child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
        if (code === 0) {
          resolve();
          return;
        }
        reject(new OrchestrationError(command, { code, signal }));
      });
    });
  }
}

/** Quote one argument for cmd.exe; plain words pass through unchanged */
export function quoteForCmd(arg: string): string {
  if (/^[\w@+=:,./\\-]+$/.test(arg)) return arg;
  return `"${arg.replace(/"/g, '""')}"`;
}
