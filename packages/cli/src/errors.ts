/**
 * Error types surfaced to the operator.
 *
 * Every error carries the process exit code the CLI should finish with.
 */

export class StackError extends Error {
  readonly exitCode: number;

  constructor(message: string, options?: { cause?: unknown; exitCode?: number }) {
    super(message, { cause: options?.cause });
    this.name = new.target.name;
    this.exitCode = options?.exitCode ?? 1;
  }
}

/** Environment or on-disk configuration is unusable */
export class ConfigError extends StackError {}

/**
 * The orchestration engine could not be launched or exited non-zero.
 *
 * The engine's own output has already reached the terminal; this only
 * records how the invocation ended.
 */
export class OrchestrationError extends StackError {
  readonly command: string[];
  readonly code: number | null;
  readonly signal: NodeJS.Signals | null;

  constructor(
    command: string[],
    outcome: { code: number | null; signal: NodeJS.Signals | null },
    cause?: unknown,
  ) {
    super(describeOutcome(command, outcome, cause), {
      cause,
      exitCode: outcome.code !== null && outcome.code > 0 ? outcome.code : 1,
    });
    this.command = command;
    this.code = outcome.code;
    this.signal = outcome.signal;
  }
}

function describeOutcome(
  command: string[],
  outcome: { code: number | null; signal: NodeJS.Signals | null },
  cause: unknown,
): string {
  const cmd = command.join(" ");
  if (cause instanceof Error) return `Could not run "${cmd}": ${cause.message}`;
  if (outcome.signal) return `"${cmd}" was terminated by ${outcome.signal}`;
  return `"${cmd}" exited with code ${outcome.code ?? "unknown"}`;
}
