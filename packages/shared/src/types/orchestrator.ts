/**
 * Orchestrator interface — the contract between the bootstrapper and the
 * container orchestration engine.
 *
 * IMPORTANT: Implementations own process spawning and nothing else. They do
 * not wait for readiness, retry, or interpret the engine's output; a failed
 * invocation is reported by rejecting.
 */

export interface UpOptions {
  /** Rebuild images whose build context changed */
  build: boolean;
  /** Return once containers are started instead of attaching */
  detached: boolean;
  /** Compose profiles to enable */
  profiles: string[];
}

export interface DownOptions {
  /** Profiles to include so their services are torn down too */
  profiles: string[];
}

export interface LogsOptions {
  /** Keep streaming until the operator interrupts */
  follow: boolean;
}

export interface IOrchestrator {
  /** Build (if requested) and start the stack's services */
  up(options: UpOptions): Promise<void>;

  /** Stop and remove every service of the stack */
  down(options: DownOptions): Promise<void>;

  /** Pass one service's output through to the operator's terminal */
  logs(service: string, options: LogsOptions): Promise<void>;
}
