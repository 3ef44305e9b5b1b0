/**
 * Stack Bootstrapper — brings the stack up, waits a fixed grace period and
 * prints where everything should be reachable.
 *
 * The wait is blind: no health endpoint is polled before the report. Use
 * `status()` to actually check what is up.
 *
 * Flow: not-started → start() → starting → (grace period) → reported-ready.
 * stop() returns to not-started.
 */

import type {
  BootstrapState,
  IOrchestrator,
  ProbeResult,
  ServiceState,
  StackStatus,
  StackVariant,
} from "@whisper-stack/shared";
import type { Logger } from "../logger.js";
import type { DashboardProvisioner } from "../monitoring/dashboard-provisioner.js";
import type { StackInspector } from "../orchestrator/stack-inspector.js";
import { probeEndpoints } from "./endpoint-probe.js";
import { renderReport, renderStatus, type ReportContext } from "./report.js";
import { MONITORING_PROFILE, VARIANTS } from "./variants.js";

export interface StackBootstrapperOptions {
  orchestrator: IOrchestrator;
  logger: Logger;
  report: ReportContext;
  /** Needed for `start --all` to copy dashboards into place */
  provisioner?: DashboardProvisioner;
  /** Needed for `status` */
  inspector?: StackInspector;
  /** Where operator-facing lines go (default: console.log) */
  out?: (line: string) => void;
  /** Grace-period implementation (overridable for tests) */
  sleep?: (ms: number) => Promise<void>;
  probe?: (urls: string[]) => Promise<ProbeResult[]>;
}

interface ListedServices {
  services: ServiceState[];
  dockerError?: string;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class StackBootstrapper {
  private orchestrator: IOrchestrator;
  private logger: Logger;
  private reportCtx: ReportContext;
  private provisioner?: DashboardProvisioner;
  private inspector?: StackInspector;
  private out: (line: string) => void;
  private sleep: (ms: number) => Promise<void>;
  private probe: (urls: string[]) => Promise<ProbeResult[]>;
  private _state: BootstrapState = "not-started";

  constructor(options: StackBootstrapperOptions) {
    this.orchestrator = options.orchestrator;
    this.logger = options.logger;
    this.reportCtx = options.report;
    this.provisioner = options.provisioner;
    this.inspector = options.inspector;
    this.out = options.out ?? ((line) => console.log(line));
    this.sleep = options.sleep ?? defaultSleep;
    this.probe = options.probe ?? ((urls) => probeEndpoints(urls));
  }

  get state(): BootstrapState {
    return this._state;
  }

  /**
   * Build and start the variant's services, wait, then print the report.
   * Rejects with the orchestrator's error if `up` fails; nothing is retried.
   */
  async start(variant: StackVariant): Promise<void> {
    const profile = VARIANTS[variant];
    this.out(`🚀 Starting ${profile.title}...`);

    if (profile.provisionDashboards && this.provisioner) {
      await this.provisioner.provision();
    }

    this._state = "starting";
    try {
      await this.orchestrator.up({
        build: true,
        detached: true,
        profiles: profile.profiles,
      });
    } catch (err) {
      this._state = "not-started";
      throw err;
    }

    this.out("⏳ Waiting for services to start...");
    this.logger.debug({ variant, graceSeconds: profile.graceSeconds }, "Grace period");
    await this.sleep(profile.graceSeconds * 1000);

    this._state = "reported-ready";
    for (const line of renderReport(profile, this.reportCtx)) this.out(line);
  }

  /** Tear down every service, monitoring included */
  async stop(): Promise<void> {
    this.out("🛑 Stopping all services...");
    await this.orchestrator.down({ profiles: [MONITORING_PROFILE] });
    this._state = "not-started";
    this.out("✓ All services stopped.");
  }

  /** Stream one service's output until the operator interrupts */
  async logs(service = this.reportCtx.logService): Promise<void> {
    await this.orchestrator.logs(service, { follow: true });
  }

  /** List the stack's containers and probe the variant's endpoints */
  async status(variant: StackVariant): Promise<StackStatus> {
    if (!this.inspector) {
      throw new Error("status requires a StackInspector");
    }
    const profile = VARIANTS[variant];
    const [listed, endpoints] = await Promise.all([
      this.inspector.listServices().then(
        (services): ListedServices => ({ services }),
        (err: unknown): ListedServices => {
          // Endpoints are still worth reporting when the Engine API is down
          this.logger.debug({ err }, "Container listing failed");
          return { services: [], dockerError: err instanceof Error ? err.message : String(err) };
        },
      ),
      this.probe(profile.endpoints.map((e) => e.url)),
    ]);
    const { services, dockerError } = listed;

    for (const line of renderStatus(services, endpoints, dockerError)) this.out(line);
    return dockerError === undefined ? { services, endpoints } : { services, endpoints, dockerError };
  }
}
