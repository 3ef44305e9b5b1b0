/**
 * Stack description types shared between the CLI and anything that wants to
 * drive it programmatically.
 *
 * The stack itself (services, images, ports) lives in the compose file and is
 * opaque to this package. These types only describe what the bootstrapper
 * starts, waits for and reports.
 */

/** Which slice of the stack a command acts on */
export type StackVariant = "single" | "all";

/** An endpoint printed in the post-start report */
export interface StackEndpoint {
  label: string;
  url: string;
  /** Extra hint appended in parentheses, e.g. default credentials */
  note?: string;
}

/** Everything the bootstrapper needs to know about one variant */
export interface VariantProfile {
  variant: StackVariant;
  /** Human-readable name used in banners */
  title: string;
  /** Blind grace period between `up` and the report, in seconds */
  graceSeconds: number;
  /** Compose profiles enabled for `up` */
  profiles: string[];
  endpoints: StackEndpoint[];
  /** Copy dashboard descriptors into place before starting */
  provisionDashboards: boolean;
}

/**
 * Lifecycle of a single bootstrap invocation.
 *
 * `reported-ready` only means the grace period elapsed; nothing was probed.
 */
export type BootstrapState = "not-started" | "starting" | "reported-ready";

/** Docker's health hint for a container, when it has a HEALTHCHECK */
export type HealthHint = "healthy" | "unhealthy" | "starting";

/** One container of the stack as seen by the Docker Engine */
export interface ServiceState {
  service: string;
  containerId: string;
  /** Docker state, e.g. "running", "exited" */
  state: string;
  health?: HealthHint;
}

/** Result of a single HTTP reachability check */
export interface ProbeResult {
  url: string;
  up: boolean;
  /** HTTP status, when a response was received */
  status?: number;
}

/** Combined output of the `status` command */
export interface StackStatus {
  services: ServiceState[];
  endpoints: ProbeResult[];
  /** Set when the container listing failed; services is then empty */
  dockerError?: string;
}
