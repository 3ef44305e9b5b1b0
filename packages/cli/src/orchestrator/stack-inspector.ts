/**
 * Read-only view of a running stack through the Docker Engine API.
 *
 * Compose labels every container it creates with its project and service
 * name; those labels are all we need to find the stack's containers.
 */

import Docker from "dockerode";
import type { HealthHint, ServiceState } from "@whisper-stack/shared";

const COMPOSE_PROJECT_LABEL = "com.docker.compose.project";
const COMPOSE_SERVICE_LABEL = "com.docker.compose.service";

export class StackInspector {
  private docker: Docker;
  private projectName: string;

  constructor(projectName: string, options?: { socketPath?: string }) {
    this.projectName = projectName;
    // Without a socket dockerode resolves DOCKER_HOST or the platform default
    this.docker = options?.socketPath
      ? new Docker({ socketPath: options.socketPath })
      : new Docker();
  }

  /** All containers of the project (running or not), sorted by service */
  async listServices(): Promise<ServiceState[]> {
    const containers = await this.docker.listContainers({
      all: true,
      filters: { label: [`${COMPOSE_PROJECT_LABEL}=${this.projectName}`] },
    });

    return containers
      .map((c) => ({
        service: c.Labels?.[COMPOSE_SERVICE_LABEL] ?? c.Names[0]?.replace(/^\//, "") ?? c.Id,
        containerId: c.Id.slice(0, 12),
        state: c.State ?? "unknown",
        health: parseHealthStatus(c.Status),
      }))
      .sort((a, b) => a.service.localeCompare(b.service));
  }
}

/**
 * Extract a health hint from Docker's Status string,
 * e.g. "Up 5 minutes (healthy)" or "Up 3 seconds (health: starting)".
 */
export function parseHealthStatus(status?: string): HealthHint | undefined {
  if (!status) return undefined;
  if (status.includes("(unhealthy)")) return "unhealthy";
  if (status.includes("(health: starting)")) return "starting";
  if (status.includes("(healthy)")) return "healthy";
  return undefined;
}
