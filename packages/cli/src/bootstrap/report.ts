/**
 * Post-start report.
 *
 * Static text: the endpoints listed here are what the stack is expected to
 * serve, not what was observed.
 */

import type { ProbeResult, ServiceState, StackEndpoint, VariantProfile } from "@whisper-stack/shared";

export interface ReportContext {
  /** Directory holding the monitoring configuration */
  monitoringDir: string;
  /** Service named in the "view logs" hint */
  logService: string;
  /** How the operator invokes this CLI */
  cliName: string;
}

const BULLET = "   • ";

export function formatEndpoint(endpoint: StackEndpoint): string {
  const note = endpoint.note ? ` (${endpoint.note})` : "";
  return `${BULLET}${endpoint.label}: ${endpoint.url}${note}`;
}

export function renderReport(profile: VariantProfile, ctx: ReportContext): string[] {
  const lines: string[] = [
    `✅ ${profile.title} started!`,
    "",
    profile.variant === "single" ? "📊 Access your service:" : "📊 Access your services:",
    ...profile.endpoints.map(formatEndpoint),
    "",
  ];

  if (profile.variant === "single") {
    lines.push(
      "📈 For dashboards and metric history, start the monitoring stack:",
      `${BULLET}Configuration: ${ctx.monitoringDir}`,
      `${BULLET}Run: ${ctx.cliName} start --all`,
      "",
    );
  } else {
    lines.push(
      "📈 Monitoring:",
      `${BULLET}Dashboards provisioned from: ${ctx.monitoringDir}`,
      `${BULLET}Prometheus scrapes the API's metrics endpoint automatically`,
      "",
    );
  }

  lines.push(
    "🔍 To view logs:",
    `   ${ctx.cliName} logs ${ctx.logService}`,
    "",
    "🛑 To stop all services:",
    `   ${ctx.cliName} stop`,
  );

  return lines;
}

/** Lines for the `status` command */
export function renderStatus(
  services: ServiceState[],
  endpoints: ProbeResult[],
  dockerError?: string,
): string[] {
  const lines: string[] = ["📦 Services:"];
  if (dockerError !== undefined) {
    lines.push(`${BULLET}Docker unavailable: ${dockerError}`);
  } else if (services.length === 0) {
    lines.push(`${BULLET}no containers found for this stack`);
  }
  for (const s of services) {
    const health = s.health ? ` (${s.health})` : "";
    lines.push(`${BULLET}${s.service}: ${s.state}${health} [${s.containerId}]`);
  }

  lines.push("", "🌐 Endpoints:");
  for (const e of endpoints) {
    const detail = e.status !== undefined ? ` (HTTP ${e.status})` : "";
    lines.push(`${BULLET}${e.url}: ${e.up ? "up" : "down"}${detail}`);
  }
  return lines;
}
