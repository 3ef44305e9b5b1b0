import type { StackEndpoint, StackVariant, VariantProfile } from "@whisper-stack/shared";

/** Compose profile that holds Prometheus and Grafana */
export const MONITORING_PROFILE = "monitoring";

/** Default Grafana login set in the compose file */
export const GRAFANA_CREDENTIALS = "admin/grafana";

const API_ENDPOINTS: StackEndpoint[] = [
  { label: "Whisper API", url: "http://localhost:8000" },
  { label: "API Documentation", url: "http://localhost:8000/docs" },
  { label: "Metrics Endpoint", url: "http://localhost:8000/metrics" },
];

const MONITORING_ENDPOINTS: StackEndpoint[] = [
  { label: "Prometheus", url: "http://localhost:9090" },
  { label: "Grafana", url: "http://localhost:3000", note: GRAFANA_CREDENTIALS },
];

export const VARIANTS: Record<StackVariant, VariantProfile> = {
  single: {
    variant: "single",
    title: "Whisper API",
    graceSeconds: 15,
    profiles: [],
    endpoints: API_ENDPOINTS,
    provisionDashboards: false,
  },
  all: {
    variant: "all",
    title: "Whisper API and monitoring stack",
    graceSeconds: 30,
    profiles: [MONITORING_PROFILE],
    endpoints: [...API_ENDPOINTS, ...MONITORING_ENDPOINTS],
    provisionDashboards: true,
  },
};
