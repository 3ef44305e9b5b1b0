import type { ProbeResult } from "@whisper-stack/shared";

const DEFAULT_TIMEOUT_MS = 5_000;

/**
 * GET an endpoint and report whether it answered with a 2xx.
 *
 * Never throws: connection refused, DNS failures and timeouts all come back
 * as `{ up: false }`.
 */
export async function probeEndpoint(
  url: string,
  timeoutMs = DEFAULT_TIMEOUT_MS,
): Promise<ProbeResult> {
  try {
    const res = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    // Body is irrelevant; release the connection
    await res.body?.cancel();
    return { url, up: res.ok, status: res.status };
  } catch {
    // Not listening (yet) — that is the answer
    return { url, up: false };
  }
}

/** Probe several endpoints concurrently, preserving order */
export function probeEndpoints(
  urls: string[],
  timeoutMs = DEFAULT_TIMEOUT_MS,
): Promise<ProbeResult[]> {
  return Promise.all(urls.map((url) => probeEndpoint(url, timeoutMs)));
}
