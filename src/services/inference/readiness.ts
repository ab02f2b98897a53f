/**
 * Readiness Gate for model-serving endpoints
 *
 * Model servers take minutes to come up (weight download + load), so every
 * stage that talks to one polls its liveness probe first. Transport errors,
 * probe timeouts and non-2xx statuses all count as "not ready yet".
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/inference/readiness
 */

import { ServiceUnavailableError, errorMessage } from '../errors.js';

export interface ProbeOptions {
  /** Per-attempt timeout in ms */
  timeoutMs: number;
  /** Probe path appended to the endpoint (default: /health) */
  path?: string;
}

export interface ProbeResult {
  ok: boolean;
  /** HTTP status, null when the request never got a response */
  status: number | null;
  /** Why the probe failed; absent on success */
  reason?: string;
  elapsedMs: number;
}

export interface ReadinessOptions extends ProbeOptions {
  maxAttempts: number;
  /** Pause between failed attempts in ms */
  intervalMs: number;
  /** Name used in log lines (e.g. "reasoning") */
  serviceName?: string;
  /** Replaceable for tests */
  sleep?: (ms: number) => Promise<void>;
}

export interface ReadinessReport {
  endpoint: string;
  attempts: number;
  elapsedMs: number;
}

const DEFAULT_PROBE_PATH = '/health';

export function probeUrl(endpoint: string, path: string = DEFAULT_PROBE_PATH): string {
  return `${endpoint.replace(/\/+$/, '')}${path}`;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Issue a single liveness probe. Never throws.
 */
export async function probeOnce(endpoint: string, options: ProbeOptions): Promise<ProbeResult> {
  const url = probeUrl(endpoint, options.path);
  const startTime = Date.now();
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetch(url, { method: 'GET', signal: controller.signal });
    // Drain the body so the socket is released
    await response.arrayBuffer().catch(() => undefined);

    if (response.ok) {
      return { ok: true, status: response.status, elapsedMs: Date.now() - startTime };
    }
    return {
      ok: false,
      status: response.status,
      reason: `HTTP ${response.status} ${response.statusText}`.trim(),
      elapsedMs: Date.now() - startTime,
    };
  } catch (error) {
    const reason = controller.signal.aborted
      ? `probe timed out after ${options.timeoutMs}ms`
      : errorMessage(error);
    return { ok: false, status: null, reason, elapsedMs: Date.now() - startTime };
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Poll `endpoint` until it answers 2xx or the attempt budget runs out.
 *
 * Succeeds after exactly as many probes as it took; sleeps `intervalMs`
 * between failed probes, never after the last one.
 *
 * @throws ServiceUnavailableError after `maxAttempts` failed probes
 */
export async function awaitReady(
  endpoint: string,
  options: ReadinessOptions
): Promise<ReadinessReport> {
  const sleep = options.sleep ?? defaultSleep;
  const label = options.serviceName ?? endpoint;
  const startTime = Date.now();
  let lastReason = 'no probe attempted';

  console.error(`[ReadinessGate] Checking if ${label} server is ready at ${endpoint}`);

  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    const result = await probeOnce(endpoint, options);
    if (result.ok) {
      console.error(`[ReadinessGate] ${label} server is ready (attempt ${attempt})`);
      return { endpoint, attempts: attempt, elapsedMs: Date.now() - startTime };
    }

    lastReason = result.reason ?? 'unknown';
    console.error(
      `[ReadinessGate] Attempt ${attempt}/${options.maxAttempts}: ${label} not ready (${lastReason})`
    );

    if (attempt < options.maxAttempts) {
      await sleep(options.intervalMs);
    }
  }

  console.error(
    `[ReadinessGate] ${label} server failed to become ready after ${options.maxAttempts} attempts`
  );
  throw new ServiceUnavailableError(
    `${label} server at ${endpoint} not ready after ${options.maxAttempts} attempts: ${lastReason}`,
    endpoint,
    options.maxAttempts,
    { lastReason, elapsedMs: Date.now() - startTime }
  );
}
