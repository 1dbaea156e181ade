/**
 * Canary switch config: env-based getters with safe parsing and clamped defaults.
 */

import type { TrafficSettleOptions } from "./types.js";

function parseIntEnv(key: string, defaultVal: number, min: number, max: number): number {
  const raw = process.env[key];
  if (raw == null || raw === "") return defaultVal;
  const n = parseInt(raw, 10);
  if (Number.isNaN(n)) return defaultVal;
  return Math.max(min, Math.min(max, n));
}

function optionalEnv(key: string): string | undefined {
  const v = process.env[key];
  return v && v.trim() !== "" ? v.trim() : undefined;
}

/** HTTP listen port. Default 3000. */
export function getPort(): number {
  return parseIntEnv("PORT", 3000, 1, 65_535);
}

/** Namespace every cluster call is scoped to. Default "default". */
export function getNamespace(): string {
  return optionalEnv("CANARY_NAMESPACE") ?? "default";
}

/** Explicit kubeconfig path; undefined falls back to the client's default discovery. */
export function getKubeconfigPath(): string | undefined {
  return optionalEnv("KUBECONFIG_PATH");
}

export function getKubeContext(): string | undefined {
  return optionalEnv("KUBE_CONTEXT");
}

/** Endpoint re-read interval after a selector patch. Default 100ms. */
export function getTrafficPollIntervalMs(): number {
  return parseIntEnv("TRAFFIC_POLL_INTERVAL_MS", 100, 10, 5_000);
}

/** Upper bound on waiting for endpoints to follow a selector patch. Default 2000ms. */
export function getTrafficSettleTimeoutMs(): number {
  return parseIntEnv("TRAFFIC_SETTLE_TIMEOUT_MS", 2_000, 0, 60_000);
}

export function getTrafficSettleOptions(): TrafficSettleOptions {
  return {
    pollIntervalMs: getTrafficPollIntervalMs(),
    settleTimeoutMs: getTrafficSettleTimeoutMs(),
  };
}
