/**
 * Core utilities for AgentWire.
 */

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export const nowIso = (): string => new Date().toISOString();

/**
 * Message of an unknown thrown value, without its stack.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === "string" ? err : String(err);
}

/**
 * Joins a base URL and a route, tolerating trailing slashes on the base.
 */
export function joinUrl(endpoint: string, path: string): string {
  return `${endpoint.replace(/\/+$/, "")}${path}`;
}
