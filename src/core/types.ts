/**
 * Core Types for AgentWire
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/**
 * Open key/value body carried by every envelope. Its schema is defined per
 * capability, never by the envelope itself.
 */
export type Payload = { [key: string]: JsonValue };

export interface Logger {
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}
