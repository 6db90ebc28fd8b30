import type { JsonValue, Payload } from "../core/types";

export const ENVELOPE_KINDS = ["request", "response", "error"] as const;
export type EnvelopeKind = (typeof ENVELOPE_KINDS)[number];

/**
 * Addressing shared by every envelope kind. `fromAgent` and `toAgent` are
 * advisory; the transport never checks them against the answering server.
 */
export interface EnvelopeHeader {
  messageId: string;
  fromAgent: string;
  toAgent: string;
  payload: Payload;
  /** ISO-8601 creation time. */
  timestamp: string;
}

export interface RequestEnvelope extends EnvelopeHeader {
  kind: "request";
}

export interface ResponseEnvelope extends EnvelopeHeader {
  kind: "response";
  /** `messageId` of the request being answered. */
  replyTo: string;
}

export interface ErrorEnvelope extends EnvelopeHeader {
  kind: "error";
  /** Absent only when the originating request id could not be recovered. */
  replyTo?: string;
}

export type Envelope = RequestEnvelope | ResponseEnvelope | ErrorEnvelope;
export type ReplyEnvelope = ResponseEnvelope | ErrorEnvelope;

/**
 * Envelope as it travels over the wire.
 */
export interface WireEnvelope {
  message_id: string;
  from_agent: string;
  to_agent: string;
  message_type: EnvelopeKind;
  payload: Payload;
  timestamp?: string;
  reply_to?: string;
}

/**
 * A named operation an agent exposes. Schemas are descriptive only.
 */
export interface Capability {
  name: string;
  description: string;
  inputSchema: Record<string, JsonValue>;
  outputSchema: Record<string, JsonValue>;
}

/**
 * Discovery record served from `/info`.
 */
export interface AgentInfo {
  agentId: string;
  name: string;
  description: string;
  /** Base URL other agents reach this one at. */
  endpoint: string;
  capabilities: Capability[];
  /** Free-form tag naming the implementation technology. */
  framework: string;
  modelProvider: string;
  status: string;
}

export interface WireCapability {
  name: string;
  description: string;
  input_schema: Record<string, JsonValue>;
  output_schema: Record<string, JsonValue>;
}

export interface WireAgentInfo {
  agent_id: string;
  name: string;
  description: string;
  endpoint: string;
  capabilities: WireCapability[];
  framework: string;
  model_provider: string;
  status: string;
}

export interface HealthStatus {
  status: "healthy";
  agent: string;
}

// --- Utility: Type guard helpers for Envelope ---

export function isRequest(envelope: Envelope): envelope is RequestEnvelope {
  return envelope.kind === "request";
}

export function isResponse(envelope: Envelope): envelope is ResponseEnvelope {
  return envelope.kind === "response";
}

export function isErrorEnvelope(envelope: Envelope): envelope is ErrorEnvelope {
  return envelope.kind === "error";
}
