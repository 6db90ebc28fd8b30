import type { ZodIssue } from "zod";
import type { ErrorEnvelope } from "../a2a/types";

export type AgentWireErrorCode =
  | "MALFORMED_ENVELOPE"
  | "HANDLER_FAILURE"
  | "TRANSPORT_ERROR"
  | "CONFIGURATION_ERROR";

/**
 * Base class for every error raised by AgentWire.
 */
export class AgentWireError extends Error {
  constructor(
    message: string,
    public readonly code: AgentWireErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A body that does not decode into a valid envelope or agent descriptor.
 */
export class MalformedEnvelopeError extends AgentWireError {
  constructor(
    message: string,
    public readonly issues: ZodIssue[] = [],
  ) {
    super(message, "MALFORMED_ENVELOPE");
  }
}

/**
 * The bound handler threw while processing a request.
 */
export class HandlerFailureError extends AgentWireError {
  constructor(message: string, cause?: unknown) {
    super(message, "HANDLER_FAILURE", { cause });
  }
}

/**
 * Network failure, timeout or non-2xx status on an outbound call.
 * `envelope` is set when the failed response still carried an error envelope.
 */
export class TransportError extends AgentWireError {
  public readonly status?: number;
  public readonly envelope?: ErrorEnvelope;

  constructor(
    message: string,
    details: { status?: number; envelope?: ErrorEnvelope; cause?: unknown } = {},
  ) {
    super(message, "TRANSPORT_ERROR", { cause: details.cause });
    this.status = details.status;
    this.envelope = details.envelope;
  }
}

export class ConfigurationError extends AgentWireError {
  constructor(message: string) {
    super(message, "CONFIGURATION_ERROR");
  }
}
