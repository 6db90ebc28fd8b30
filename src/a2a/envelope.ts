import { v4 as uuidv4 } from "uuid";
import { MalformedEnvelopeError } from "../core/errors";
import type { Payload } from "../core/types";
import { nowIso } from "../core/utils";
import type {
  Envelope,
  ErrorEnvelope,
  RequestEnvelope,
  ResponseEnvelope,
  WireEnvelope,
} from "./types";
import { EnvelopeSchema, formatIssues } from "./validation";

/**
 * Build a request envelope. `messageId` and `timestamp` are generated when
 * not supplied.
 */
export function createRequest(opts: {
  fromAgent: string;
  toAgent: string;
  payload: Payload;
  messageId?: string;
  timestamp?: string;
}): RequestEnvelope {
  return {
    kind: "request",
    messageId: opts.messageId ?? uuidv4(),
    fromAgent: opts.fromAgent,
    toAgent: opts.toAgent,
    payload: opts.payload,
    timestamp: opts.timestamp ?? nowIso(),
  };
}

/**
 * Answer `request` on behalf of `fromAgent`, addressed back to its sender.
 */
export function createResponse(
  request: RequestEnvelope,
  fromAgent: string,
  payload: Payload,
): ResponseEnvelope {
  return {
    kind: "response",
    messageId: uuidv4(),
    fromAgent,
    toAgent: request.fromAgent,
    payload,
    timestamp: nowIso(),
    replyTo: request.messageId,
  };
}

export function createErrorEnvelope(opts: {
  fromAgent: string;
  toAgent: string;
  message: string;
  replyTo?: string;
}): ErrorEnvelope {
  const envelope: ErrorEnvelope = {
    kind: "error",
    messageId: uuidv4(),
    fromAgent: opts.fromAgent,
    toAgent: opts.toAgent,
    payload: { error: opts.message },
    timestamp: nowIso(),
  };
  if (opts.replyTo !== undefined) {
    envelope.replyTo = opts.replyTo;
  }
  return envelope;
}

export function encodeEnvelope(envelope: Envelope): WireEnvelope {
  const wire: WireEnvelope = {
    message_id: envelope.messageId,
    from_agent: envelope.fromAgent,
    to_agent: envelope.toAgent,
    message_type: envelope.kind,
    payload: envelope.payload,
    timestamp: envelope.timestamp,
  };
  if (envelope.kind !== "request" && envelope.replyTo !== undefined) {
    wire.reply_to = envelope.replyTo;
  }
  return wire;
}

/**
 * Decode a wire object into an envelope.
 * @throws MalformedEnvelopeError on an unknown `message_type`, a missing or
 * mistyped field, a request carrying `reply_to` or a response lacking it.
 */
export function decodeEnvelope(data: unknown): Envelope {
  const parsed = EnvelopeSchema.safeParse(data);
  if (!parsed.success) {
    throw new MalformedEnvelopeError(
      `Malformed envelope: ${formatIssues(parsed.error)}`,
      parsed.error.issues,
    );
  }

  const wire = parsed.data;
  const header = {
    messageId: wire.message_id,
    fromAgent: wire.from_agent,
    toAgent: wire.to_agent,
    payload: wire.payload,
    timestamp: wire.timestamp ?? nowIso(),
  };

  switch (wire.message_type) {
    case "request":
      return { kind: "request", ...header };
    case "response":
      return { kind: "response", ...header, replyTo: wire.reply_to };
    case "error": {
      const envelope: ErrorEnvelope = { kind: "error", ...header };
      if (typeof wire.reply_to === "string") {
        envelope.replyTo = wire.reply_to;
      }
      return envelope;
    }
  }
}

/**
 * Best-effort read of the sender and message id from a body that failed to
 * decode, so an error reply can still be addressed.
 */
export function recoverAddressing(data: unknown): {
  fromAgent?: string;
  messageId?: string;
} {
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    return {};
  }
  const record: Record<string, unknown> = { ...data };
  const recovered: { fromAgent?: string; messageId?: string } = {};
  if (typeof record.from_agent === "string" && record.from_agent) {
    recovered.fromAgent = record.from_agent;
  }
  if (typeof record.message_id === "string" && record.message_id) {
    recovered.messageId = record.message_id;
  }
  return recovered;
}
