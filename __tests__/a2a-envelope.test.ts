import {
  createErrorEnvelope,
  createRequest,
  createResponse,
  decodeEnvelope,
  encodeEnvelope,
  recoverAddressing,
} from "../src/a2a/envelope";
import { MalformedEnvelopeError } from "../src/core/errors";

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

const wireRequest = {
  message_id: "m-1",
  from_agent: "caller",
  to_agent: "echo-agent",
  message_type: "request",
  payload: { action: "echo", text: "hi" },
  timestamp: "2024-05-01T12:00:00.000Z",
};

describe("createRequest", () => {
  it("generates a message id and timestamp", () => {
    const request = createRequest({
      fromAgent: "caller",
      toAgent: "echo-agent",
      payload: { text: "hi" },
    });

    expect(request.kind).toBe("request");
    expect(request.messageId).toMatch(UUID_RE);
    expect(new Date(request.timestamp).toISOString()).toBe(request.timestamp);
    expect("replyTo" in request).toBe(false);
  });

  it("keeps a supplied id and timestamp", () => {
    const request = createRequest({
      fromAgent: "caller",
      toAgent: "echo-agent",
      payload: {},
      messageId: "m-42",
      timestamp: "2024-05-01T12:00:00.000Z",
    });

    expect(request.messageId).toBe("m-42");
    expect(request.timestamp).toBe("2024-05-01T12:00:00.000Z");
  });

  it("mints distinct ids", () => {
    const a = createRequest({ fromAgent: "a", toAgent: "b", payload: {} });
    const b = createRequest({ fromAgent: "a", toAgent: "b", payload: {} });
    expect(a.messageId).not.toBe(b.messageId);
  });
});

describe("createResponse", () => {
  it("addresses the reply back to the requester", () => {
    const request = createRequest({
      fromAgent: "caller",
      toAgent: "echo-agent",
      payload: {},
      messageId: "m-1",
    });
    const response = createResponse(request, "echo-agent", { status: "success" });

    expect(response).toMatchObject({
      kind: "response",
      fromAgent: "echo-agent",
      toAgent: "caller",
      replyTo: "m-1",
      payload: { status: "success" },
    });
    expect(response.messageId).not.toBe("m-1");
  });
});

describe("createErrorEnvelope", () => {
  it("wraps the message in an error payload", () => {
    const envelope = createErrorEnvelope({
      fromAgent: "echo-agent",
      toAgent: "caller",
      replyTo: "m-1",
      message: "boom",
    });

    expect(envelope.kind).toBe("error");
    expect(envelope.payload).toEqual({ error: "boom" });
    expect(envelope.replyTo).toBe("m-1");
  });

  it("omits replyTo when the request id is unknown", () => {
    const envelope = createErrorEnvelope({
      fromAgent: "echo-agent",
      toAgent: "unknown",
      message: "bad body",
    });
    expect("replyTo" in envelope).toBe(false);
  });
});

describe("encodeEnvelope", () => {
  it("flattens a request into the wire form", () => {
    const request = createRequest({
      fromAgent: "caller",
      toAgent: "echo-agent",
      payload: { action: "echo", text: "hi" },
      messageId: "m-1",
      timestamp: "2024-05-01T12:00:00.000Z",
    });

    expect(encodeEnvelope(request)).toStrictEqual(wireRequest);
  });

  it("writes reply_to on replies", () => {
    const request = decodeEnvelope(wireRequest);
    if (request.kind !== "request") throw new Error("expected a request");
    const wire = encodeEnvelope(createResponse(request, "echo-agent", { ok: true }));

    expect(wire.message_type).toBe("response");
    expect(wire.reply_to).toBe("m-1");
    expect(wire.to_agent).toBe("caller");
  });
});

describe("decodeEnvelope", () => {
  it("decodes a wire request", () => {
    expect(decodeEnvelope(wireRequest)).toStrictEqual({
      kind: "request",
      messageId: "m-1",
      fromAgent: "caller",
      toAgent: "echo-agent",
      payload: { action: "echo", text: "hi" },
      timestamp: "2024-05-01T12:00:00.000Z",
    });
  });

  it("round-trips every kind field for field", () => {
    const request = createRequest({
      fromAgent: "caller",
      toAgent: "echo-agent",
      payload: { nested: { list: [1, "two", null, true] } },
    });
    const response = createResponse(request, "echo-agent", { status: "success" });
    const addressedError = createErrorEnvelope({
      fromAgent: "echo-agent",
      toAgent: "caller",
      replyTo: request.messageId,
      message: "boom",
    });
    const anonymousError = createErrorEnvelope({
      fromAgent: "echo-agent",
      toAgent: "unknown",
      message: "bad body",
    });

    for (const envelope of [request, response, addressedError, anonymousError]) {
      expect(decodeEnvelope(encodeEnvelope(envelope))).toStrictEqual(envelope);
    }
  });

  it("survives a JSON round trip", () => {
    const request = createRequest({ fromAgent: "a", toAgent: "b", payload: { n: 1.5 } });
    const json = JSON.stringify(encodeEnvelope(request));
    expect(decodeEnvelope(JSON.parse(json))).toStrictEqual(request);
  });

  it("rejects an unknown message_type", () => {
    expect(() => decodeEnvelope({ ...wireRequest, message_type: "bogus" })).toThrow(
      MalformedEnvelopeError,
    );
  });

  it("never defaults a missing message_type", () => {
    const { message_type: _omitted, ...withoutKind } = wireRequest;
    expect(() => decodeEnvelope(withoutKind)).toThrow(/message_type/);
  });

  it("reports the missing field", () => {
    const { payload: _omitted, ...withoutPayload } = wireRequest;
    try {
      decodeEnvelope(withoutPayload);
      throw new Error("expected decodeEnvelope to throw");
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedEnvelopeError);
      if (!(err instanceof MalformedEnvelopeError)) return;
      expect(err.code).toBe("MALFORMED_ENVELOPE");
      expect(err.issues.map((issue) => issue.path)).toEqual([["payload"]]);
    }
  });

  it("rejects a payload that is not an object", () => {
    expect(() => decodeEnvelope({ ...wireRequest, payload: ["a"] })).toThrow(
      MalformedEnvelopeError,
    );
  });

  it("rejects a request carrying reply_to", () => {
    expect(() => decodeEnvelope({ ...wireRequest, reply_to: "m-0" })).toThrow(
      MalformedEnvelopeError,
    );
  });

  it("treats a null reply_to on a request as absent", () => {
    const envelope = decodeEnvelope({ ...wireRequest, reply_to: null });
    expect(envelope.kind).toBe("request");
    expect("replyTo" in envelope).toBe(false);
  });

  it("rejects a response without reply_to", () => {
    expect(() => decodeEnvelope({ ...wireRequest, message_type: "response" })).toThrow(
      MalformedEnvelopeError,
    );
  });

  it("defaults a missing timestamp", () => {
    const { timestamp: _omitted, ...withoutTimestamp } = wireRequest;
    const envelope = decodeEnvelope(withoutTimestamp);
    expect(new Date(envelope.timestamp).toISOString()).toBe(envelope.timestamp);
  });

  it("rejects values that are not objects", () => {
    expect(() => decodeEnvelope("hello")).toThrow(MalformedEnvelopeError);
    expect(() => decodeEnvelope(null)).toThrow(MalformedEnvelopeError);
  });
});

describe("recoverAddressing", () => {
  it("reads sender and id from a partial body", () => {
    expect(
      recoverAddressing({ from_agent: "caller", message_id: "m-9", message_type: "bogus" }),
    ).toEqual({ fromAgent: "caller", messageId: "m-9" });
  });

  it("ignores fields of the wrong type", () => {
    expect(recoverAddressing({ from_agent: 7, message_id: "" })).toEqual({});
  });

  it("returns nothing for non-objects", () => {
    expect(recoverAddressing("junk")).toEqual({});
    expect(recoverAddressing(["from_agent"])).toEqual({});
    expect(recoverAddressing(undefined)).toEqual({});
  });
});
