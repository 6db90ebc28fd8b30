import { z } from "zod";
import type { JsonValue } from "../core/types";

// --- Payload schemas ---
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);
export const PayloadSchema = z.record(JsonValueSchema);

/**
 * Apply JSON's treatment of `undefined` before validation: object keys
 * holding it are dropped and array slots holding it become `null`, at any
 * depth. Values other than plain objects and arrays are returned as is.
 */
export function dropUndefined(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => (item === undefined ? null : dropUndefined(item)));
  }
  if (typeof value !== "object" || value === null) return value;
  const proto = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) return value;

  const result: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    if (item !== undefined) result[key] = dropUndefined(item);
  }
  return result;
}

// --- Envelope schemas (wire form) ---
const EnvelopeHeaderSchema = z.object({
  message_id: z.string().min(1),
  from_agent: z.string(),
  to_agent: z.string(),
  payload: PayloadSchema,
  timestamp: z.string().optional(),
});

// Peers that serialize every field send `reply_to: null` on requests.
export const RequestEnvelopeSchema = EnvelopeHeaderSchema.extend({
  message_type: z.literal("request"),
  reply_to: z.null().optional(),
});
export const ResponseEnvelopeSchema = EnvelopeHeaderSchema.extend({
  message_type: z.literal("response"),
  reply_to: z.string().min(1),
});
export const ErrorEnvelopeSchema = EnvelopeHeaderSchema.extend({
  message_type: z.literal("error"),
  reply_to: z.string().min(1).nullable().optional(),
});
export const EnvelopeSchema = z.discriminatedUnion("message_type", [
  RequestEnvelopeSchema,
  ResponseEnvelopeSchema,
  ErrorEnvelopeSchema,
]);

// --- Discovery schemas ---
export const CapabilitySchema = z.object({
  name: z.string(),
  description: z.string(),
  input_schema: z.record(JsonValueSchema),
  output_schema: z.record(JsonValueSchema),
});

export const AgentInfoSchema = z.object({
  agent_id: z.string().min(1),
  name: z.string(),
  description: z.string(),
  endpoint: z.string(),
  capabilities: z.array(CapabilitySchema),
  framework: z.string(),
  model_provider: z.string(),
  status: z.string().default("active"),
});

export const HealthStatusSchema = z.object({
  status: z.literal("healthy"),
  agent: z.string(),
});

/**
 * One-line summary of validation issues, e.g. `message_type: Invalid discriminator value`.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join(".") : "<root>"}: ${issue.message}`)
    .join("; ");
}
