import { MalformedEnvelopeError } from "../core/errors";
import type { AgentInfo, Capability, WireAgentInfo, WireCapability } from "./types";
import { AgentInfoSchema, formatIssues } from "./validation";

/**
 * Generate the discovery record for this agent. The result is frozen: it is
 * built once at startup and served read-only for the life of the process.
 * @param opts - Agent metadata and capabilities.
 */
export function generateAgentInfo(opts: {
  agentId: string;
  name: string;
  endpoint: string;
  description?: string;
  capabilities?: Capability[];
  framework?: string;
  modelProvider?: string;
  status?: string;
}): Readonly<AgentInfo> {
  const info: AgentInfo = {
    agentId: opts.agentId,
    name: opts.name,
    description: opts.description ?? "",
    endpoint: opts.endpoint,
    capabilities: (opts.capabilities ?? []).map((capability) =>
      Object.freeze({ ...capability }),
    ),
    framework: opts.framework ?? "none",
    modelProvider: opts.modelProvider ?? "none",
    status: opts.status ?? "active",
  };

  Object.freeze(info.capabilities);
  return Object.freeze(info);
}

export function encodeCapability(capability: Capability): WireCapability {
  return {
    name: capability.name,
    description: capability.description,
    input_schema: capability.inputSchema,
    output_schema: capability.outputSchema,
  };
}

export function encodeAgentInfo(info: AgentInfo): WireAgentInfo {
  return {
    agent_id: info.agentId,
    name: info.name,
    description: info.description,
    endpoint: info.endpoint,
    capabilities: info.capabilities.map(encodeCapability),
    framework: info.framework,
    model_provider: info.modelProvider,
    status: info.status,
  };
}

/**
 * @throws MalformedEnvelopeError when `data` is not a valid descriptor.
 */
export function decodeAgentInfo(data: unknown): AgentInfo {
  const parsed = AgentInfoSchema.safeParse(data);
  if (!parsed.success) {
    throw new MalformedEnvelopeError(
      `Malformed agent info: ${formatIssues(parsed.error)}`,
      parsed.error.issues,
    );
  }

  const wire = parsed.data;
  return {
    agentId: wire.agent_id,
    name: wire.name,
    description: wire.description,
    endpoint: wire.endpoint,
    capabilities: wire.capabilities.map((capability) => ({
      name: capability.name,
      description: capability.description,
      inputSchema: capability.input_schema,
      outputSchema: capability.output_schema,
    })),
    framework: wire.framework,
    modelProvider: wire.model_provider,
    status: wire.status,
  };
}
