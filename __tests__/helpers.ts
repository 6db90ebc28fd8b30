import type { Logger } from "../src/core/types";
import { A2AServer, type A2AServerOptions } from "../src/a2a/server";
import { generateAgentInfo } from "../src/a2a/agentInfo";
import type { MessageHandler } from "../src/a2a/handler";

export type MockLogger = Record<keyof Logger, jest.Mock>;

export function createMockLogger(): MockLogger {
  return { log: jest.fn(), error: jest.fn(), warn: jest.fn(), debug: jest.fn() };
}

export function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export const echoAgentInfo = generateAgentInfo({
  agentId: "echo-agent",
  name: "Echo Agent",
  description: "Echoes text back",
  endpoint: "http://127.0.0.1:0",
  capabilities: [
    {
      name: "echo",
      description: "Return the input text",
      inputSchema: { text: "string" },
      outputSchema: { text: "string" },
    },
  ],
  framework: "none",
  modelProvider: "none",
});

/**
 * Start a server on an ephemeral loopback port inside the test process.
 */
export async function startTestServer(
  handler: MessageHandler,
  overrides: Partial<A2AServerOptions> = {},
): Promise<{ server: A2AServer; url: string; logger: MockLogger }> {
  const logger = createMockLogger();
  const server = new A2AServer({
    agentInfo: echoAgentInfo,
    handler,
    port: 0,
    logger,
    ...overrides,
  });
  const address = await server.listen("127.0.0.1");
  return { server, url: `http://127.0.0.1:${address.port}`, logger };
}
