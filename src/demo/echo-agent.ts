import {
  createA2AClient,
  createActionHandler,
  generateAgentInfo,
  startAgentServer,
} from "../a2a";
import type { Payload } from "../core/types";
import { createLogger } from "../utils/logger";

const PORT = Number(process.env.PORT ?? 4000);
const endpoint = `http://localhost:${PORT}`;

const agentInfo = generateAgentInfo({
  agentId: "echo-agent",
  name: "Echo Agent",
  description: "Echoes back the text it receives.",
  endpoint,
  capabilities: [
    {
      name: "echo",
      description: "Return the input text unchanged",
      inputSchema: { text: "string" },
      outputSchema: { text: "string" },
    },
  ],
});

const handler = createActionHandler({
  echo: ({ payload }): Payload => {
    if (typeof payload.text !== "string" || !payload.text) {
      return { status: "error", message: "No text" };
    }
    return { status: "success", text: payload.text };
  },
});

async function main(): Promise<void> {
  const server = await startAgentServer({
    agentInfo,
    handler,
    port: PORT,
    logger: createLogger({ label: agentInfo.agentId }),
  });

  const client = createA2AClient("echo-demo", {
    timeoutMs: 10_000,
    logger: createLogger({ label: "echo-demo" }),
  });

  try {
    const info = await client.getAgentInfo(endpoint);
    console.log("Discovered:", JSON.stringify(info, null, 2));

    const reply = await client.sendRequest(info.agentId, endpoint, {
      action: "echo",
      text: "Hello, agents!",
    });
    console.log("Reply:", JSON.stringify(reply, null, 2));
  } finally {
    await server.close();
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
