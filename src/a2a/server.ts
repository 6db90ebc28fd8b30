import http from "http";
import type { AddressInfo } from "net";
import express, {
  type ErrorRequestHandler,
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import bodyParser from "body-parser";
import compression from "compression";

import { HandlerFailureError, MalformedEnvelopeError } from "../core/errors";
import type { Logger } from "../core/types";
import { errorMessage } from "../core/utils";
import { getDefaultLogger } from "../utils/logger";
import { encodeAgentInfo } from "./agentInfo";
import {
  createErrorEnvelope,
  createResponse,
  decodeEnvelope,
  encodeEnvelope,
  recoverAddressing,
} from "./envelope";
import type { MessageHandler } from "./handler";
import type {
  AgentInfo,
  HealthStatus,
  ReplyEnvelope,
  RequestEnvelope,
} from "./types";
import { PayloadSchema, dropUndefined, formatIssues } from "./validation";

export const DEFAULT_PORT = 8080;

export interface A2AServerOptions {
  agentInfo: AgentInfo;
  handler: MessageHandler;
  /** Defaults to 8080. Pass 0 to bind an ephemeral port. */
  port?: number;
  logger?: Logger;
}

/**
 * Result of processing one inbound message: the HTTP status to answer with
 * and the envelope to carry as the body, whatever the status.
 */
export interface MessageOutcome {
  status: number;
  envelope: ReplyEnvelope;
}

/**
 * Binds one agent descriptor and one handler to the `/health`, `/info` and
 * `/message` routes. The server keeps no per-request state; any parallelism
 * is bounded only by the handler's own safety under concurrent calls.
 */
export class A2AServer {
  public readonly app: Express;
  public readonly agentInfo: AgentInfo;
  private readonly handler: MessageHandler;
  private readonly logger: Logger;
  private readonly requestedPort: number;
  private httpServer?: http.Server;

  constructor(options: A2AServerOptions) {
    this.agentInfo = options.agentInfo;
    this.handler = options.handler;
    this.logger = options.logger ?? getDefaultLogger();
    this.requestedPort = options.port ?? DEFAULT_PORT;
    this.app = this.buildApp();
  }

  get agentId(): string {
    return this.agentInfo.agentId;
  }

  /**
   * Port actually bound, or the configured one before `listen()`.
   */
  get port(): number {
    const address = this.httpServer?.address();
    return address && typeof address === "object" ? address.port : this.requestedPort;
  }

  /**
   * Turn a raw request body into the reply envelope. Never throws: decode
   * failures answer 400 and handler failures answer 500, both carrying an
   * `error` envelope.
   */
  async processMessage(body: unknown): Promise<MessageOutcome> {
    let request: RequestEnvelope;
    try {
      const envelope = decodeEnvelope(body);
      if (envelope.kind !== "request") {
        throw new MalformedEnvelopeError(
          `Expected a request envelope, received '${envelope.kind}'`,
        );
      }
      request = envelope;
    } catch (err) {
      const { fromAgent, messageId } = recoverAddressing(body);
      this.logger.warn(
        `[${this.agentId}] Rejected malformed message${messageId ? ` ${messageId}` : ""}:`,
        errorMessage(err),
      );
      return {
        status: 400,
        envelope: createErrorEnvelope({
          fromAgent: this.agentId,
          toAgent: fromAgent ?? "unknown",
          replyTo: messageId,
          message: errorMessage(err),
        }),
      };
    }

    this.logger.log(
      `[${this.agentId}] Received message ${request.messageId} from ${request.fromAgent}`,
    );

    try {
      const result = PayloadSchema.safeParse(dropUndefined(await this.handler(request)));
      if (!result.success) {
        throw new HandlerFailureError(
          `Handler returned a payload that is not a JSON object: ${formatIssues(result.error)}`,
        );
      }
      return {
        status: 200,
        envelope: createResponse(request, this.agentId, result.data),
      };
    } catch (err) {
      const failure =
        err instanceof HandlerFailureError
          ? err
          : new HandlerFailureError(errorMessage(err), err);
      this.logger.error(
        `[${this.agentId}] Error processing message ${request.messageId}:`,
        {
          error: failure.message,
          stack: err instanceof Error ? err.stack : undefined,
        },
      );
      return {
        status: 500,
        envelope: createErrorEnvelope({
          fromAgent: this.agentId,
          toAgent: request.fromAgent,
          replyTo: request.messageId,
          message: failure.message,
        }),
      };
    }
  }

  /**
   * Bind the configured port. Rejects on bind errors such as a port
   * already in use.
   */
  listen(host = "0.0.0.0"): Promise<AddressInfo> {
    if (this.httpServer) {
      return Promise.reject(new Error(`A2A server for ${this.agentId} is already listening`));
    }
    const server = http.createServer(this.app);
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        server.off("listening", onListening);
        reject(err);
      };
      const onListening = () => {
        server.off("error", onError);
        const address = server.address();
        if (!address || typeof address !== "object") {
          reject(new Error("A2A server did not bind to a TCP address"));
          return;
        }
        this.httpServer = server;
        this.logger.log(
          `Starting A2A server for ${this.agentId} on ${host}:${address.port}`,
        );
        resolve(address);
      };
      server.once("error", onError);
      server.once("listening", onListening);
      server.listen(this.requestedPort, host);
    });
  }

  close(): Promise<void> {
    const server = this.httpServer;
    if (!server) return Promise.resolve();
    this.httpServer = undefined;
    return new Promise((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }

  private buildApp(): Express {
    const app = express();
    app.disable("x-powered-by");
    app.use(compression());
    app.use(bodyParser.json({ limit: "5mb" }));

    app.get("/health", (_req: Request, res: Response) => {
      const health: HealthStatus = { status: "healthy", agent: this.agentId };
      res.json(health);
    });

    app.get("/info", (_req: Request, res: Response) => {
      res.json(encodeAgentInfo(this.agentInfo));
    });

    app.post("/message", (req: Request, res: Response, next: NextFunction) => {
      this.processMessage(req.body)
        .then(({ status, envelope }) => {
          res.status(status).json(encodeEnvelope(envelope));
        })
        .catch(next);
    });

    app.use((_req: Request, res: Response) => {
      res.status(404).json({ error: "Not found" });
    });

    // Bodies body-parser cannot read still get an error envelope on /message.
    const onError: ErrorRequestHandler = (err, req, res, _next) => {
      const status = statusOf(err);
      if (req.path === "/message" && status < 500) {
        res.status(status).json(
          encodeEnvelope(
            createErrorEnvelope({
              fromAgent: this.agentId,
              toAgent: "unknown",
              message: errorMessage(err),
            }),
          ),
        );
        return;
      }
      this.logger.error(`[${this.agentId}] Request failed:`, errorMessage(err));
      res.status(status).json({ error: status < 500 ? errorMessage(err) : "Internal error" });
    };
    app.use(onError);

    return app;
  }
}

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null && "status" in err) {
    const { status } = err;
    if (typeof status === "number" && status >= 400 && status < 600) return status;
  }
  return 500;
}

/**
 * Construct a server and bind it in one step. Startup is fail-fast: the
 * promise rejects if the port cannot be bound.
 */
export async function startAgentServer(
  options: A2AServerOptions & { host?: string },
): Promise<A2AServer> {
  const server = new A2AServer(options);
  await server.listen(options.host);
  return server;
}
