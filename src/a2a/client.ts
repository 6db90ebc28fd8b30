import { MalformedEnvelopeError, TransportError } from "../core/errors";
import type { Logger, Payload } from "../core/types";
import { errorMessage, joinUrl } from "../core/utils";
import { getDefaultLogger } from "../utils/logger";
import { retryAsync } from "../utils/retry";
import { decodeAgentInfo, generateAgentInfo } from "./agentInfo";
import { createRequest, decodeEnvelope, encodeEnvelope } from "./envelope";
import type { AgentInfo, Envelope, ErrorEnvelope, HealthStatus } from "./types";
import { HealthStatusSchema } from "./validation";

export const DEFAULT_TIMEOUT_MS = 120_000;

export type FetchLike = typeof fetch;

export interface A2AClientOptions {
  /** Identity stamped as `from_agent` on every request. */
  agentId: string;
  /** Bound on each network call. Defaults to 120 seconds. */
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

export interface WaitForAgentOptions {
  maxRetries?: number;
  retryDelaySeconds?: number;
}

/**
 * Sends requests to other agents and caches their discovery records.
 *
 * The cache maps an endpoint to the first descriptor fetched from it and is
 * never refreshed on its own; use `invalidateAgentInfo()` or a new client
 * when fresh descriptors are needed.
 */
export class A2AClient {
  public readonly agentId: string;
  public readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;
  private readonly agentCache = new Map<string, AgentInfo>();
  private readonly pendingLookups = new Map<string, Promise<AgentInfo>>();

  constructor(options: A2AClientOptions) {
    this.agentId = options.agentId;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? getDefaultLogger();
  }

  /**
   * Send `payload` to the agent at `endpoint` and return the reply payload.
   *
   * Payloads of `error` envelopes are returned verbatim like those of
   * `response` envelopes; inspecting the payload's own `status` is up to
   * the caller.
   * @throws TransportError on network failure, timeout, a non-2xx status
   * or a body that is not an envelope.
   */
  async sendRequest(
    toAgent: string,
    endpoint: string,
    payload: Payload,
  ): Promise<Payload> {
    const request = createRequest({ fromAgent: this.agentId, toAgent, payload });
    const url = joinUrl(endpoint, "/message");
    this.logger.debug(`[${this.agentId}] Sending ${request.messageId} to ${toAgent} at ${url}`);

    const response = await this.call(url, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(encodeEnvelope(request)),
    });

    let reply: Envelope;
    try {
      reply = decodeEnvelope(response.body);
    } catch (err) {
      throw new TransportError(
        `Invalid reply from ${url}: ${errorMessage(err)}`,
        { status: response.status, cause: err },
      );
    }

    if (reply.kind === "request") {
      throw new TransportError(`Invalid reply from ${url}: received a request envelope`, {
        status: response.status,
      });
    }
    if (reply.replyTo !== request.messageId) {
      this.logger.warn(
        `[${this.agentId}] Reply ${reply.messageId} references ${reply.replyTo ?? "nothing"}, expected ${request.messageId}`,
      );
    }
    return reply.payload;
  }

  /**
   * Discovery: the descriptor served by `{endpoint}/info`, fetched once per
   * endpoint and then answered from the cache. Concurrent lookups of the
   * same endpoint share one request.
   * @throws TransportError when the lookup fails; nothing is cached then.
   */
  async getAgentInfo(endpoint: string): Promise<AgentInfo> {
    const cached = this.agentCache.get(endpoint);
    if (cached) return cached;

    const pending = this.pendingLookups.get(endpoint);
    if (pending) return pending;

    // A lookup superseded by invalidateAgentInfo() must not write back.
    const lookup: Promise<AgentInfo> = this.fetchAgentInfo(endpoint)
      .then((info) => {
        if (this.pendingLookups.get(endpoint) === lookup) {
          this.agentCache.set(endpoint, info);
        }
        return info;
      })
      .finally(() => {
        if (this.pendingLookups.get(endpoint) === lookup) {
          this.pendingLookups.delete(endpoint);
        }
      });
    this.pendingLookups.set(endpoint, lookup);
    return lookup;
  }

  /**
   * Drop the cached descriptor for `endpoint`, or every cached descriptor.
   * Lookups still in flight are abandoned, so the next call fetches again.
   */
  invalidateAgentInfo(endpoint?: string): void {
    if (endpoint === undefined) {
      this.agentCache.clear();
      this.pendingLookups.clear();
    } else {
      this.agentCache.delete(endpoint);
      this.pendingLookups.delete(endpoint);
    }
  }

  async checkHealth(endpoint: string): Promise<HealthStatus> {
    const url = joinUrl(endpoint, "/health");
    const response = await this.call(url, { method: "GET" });
    const parsed = HealthStatusSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new TransportError(`Unexpected health response from ${url}`, {
        status: response.status,
      });
    }
    return parsed.data;
  }

  /**
   * Poll `/health` until the agent answers. Resolves `false` once the
   * retries are exhausted.
   */
  async waitForAgent(
    endpoint: string,
    options: WaitForAgentOptions = {},
  ): Promise<boolean> {
    return retryAsync(
      async () => {
        await this.checkHealth(endpoint);
        return true;
      },
      {
        maxRetries: options.maxRetries ?? 30,
        waitSeconds: options.retryDelaySeconds ?? 2,
        fallback: async () => false,
        label: `wait ${endpoint}`,
        logger: this.logger,
      },
    );
  }

  private async fetchAgentInfo(endpoint: string): Promise<AgentInfo> {
    const url = joinUrl(endpoint, "/info");
    const response = await this.call(url, { method: "GET" });
    try {
      return generateAgentInfo(decodeAgentInfo(response.body));
    } catch (err) {
      throw new TransportError(`Invalid agent info from ${url}: ${errorMessage(err)}`, {
        status: response.status,
        cause: err,
      });
    }
  }

  /**
   * One bounded network call. Resolves with the parsed JSON body of a 2xx
   * answer; everything else becomes a TransportError.
   */
  private async call(
    url: string,
    init: { method: string; headers?: Record<string, string>; body?: string },
  ): Promise<{ status: number; body: unknown }> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(url, { ...init, signal: controller.signal });
      } catch (err) {
        const message = controller.signal.aborted
          ? `${init.method} ${url} timed out after ${this.timeoutMs}ms`
          : `${init.method} ${url} failed: ${errorMessage(err)}`;
        throw new TransportError(message, { cause: err });
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (err) {
        if (controller.signal.aborted) {
          throw new TransportError(`${init.method} ${url} timed out after ${this.timeoutMs}ms`, {
            status: response.status,
            cause: err,
          });
        }
        body = undefined;
      }

      if (!response.ok) {
        throw new TransportError(`${init.method} ${url} returned HTTP ${response.status}`, {
          status: response.status,
          envelope: errorEnvelopeIn(body),
        });
      }
      if (body === undefined) {
        throw new TransportError(`${init.method} ${url} returned a body that is not JSON`, {
          status: response.status,
        });
      }
      return { status: response.status, body };
    } finally {
      clearTimeout(timer);
    }
  }
}

function errorEnvelopeIn(body: unknown): ErrorEnvelope | undefined {
  try {
    const envelope = decodeEnvelope(body);
    return envelope.kind === "error" ? envelope : undefined;
  } catch (err) {
    if (err instanceof MalformedEnvelopeError) return undefined;
    throw err;
  }
}

/**
 * Factory helper mirroring the server's `startAgentServer`.
 */
export function createA2AClient(
  agentId: string,
  options: Omit<A2AClientOptions, "agentId"> = {},
): A2AClient {
  return new A2AClient({ agentId, ...options });
}
