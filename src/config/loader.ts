import fs from "fs";
import * as yaml from "js-yaml";
import { z } from "zod";
import { ConfigurationError } from "../core/errors";
import type { Logger } from "../core/types";
import { getDefaultLogger } from "../utils/logger";
import { formatIssues } from "../a2a/validation";

export const DEFAULT_CONFIG_PATH = "agents_config.yaml";

/** Environment variable → config key, for agents configured entirely by env. */
const ENV_KEYS = {
  PROVIDER: "provider",
  MODEL: "model",
  API_KEY_ENV: "api_key_env",
  TEMPERATURE: "temperature",
  PORT: "port",
  ENDPOINT: "endpoint",
} as const;

export const AgentConfigSchema = z
  .object({
    provider: z.string().min(1),
    model: z.string().min(1),
    api_key_env: z.string().min(1),
    temperature: z.coerce.number().min(0),
    port: z.coerce.number().int().min(1).max(65535),
    endpoint: z.string().url(),
  })
  .transform((raw) => ({
    provider: raw.provider,
    model: raw.model,
    apiKeyEnv: raw.api_key_env,
    temperature: raw.temperature,
    port: raw.port,
    endpoint: raw.endpoint,
  }));

export type AgentConfig = z.output<typeof AgentConfigSchema>;

const ConfigFileSchema = z.object({
  agents: z.record(z.unknown()),
});

export type Env = Record<string, string | undefined>;

export interface LoadAgentConfigOptions {
  /** Defaults to AGENT_NAME. */
  agentName?: string;
  /** Defaults to CONFIG_PATH, then `agents_config.yaml`. */
  configPath?: string;
  env?: Env;
  logger?: Logger;
}

/**
 * Load one agent's settings, from the environment when every variable is
 * set and otherwise from its entry in the YAML config file.
 * @throws ConfigurationError when settings are missing or invalid.
 */
export function loadAgentConfig(options: LoadAgentConfigOptions = {}): AgentConfig {
  const env = options.env ?? process.env;
  const logger = options.logger ?? getDefaultLogger();
  const agentName = options.agentName ?? env.AGENT_NAME;
  if (!agentName) {
    throw new ConfigurationError("AGENT_NAME environment variable not set");
  }

  if (hasEnvConfig(env)) {
    logger.log(`Loading config for ${agentName} from environment variables`);
    return parseConfig(loadFromEnv(env), "environment variables");
  }

  const configPath = options.configPath ?? env.CONFIG_PATH ?? DEFAULT_CONFIG_PATH;
  if (!fs.existsSync(configPath)) {
    throw new ConfigurationError(
      `Config file not found: ${configPath}. Set environment variables or provide agents_config.yaml`,
    );
  }

  logger.log(`Loading config for ${agentName} from ${configPath}`);

  let document: unknown;
  try {
    document = yaml.load(fs.readFileSync(configPath, "utf8"));
  } catch (err) {
    throw new ConfigurationError(
      `Cannot parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const file = ConfigFileSchema.safeParse(document);
  if (!file.success || !Object.hasOwn(file.data.agents, agentName)) {
    const available = file.success ? Object.keys(file.data.agents).join(", ") : "";
    throw new ConfigurationError(
      `Agent ${agentName} not found in ${configPath}. Available agents: [${available}]`,
    );
  }

  return parseConfig(file.data.agents[agentName], configPath);
}

export function hasEnvConfig(env: Env): boolean {
  return Object.keys(ENV_KEYS).every((name) => Boolean(env[name]));
}

function loadFromEnv(env: Env): Record<string, string | undefined> {
  const config: Record<string, string | undefined> = {};
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    config[key] = env[name];
  }
  return config;
}

function parseConfig(raw: unknown, source: string): AgentConfig {
  const parsed = AgentConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid agent config in ${source}: ${formatIssues(parsed.error)}`,
    );
  }
  return parsed.data;
}

/**
 * Resolve the secret named by `apiKeyEnv`.
 * @throws ConfigurationError when the variable is unset or empty.
 */
export function getApiKey(apiKeyEnv: string, env: Env = process.env): string {
  const apiKey = env[apiKeyEnv];
  if (!apiKey) {
    throw new ConfigurationError(
      `API key not found: ${apiKeyEnv}. Make sure ${apiKeyEnv} environment variable is set`,
    );
  }
  return apiKey;
}
