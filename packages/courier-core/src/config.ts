// Client configuration.
//
// Values come from the embedding service; this module only fills in
// defaults and, for configFromEnv, parses COURIER_* variables.

import { z } from "zod";

export interface RpcClientConfig {
  /** Request exchange. "" is the broker's default exchange. */
  exchange: string;
  userId: string;
  password: string;
  /** Routing key requests are published under. */
  topic: string;
  host: string;
  port: number;
  virtualHost: string;
  /** Declare the request exchange as durable. */
  durableQueues: boolean;
  /** Declare the request exchange as auto-delete. */
  autoDelete: boolean;
  /** Per-call timeout, in seconds. */
  timeout: number;
  /** Maximum number of concurrently open publish handles. */
  producerPoolSize: number;
}

export const DEFAULT_CONFIG: Readonly<RpcClientConfig> = Object.freeze({
  exchange: "",
  userId: "guest",
  password: "guest",
  topic: "workflow",
  host: "localhost",
  port: 5672,
  virtualHost: "/",
  durableQueues: false,
  autoDelete: false,
  timeout: 60,
  producerPoolSize: 4,
});

/** Longest timeout, in seconds, that fits a Node timer (2^31-1 ms). */
export const MAX_TIMEOUT_SECONDS = 2_147_483;

/** Invalid configuration value. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Fill in defaults for every field left undefined.
 */
export function resolveConfig(partial: Partial<RpcClientConfig> = {}): RpcClientConfig {
  const config: RpcClientConfig = {
    exchange: partial.exchange ?? DEFAULT_CONFIG.exchange,
    userId: partial.userId ?? DEFAULT_CONFIG.userId,
    password: partial.password ?? DEFAULT_CONFIG.password,
    topic: partial.topic ?? DEFAULT_CONFIG.topic,
    host: partial.host ?? DEFAULT_CONFIG.host,
    port: partial.port ?? DEFAULT_CONFIG.port,
    virtualHost: partial.virtualHost ?? DEFAULT_CONFIG.virtualHost,
    durableQueues: partial.durableQueues ?? DEFAULT_CONFIG.durableQueues,
    autoDelete: partial.autoDelete ?? DEFAULT_CONFIG.autoDelete,
    timeout: partial.timeout ?? DEFAULT_CONFIG.timeout,
    producerPoolSize: partial.producerPoolSize ?? DEFAULT_CONFIG.producerPoolSize,
  };

  if (!(config.timeout > 0)) {
    throw new ConfigError(`timeout must be positive, got ${config.timeout}`);
  }
  if (!(config.timeout <= MAX_TIMEOUT_SECONDS)) {
    throw new ConfigError(
      `timeout must be at most ${MAX_TIMEOUT_SECONDS} seconds, got ${config.timeout}`,
    );
  }
  if (!Number.isInteger(config.producerPoolSize) || config.producerPoolSize < 1) {
    throw new ConfigError(`producerPoolSize must be a positive integer, got ${config.producerPoolSize}`);
  }
  return config;
}

const envFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

const EnvSchema = z.object({
  COURIER_EXCHANGE: z.string().optional(),
  COURIER_USER: z.string().min(1).optional(),
  COURIER_PASSWORD: z.string().optional(),
  COURIER_TOPIC: z.string().min(1).optional(),
  COURIER_HOST: z.string().min(1).optional(),
  COURIER_PORT: z.coerce.number().int().min(1).max(65535).optional(),
  COURIER_VHOST: z.string().min(1).optional(),
  COURIER_DURABLE_QUEUES: envFlag.optional(),
  COURIER_AUTO_DELETE: envFlag.optional(),
  COURIER_TIMEOUT: z.coerce.number().positive().max(MAX_TIMEOUT_SECONDS).optional(),
  COURIER_PRODUCER_POOL_SIZE: z.coerce.number().int().min(1).optional(),
});

/**
 * Build a config from COURIER_* environment variables.
 *
 * @throws ConfigError listing every invalid variable
 */
export function configFromEnv(
  env: Record<string, string | undefined> = process.env,
): RpcClientConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`invalid environment: ${detail}`);
  }

  const e = parsed.data;
  return resolveConfig({
    exchange: e.COURIER_EXCHANGE,
    userId: e.COURIER_USER,
    password: e.COURIER_PASSWORD,
    topic: e.COURIER_TOPIC,
    host: e.COURIER_HOST,
    port: e.COURIER_PORT,
    virtualHost: e.COURIER_VHOST,
    durableQueues: e.COURIER_DURABLE_QUEUES,
    autoDelete: e.COURIER_AUTO_DELETE,
    timeout: e.COURIER_TIMEOUT,
    producerPoolSize: e.COURIER_PRODUCER_POOL_SIZE,
  });
}
