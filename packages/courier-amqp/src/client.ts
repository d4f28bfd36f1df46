// One-call setup of an RpcClient on a fresh AMQP connection.

import {
  RpcClient,
  createLogger,
  errorMessage,
  resolveConfig,
  type RpcClientConfig,
  type RpcClientOptions,
} from "@courier/courier-core";
import { connectAmqp, type ConnectOptions } from "./transport.ts";

export interface AmqpRpcClientOptions extends RpcClientOptions {
  /** Overrides how the socket is opened. */
  connect?: ConnectOptions["connect"];
}

/**
 * Connect to the broker and set up a client on that connection. The
 * connection is closed again if the client cannot be set up.
 *
 * @example
 * ```typescript
 * const client = await createAmqpRpcClient(configFromEnv());
 * const sum = await client.syncCall({ user: "u1" }, "add", { a: 1, b: 2 });
 * await client.close();
 * ```
 */
export async function createAmqpRpcClient(
  config: Partial<RpcClientConfig> = {},
  options: AmqpRpcClientOptions = {},
): Promise<RpcClient> {
  const resolved = resolveConfig(config);
  const logger = options.logger ?? createLogger({ namespace: "courier:client" });
  const broker = await connectAmqp(resolved, {
    logger: logger.child("amqp"),
    connect: options.connect,
  });

  try {
    return await RpcClient.connect(broker, resolved, {
      logger,
      generateId: options.generateId,
    });
  } catch (e) {
    await broker.close().catch((closeError: unknown) => {
      logger.warn("failed to close connection after setup error", {
        error: errorMessage(closeError),
      });
    });
    throw e;
  }
}
