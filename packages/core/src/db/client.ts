import {
  MemoryRowStoreClient,
  RestRowStoreClient,
  createTransport,
  type HttpTransport,
  type RowStoreClient,
} from "@tally/clients";
import { describeDatabaseUrl, type AppConfig, type Logger } from "@tally/shared";

export type StoreClientHandle = {
  client: RowStoreClient;
  close: () => Promise<void>;
};

export type StoreClientOptions = {
  logger?: Logger;
  /** Overrides the transport picked from the TLS settings. */
  transport?: HttpTransport;
};

export function isMemoryUrl(url: string): boolean {
  return url.startsWith("memory:");
}

/**
 * Builds the long-lived row store client from config. A `memory:` URL gives
 * an in-process store for local runs; anything else goes over REST through
 * the configured TLS transport.
 */
export function createStoreClient(
  config: Pick<AppConfig, "database" | "tls">,
  options: StoreClientOptions = {}
): StoreClientHandle {
  const logger = options.logger;

  if (isMemoryUrl(config.database.url)) {
    logger?.warn("store.memory_backend", { note: "rows are kept in process memory only" });
    return { client: new MemoryRowStoreClient(), close: async () => undefined };
  }

  const transport =
    options.transport ??
    createTransport({
      backend: config.tls.backend,
      minVersion: config.tls.minVersion,
      acceptInvalidCerts: config.tls.acceptInvalidCerts,
      logger,
    });

  const client = new RestRowStoreClient({
    url: config.database.url,
    serviceKey: config.database.serviceKey,
    schema: config.database.schema,
    plainBase: config.database.plainBase,
    transport,
  });

  logger?.info("store.client_created", {
    host: describeDatabaseUrl(config.database.url),
    rest_base_plain: config.database.plainBase,
    schema: config.database.schema,
    backend: transport.backend,
  });

  return { client, close: () => transport.close() };
}
