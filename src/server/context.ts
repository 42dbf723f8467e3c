import { loadConfig, type AppConfig } from "../core/config.js";
import { RegistryClient } from "../data-sources/registry-client.js";
import { logInfo } from "../core/logging.js";

export interface ServerContext {
  config: AppConfig;
  registryClient: RegistryClient;
}

/**
 * Create the server context.
 * All instantiation happens here (not at module import time).
 */
export function createServerContext(): ServerContext {
  const config = loadConfig();
  const registryClient = new RegistryClient(config.registry);

  const { includeDirectors, includeCharges, includeInsolvency } =
    config.enrichment;
  logInfo(
    `Registry client ready (interval ${config.registry.requestIntervalMs}ms; directors=${includeDirectors}, charges=${includeCharges}, insolvency=${includeInsolvency})`,
  );

  return { config, registryClient };
}
