import { loadConfig, type EngineConfig } from "../config/defaults";
import { applyGlobalOptions } from "../config/globalOptions";
import { createLogger } from "../logging/logger";
import { HostClient, type SpawnHost } from "../rpc/hostClient";
import { RpcHostRuntime } from "../rpc/rpcHostRuntime";
import { Resource } from "./resource";
import { Tasker } from "./tasker";

const logger = createLogger("tasker");

export interface Session {
  config: EngineConfig;
  resource: Resource;
  tasker: Tasker;
  close(): Promise<void>;
}

/**
 * Starts the engine host process, applies the global options and returns a
 * resource and tasker bound to it.
 */
export async function openSession(config: EngineConfig = loadConfig(), spawnHost?: SpawnHost): Promise<Session> {
  const client = new HostClient(config.host, spawnHost);
  await client.start();

  const host = new RpcHostRuntime(client, { waitTimeoutMs: config.host.waitTimeoutMs });
  try {
    await applyGlobalOptions(host, config.global);
  } catch (error) {
    await client.stop();
    throw error;
  }

  const resource = new Resource(host, config.hydration);
  const tasker = new Tasker(host, resource, config.hydration);
  logger.info(`Engine host started: ${config.host.executable}`);

  return {
    config,
    resource,
    tasker,
    close: async () => {
      tasker.dispose();
      resource.dispose();
      await client.stop();
    },
  };
}
