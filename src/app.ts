import type { Configuration } from './config.js';
import type { ModelEngine } from './llm-providers/types.js';
import type { ConversationStore } from './store/types.js';
import type { LogSink, ResponseStreamEvent } from './types.js';

import { ConversationController } from './conversation/conversation-controller.js';
import { ConversationHeadend } from './headends/conversation-headend.js';
import { createModelEngine, defaultModelSettings } from './llm-providers/factory.js';
import { ShutdownController } from './shutdown-controller.js';
import { createConversationStore } from './store/store-factory.js';
import { StreamRegistry } from './streaming/stream-registry.js';
import { ToolServerRegistry, type ToolServerRegistryOptions } from './tools/tool-server-registry.js';

export interface AppServices {
  registry: ToolServerRegistry;
  store: ConversationStore;
  engine: ModelEngine;
  streams: StreamRegistry<ResponseStreamEvent>;
  controller: ConversationController;
  headend: ConversationHeadend;
  shutdown: ShutdownController;
}

export interface BuildAppOverrides {
  registry?: ToolServerRegistry;
  store?: ConversationStore;
  engine?: ModelEngine;
  clientFactory?: ToolServerRegistryOptions['clientFactory'];
}

/**
 * Construct every service from configuration. Nothing is started; teardown
 * steps are registered on the returned `ShutdownController` in start order.
 */
export function buildApp(config: Configuration, log: LogSink, overrides: BuildAppOverrides = {}): AppServices {
  const shutdown = new ShutdownController();
  const registry = overrides.registry ?? ToolServerRegistry.fromConfigFile(config.mcpConfigPath, {
    onLog: log,
    ...(config.mcpInitConcurrency !== undefined ? { initConcurrency: config.mcpInitConcurrency } : {}),
    ...(overrides.clientFactory !== undefined ? { clientFactory: overrides.clientFactory } : {}),
  });
  const store = overrides.store ?? createConversationStore(config.database);
  const engine = overrides.engine ?? createModelEngine(config.model, log);
  const streams = new StreamRegistry<ResponseStreamEvent>({
    capacity: config.streams.capacity,
    graceMs: config.streams.graceMs,
    unclaimedTtlMs: config.streams.unclaimedTtlMs,
    onLog: log,
  });
  const controller = new ConversationController({
    store,
    tools: registry,
    engine,
    streams,
    defaultSettings: defaultModelSettings(config.model),
    onLog: log,
    ...(config.defaultSystemPrompt !== undefined ? { defaultSystemPrompt: config.defaultSystemPrompt } : {}),
  });
  const headend = new ConversationHeadend(controller, {
    port: config.server.port,
    concurrency: config.server.concurrency,
    bearerKeys: config.server.bearerKeys,
    pingIntervalMs: config.server.pingIntervalMs,
    serverStatus: () => registry.status(),
  });

  shutdown.register('tool-servers', async () => { await registry.close(); });
  shutdown.register('store', async () => { await store.close(); });
  shutdown.register('streams', async () => { await streams.shutdown(); });
  shutdown.register('conversations', async () => { await controller.close(); });
  shutdown.register('headend', async () => { await headend.stop(); });

  return { registry, store, engine, streams, controller, headend, shutdown };
}

/** Initialize tool servers, then open the HTTP surface. */
export async function startApp(app: AppServices, log: LogSink): Promise<void> {
  await app.registry.initialize();
  await app.headend.start({ log, shutdownSignal: app.shutdown.signal });
}
