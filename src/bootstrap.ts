import path from 'node:path';
import type { Logger } from 'pino';
import { loadAssistantConfig, type AssistantConfig } from './config/assistant.js';
import { loadLlmConfig, type LlmConfig } from './config/llm.js';
import { loadSessionConfig, type SessionConfig } from './config/session.js';
import { CatalogStore } from './core/catalog.js';
import { ConversationContextManager } from './core/context_manager.js';
import { OpenAIChatModel, type ChatModel } from './core/llm.js';
import { MessageRouter } from './core/router.js';
import { createStore, type SessionStore } from './core/session_store.js';
import { createLogger } from './util/logging.js';

export interface AssistantOverrides {
  config?: AssistantConfig;
  session?: SessionConfig;
  llm?: LlmConfig;
  catalog?: CatalogStore;
  model?: ChatModel;
  log?: Logger;
}

export interface Assistant {
  config: AssistantConfig;
  catalog: CatalogStore;
  contextManager: ConversationContextManager;
  router: MessageRouter;
  log: Logger;
  close(): void;
}

/**
 * Wires the catalog, session store, context manager, model and router.
 * Rejects with `CatalogLoadError` when the catalog cannot be loaded; nothing
 * else is started in that case.
 */
export async function createAssistant(overrides: AssistantOverrides = {}): Promise<Assistant> {
  const log = overrides.log ?? createLogger();
  const config = overrides.config ?? loadAssistantConfig();

  const catalog = overrides.catalog ?? (await CatalogStore.load(path.resolve(process.cwd(), config.catalogPath)));
  log.info({ stores: catalog.size, path: config.catalogPath }, 'Catalog loaded');

  const sessionConfig = overrides.session ?? loadSessionConfig();
  const store: SessionStore = createStore(sessionConfig);
  log.info({ sessionStore: sessionConfig.kind, idleTtlSec: sessionConfig.idleTtlSec }, 'Session store initialized');

  const contextManager = new ConversationContextManager(store, { maxHistory: config.maxHistory });
  const model = overrides.model ?? new OpenAIChatModel(overrides.llm ?? loadLlmConfig(), { log });
  const router = new MessageRouter({ catalog, contextManager, model, config, log });

  return {
    config,
    catalog,
    contextManager,
    router,
    log,
    close: () => store.close?.(),
  };
}
