import { env } from './config/env';
import { createAgentEngine, type AgentEngine } from './core/engine';
import { InMemorySessionStore } from './core/memory/inMemorySessionStore';
import { InMemoryTraceStore } from './core/memory/inMemoryTraceStore';
import type { SessionStore, TraceStore } from './core/memory/traceStore';
import { logger } from './core/shared/logger';
import { createLlmTool, MOCK_MODEL } from './core/tools/llm';
import { AppDataSource } from './database/data-source';
import { TypeOrmSessionStore } from './database/stores/typeOrmSessionStore';
import { TypeOrmTraceStore } from './database/stores/typeOrmTraceStore';

export interface Container {
  engine: AgentEngine;
  close(): Promise<void>;
}

const createStores = async (): Promise<{ traceStore: TraceStore; sessionStore: SessionStore }> => {
  if (env.TRACE_STORE === 'memory') {
    logger.warn('trace_store_in_memory', { reason: 'TRACE_STORE=memory' });
    return { traceStore: new InMemoryTraceStore(), sessionStore: new InMemorySessionStore() };
  }

  await AppDataSource.initialize();
  logger.info('database_connected', {
    host: env.DB_HOST,
    database: env.DB_NAME,
  });

  return {
    traceStore: new TypeOrmTraceStore(AppDataSource),
    sessionStore: new TypeOrmSessionStore(AppDataSource),
  };
};

export const createContainer = async (): Promise<Container> => {
  const stores = await createStores();
  const llm = createLlmTool({
    apiKey: env.OPENAI_API_KEY,
    baseUrl: env.OPENAI_BASE_URL,
    timeoutMs: env.LLM_TIMEOUT_MS,
  });

  const engine = createAgentEngine({
    ...stores,
    llm,
    reasoningMaxRetries: env.REASONING_MAX_RETRIES,
    settings: {
      model: llm.provider === 'mock' ? MOCK_MODEL : env.LLM_MODEL,
      provider: llm.provider,
      temperature: env.LLM_TEMPERATURE,
      maxIterations: env.AGENT_MAX_ITERATIONS,
      historyWindow: env.AGENT_HISTORY_WINDOW,
      timeoutMs: env.AGENT_TIMEOUT_SECONDS * 1000,
    },
  });

  return {
    engine,
    close: async () => {
      if (AppDataSource.isInitialized) {
        await AppDataSource.destroy();
      }
    },
  };
};
