import { describe, it, expect } from 'vitest';
import { tmpdir } from 'os';
import { loadConfig } from '@/config/index.js';
import { createEmbeddingProvider, createVectorStore } from '@/orchestrator/factory.js';
import { KeywordEmbeddingProvider } from '@/embedding/providers/keyword-provider.js';
import { OpenAIEmbeddingProvider } from '@/embedding/providers/openai-provider.js';
import { InMemoryVectorStore } from '@/embedding/stores/memory-store.js';
import { SqliteVectorStore } from '@/embedding/stores/sqlite-store.js';

const root = tmpdir();

describe('createEmbeddingProvider', () => {
  it('uses the local keyword embedder by default', () => {
    expect(createEmbeddingProvider(loadConfig({ AGENT_CATALOG_ROOT: root }))).toBeInstanceOf(
      KeywordEmbeddingProvider,
    );
  });

  it('builds an OpenAI provider', () => {
    const provider = createEmbeddingProvider(
      loadConfig({ AGENT_CATALOG_ROOT: root, EMBEDDING_PROVIDER: 'openai', OPENAI_API_KEY: 'test-secret' }),
    );

    expect(provider).toBeInstanceOf(OpenAIEmbeddingProvider);
    expect(provider.name).toBe('openai');
  });

  it('builds an Azure provider', () => {
    const provider = createEmbeddingProvider(
      loadConfig({
        AGENT_CATALOG_ROOT: root,
        EMBEDDING_PROVIDER: 'azure',
        AZURE_OPENAI_ENDPOINT: 'https://example.openai.azure.com',
        AZURE_OPENAI_API_KEY: 'test-secret',
      }),
    );

    expect(provider.name).toBe('azure');
  });
});

describe('createVectorStore', () => {
  it('keeps vectors in memory without a store path', () => {
    expect(createVectorStore(loadConfig({ AGENT_CATALOG_ROOT: root }))).toBeInstanceOf(InMemoryVectorStore);
  });

  it('opens a SQLite store at the configured path', async () => {
    const store = createVectorStore(loadConfig({ AGENT_CATALOG_ROOT: root, VECTOR_STORE_PATH: ':memory:' }));

    expect(store).toBeInstanceOf(SqliteVectorStore);
    await store.close();
  });
});
