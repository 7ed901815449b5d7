/**
 * Service container
 *
 * One IndexCache per process: the Express server builds the container once
 * at startup, serverless handlers reuse it across warm invocations.
 */
import { loadServiceConfig, type ServiceConfig } from '../../shared/config/env.js';
import { createArtifactStore } from '../../shared/lib/artifactStore.js';
import { EmbeddingClient } from '../embedding-pipeline/nlp/embedding/openaiEmbedding.js';
import { AnswerSynthesizer } from './qa/answer.js';
import { QueryOrchestrator } from './qa/queryOrchestrator.js';
import { IndexCache } from './vector-store/indexCache.js';

export interface QueryServices {
  indexCache: IndexCache;
  orchestrator: QueryOrchestrator;
  allowedOrigin: string;
}

export function createQueryServices(config: ServiceConfig): QueryServices {
  const store = createArtifactStore(config.storage);
  const indexCache = IndexCache.forStore(store, {
    indexKey: config.storage.indexKey,
    metadataKey: config.storage.metadataKey,
  });

  const orchestrator = new QueryOrchestrator({
    indexCache,
    embedder: EmbeddingClient.fromConfig(config.embedding),
    synthesizer: AnswerSynthesizer.fromConfig(config.llm, config.query.contextLimit),
    config: config.query,
  });

  return { indexCache, orchestrator, allowedOrigin: config.server.allowedOrigin };
}

let processServices: QueryServices | null = null;

/**
 * Lazily built from process.env and kept for the life of the process.
 */
export function getQueryServices(): QueryServices {
  if (!processServices) {
    processServices = createQueryServices(loadServiceConfig(process.env));
  }
  return processServices;
}
