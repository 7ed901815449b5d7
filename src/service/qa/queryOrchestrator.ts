/**
 * Query Orchestrator
 *
 * Validating → Loading → Embedding → Searching → Synthesizing → Done,
 * or Failed from any stage. Every stage hands back a Result; this is the
 * only place stage failures are turned into outcomes. A synthesis failure
 * is not a failure of the request: the response is returned degraded with
 * an empty answer.
 */
import { err, ok, type Result } from 'neverthrow';
import type { QueryConfig } from '../../../shared/config/env.js';
import {
  DimensionMismatchError,
  EmbeddingUnavailableError,
  IndexUnavailableError,
  InvalidRequestError,
  TimeoutError,
  errorMessage,
} from '../../../shared/lib/errors.js';
import { Deadline, withTimeout } from '../../../shared/lib/timeout.js';
import type { IndexHit, QAResponse, SourceRecord } from '../../../shared/models/SearchResult.js';
import type { EmbeddingClient } from '../../embedding-pipeline/nlp/embedding/openaiEmbedding.js';
import type { IndexCache, LoadedIndex } from '../vector-store/indexCache.js';
import type { AnswerSynthesizer } from './answer.js';

export const MAX_QUERY_LENGTH = 2000;

export type OrchestratorState =
  | 'Validating'
  | 'Loading'
  | 'Embedding'
  | 'Searching'
  | 'Synthesizing'
  | 'Done'
  | 'Failed';

export interface StageTrace {
  state: OrchestratorState;
  /** Milliseconds since the request started */
  elapsedMs: number;
}

export type QueryFailure =
  | InvalidRequestError
  | IndexUnavailableError
  | EmbeddingUnavailableError
  | DimensionMismatchError;

export interface OrchestratorOutcome {
  result: Result<QAResponse, QueryFailure>;
  trace: StageTrace[];
}

export interface ValidatedQuery {
  query: string;
  k: number;
}

export interface QueryOrchestratorDeps {
  indexCache: IndexCache;
  embedder: EmbeddingClient;
  synthesizer: AnswerSynthesizer;
  config: QueryConfig;
  now?: () => number;
}

/**
 * Checks a raw request body. `k` defaults to `config.defaultK`.
 */
export function validateQuery(input: unknown, config: QueryConfig): Result<ValidatedQuery, InvalidRequestError> {
  if (typeof input !== 'object' || input === null) {
    return err(new InvalidRequestError('Request body must be a JSON object'));
  }
  const query = 'query' in input ? input.query : undefined;
  const k = 'k' in input ? input.k : undefined;

  if (typeof query !== 'string') {
    return err(new InvalidRequestError('query must be a string'));
  }
  const trimmed = query.trim();
  if (!trimmed) {
    return err(new InvalidRequestError('query must not be empty'));
  }
  if (trimmed.length > MAX_QUERY_LENGTH) {
    return err(new InvalidRequestError(`query must be at most ${MAX_QUERY_LENGTH} characters`));
  }

  if (k === undefined || k === null) {
    return ok({ query: trimmed, k: config.defaultK });
  }
  if (typeof k !== 'number' || !Number.isInteger(k) || k < 1 || k > config.maxK) {
    return err(new InvalidRequestError(`k must be an integer between 1 and ${config.maxK}`));
  }
  return ok({ query: trimmed, k });
}

export function similarityScore(distance: number): number {
  return 1 / (1 + distance);
}

export class QueryOrchestrator {
  constructor(private readonly deps: QueryOrchestratorDeps) {}

  async run(input: unknown): Promise<OrchestratorOutcome> {
    const deadline = new Deadline(this.deps.config.requestTimeoutMs, this.deps.now);
    const trace: StageTrace[] = [];
    const enter = (state: OrchestratorState) => {
      trace.push({ state, elapsedMs: deadline.elapsed() });
    };
    const fail = (error: QueryFailure): OrchestratorOutcome => {
      enter('Failed');
      console.error(`❌ Query failed (${error.kind}): ${error.message} [${formatTrace(trace)}]`);
      return { result: err(error), trace };
    };

    enter('Validating');
    const request = validateQuery(input, this.deps.config);
    if (request.isErr()) return fail(request.error);
    const { query, k } = request.value;

    enter('Loading');
    const loaded = await this.loadIndex(deadline);
    if (loaded.isErr()) return fail(loaded.error);

    enter('Embedding');
    const vector = await this.embedQuery(query, deadline);
    if (vector.isErr()) return fail(vector.error);

    enter('Searching');
    const sources = this.search(loaded.value, vector.value, k);
    if (sources.isErr()) return fail(sources.error);

    enter('Synthesizing');
    const answer = await this.synthesize(query, sources.value, deadline);

    enter('Done');
    const response: QAResponse = {
      answer: answer ?? '',
      sources: sources.value,
      degraded: answer === null,
      executionTimeMs: deadline.elapsed(),
    };
    console.log(`🔍 Query answered with ${response.sources.length} sources${response.degraded ? ' (degraded)' : ''} [${formatTrace(trace)}]`);

    return { result: ok(response), trace };
  }

  private async loadIndex(deadline: Deadline): Promise<Result<LoadedIndex, IndexUnavailableError>> {
    try {
      return ok(await withTimeout('Index load', deadline.remaining(), () => this.deps.indexCache.getOrLoad()));
    } catch (error) {
      if (error instanceof IndexUnavailableError) return err(error);
      if (error instanceof TimeoutError) {
        return err(new IndexUnavailableError('timeout', error.message, { cause: error }));
      }
      return err(new IndexUnavailableError('storage_error', errorMessage(error), { cause: error }));
    }
  }

  private async embedQuery(
    query: string,
    deadline: Deadline
  ): Promise<Result<number[], EmbeddingUnavailableError | DimensionMismatchError>> {
    if (deadline.expired()) {
      return err(new EmbeddingUnavailableError('Request time budget exhausted before embedding'));
    }

    const result = await this.deps.embedder.embed([query], 1, { deadline });
    if (result.isErr()) {
      const error = result.error;
      if (error instanceof DimensionMismatchError || error instanceof EmbeddingUnavailableError) {
        return err(error);
      }
      return err(new EmbeddingUnavailableError(error.message, { cause: error }));
    }

    const [vector] = result.value;
    if (!vector) {
      return err(new EmbeddingUnavailableError('Embedding service returned no vector for the query'));
    }
    return ok(vector);
  }

  private search(
    loaded: LoadedIndex,
    vector: number[],
    k: number
  ): Result<SourceRecord[], DimensionMismatchError | IndexUnavailableError> {
    let hits: IndexHit[];
    try {
      hits = loaded.index.search(vector, k);
    } catch (error) {
      if (error instanceof DimensionMismatchError) return err(error);
      throw error;
    }

    const sources: SourceRecord[] = [];
    for (const hit of hits) {
      const record = loaded.metadata.records[hit.position];
      if (!record) {
        return err(new IndexUnavailableError('length_mismatch', `No metadata record at position ${hit.position}`));
      }
      sources.push({ ...record, distance: hit.distance, similarityScore: similarityScore(hit.distance) });
    }
    return ok(sources);
  }

  /** Answer text, or null when the response has to degrade. */
  private async synthesize(query: string, sources: SourceRecord[], deadline: Deadline): Promise<string | null> {
    if (deadline.expired()) {
      console.warn('⚠️  Request time budget exhausted before synthesis, returning sources only');
      return null;
    }

    const result = await this.deps.synthesizer.synthesize(query, sources, { deadline });
    if (result.isErr()) {
      console.warn(`⚠️  Answer synthesis unavailable, returning sources only: ${result.error.message}`);
      return null;
    }
    return result.value;
  }
}

function formatTrace(trace: readonly StageTrace[]): string {
  return trace.map((step) => `${step.state} ${step.elapsedMs}ms`).join(' → ');
}
