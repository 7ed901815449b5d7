/**
 * Answer Synthesizer
 *
 * Builds a grounded prompt from the retrieved repositories and asks the
 * configured LLM for an answer. One retry on a transient failure; anything
 * else becomes SynthesisUnavailable and the caller degrades.
 */
import { err, ok, type Result } from 'neverthrow';
import type { LlmConfig } from '../../../shared/config/env.js';
import {
  SynthesisUnavailableError,
  UpstreamRequestError,
  classifyUpstreamError,
  type RagError,
} from '../../../shared/lib/errors.js';
import { withRetry, type RetryConfig } from '../../../shared/lib/retry.js';
import { withTimeout, type Deadline } from '../../../shared/lib/timeout.js';
import type { RepoRecord } from '../../../shared/models/RepoRecord.js';
import { createLlmProvider, type LlmPrompt, type LlmProvider } from './llmProviders.js';

export const NO_RECORDS_ANSWER = 'No matching repositories were found for this question.';

const SYSTEM_PROMPT = `You help engineers find sample repositories that fit their needs.
Answer only from the repositories listed under "Repositories".
If none of them answers the question, say that the answer was not found in the provided repositories.
Never mention a repository or URL that is not in the list.
Cite repositories by their [n] number and include their URL.`;

const SYNTHESIS_RETRY: RetryConfig = {
  maxAttempts: 2,
  initialDelayMs: 250,
  maxDelayMs: 250,
  backoffMultiplier: 1,
};

function formatRecord(record: RepoRecord, n: number): string {
  const list = (values: readonly string[]) => (values.length > 0 ? values.join(', ') : 'None');
  return [
    `[${n}] ${record.id}`,
    `Name: ${record.repository}`,
    `Description: ${record.description}`,
    `Solution Type: ${record.solutionType}`,
    `AWS Services: ${list(record.awsServices)}`,
    `Deployment Tools: ${list(record.deploymentTools)}`,
    `Cost Range: ${record.costRange}`,
    `URL: ${record.url}`,
  ].join('\n');
}

/**
 * Same query and records always give the same prompt.
 */
export function buildPrompt(query: string, records: readonly RepoRecord[], contextLimit: number): LlmPrompt {
  const context = records
    .slice(0, contextLimit)
    .map((record, i) => formatRecord(record, i + 1))
    .join('\n\n');

  return {
    system: SYSTEM_PROMPT,
    user: `## Repositories\n${context}\n\n## Question\n${query}`,
  };
}

export interface AnswerSynthesizerOptions {
  contextLimit: number;
  timeoutMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface SynthesizeOptions {
  /** Overrides the configured per-call timeout */
  timeoutMs?: number;
  deadline?: Deadline;
}

export class AnswerSynthesizer {
  constructor(private readonly provider: LlmProvider, private readonly options: AnswerSynthesizerOptions) {}

  static fromConfig(config: LlmConfig, contextLimit: number): AnswerSynthesizer {
    return new AnswerSynthesizer(createLlmProvider(config), { contextLimit, timeoutMs: config.timeoutMs });
  }

  async synthesize(
    query: string,
    records: readonly RepoRecord[],
    options: SynthesizeOptions = {}
  ): Promise<Result<string, SynthesisUnavailableError>> {
    if (records.length === 0) {
      return ok(NO_RECORDS_ANSWER);
    }

    const prompt = buildPrompt(query, records, this.options.contextLimit);
    const label = `Answer synthesis (${this.provider.name})`;
    const callTimeoutMs = options.timeoutMs ?? this.options.timeoutMs;

    const { result, attempts } = await withRetry(
      () => this.callOnce(prompt, label, options.deadline ? options.deadline.clip(callTimeoutMs) : callTimeoutMs),
      SYNTHESIS_RETRY,
      { label, sleep: this.options.sleep, deadline: options.deadline }
    );

    if (result.isOk()) {
      console.log(`[LLM] Generated answer with ${this.provider.name} (${this.provider.model})`);
      return ok(result.value);
    }

    console.error(`❌ ${label} failed after ${attempts} attempt(s): ${result.error.message}`);
    return err(new SynthesisUnavailableError(`${label} failed: ${result.error.message}`, { cause: result.error }));
  }

  private async callOnce(prompt: LlmPrompt, label: string, timeoutMs: number): Promise<Result<string, RagError>> {
    if (timeoutMs <= 0) {
      return err(new SynthesisUnavailableError(`${label}: request time budget exhausted`));
    }

    let reply: string;
    try {
      reply = await withTimeout(label, timeoutMs, (signal) => this.provider.complete(prompt, signal));
    } catch (error) {
      return err(classifyUpstreamError(error, 'llm'));
    }

    if (!reply.trim()) {
      return err(new UpstreamRequestError(`${label}: model returned an empty reply`));
    }
    return ok(reply);
  }
}
