import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SynthesisUnavailableError } from '../../../shared/lib/errors.js';
import { Deadline } from '../../../shared/lib/timeout.js';
import { FakeLlmProvider, HttpStatusError, makeRecord, recordingSleep } from '../../testing/fakes.js';
import { AnswerSynthesizer, NO_RECORDS_ANSWER, buildPrompt } from './answer.js';

const chat = makeRecord('serverless-chat', { awsServices: ['Lambda'] });

function synthesizerFor(provider: FakeLlmProvider, contextLimit = 5) {
  const { sleep, delays } = recordingSleep();
  return { synthesizer: new AnswerSynthesizer(provider, { contextLimit, timeoutMs: 1000, sleep }), delays };
}

describe('buildPrompt', () => {
  it('lists each record and then the question', () => {
    const prompt = buildPrompt('Which sample uses Lambda?', [chat], 5);

    expect(prompt.user).toBe(
      [
        '## Repositories',
        '[1] aws-samples/serverless-chat',
        'Name: serverless-chat',
        'Description: serverless-chat sample',
        'Solution Type: Unknown',
        'AWS Services: Lambda',
        'Deployment Tools: None',
        'Cost Range: Unknown',
        'URL: https://github.com/aws-samples/serverless-chat',
        '',
        '## Question',
        'Which sample uses Lambda?',
      ].join('\n')
    );
    expect(prompt.system).toContain('not found in the provided repositories');
  });

  it('enumerates at most contextLimit records', () => {
    const records = [makeRecord('a'), makeRecord('b'), makeRecord('c')];

    const prompt = buildPrompt('q', records, 2);

    expect(prompt.user).toContain('[2] aws-samples/b');
    expect(prompt.user).not.toContain('aws-samples/c');
  });

  it('is deterministic', () => {
    expect(buildPrompt('q', [chat], 5)).toEqual(buildPrompt('q', [chat], 5));
  });
});

describe('AnswerSynthesizer', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('answers from the model reply', async () => {
    const provider = new FakeLlmProvider(['Use [1] serverless-chat.']);
    const { synthesizer } = synthesizerFor(provider);

    const result = await synthesizer.synthesize('Which sample uses Lambda?', [chat]);

    expect(result._unsafeUnwrap()).toBe('Use [1] serverless-chat.');
    expect(provider.prompts).toHaveLength(1);
  });

  it('returns a fixed answer without calling the model when nothing was retrieved', async () => {
    const provider = new FakeLlmProvider([]);
    const { synthesizer } = synthesizerFor(provider);

    const result = await synthesizer.synthesize('anything', []);

    expect(result._unsafeUnwrap()).toBe(NO_RECORDS_ANSWER);
    expect(provider.prompts).toHaveLength(0);
  });

  it('retries once after a transient failure', async () => {
    const provider = new FakeLlmProvider([new HttpStatusError(529), 'second try']);
    const { synthesizer, delays } = synthesizerFor(provider);

    const result = await synthesizer.synthesize('q', [chat]);

    expect(result._unsafeUnwrap()).toBe('second try');
    expect(provider.prompts).toHaveLength(2);
    expect(delays).toEqual([250]);
  });

  it('gives up after the second transient failure', async () => {
    const provider = new FakeLlmProvider([new HttpStatusError(429), new HttpStatusError(429), 'never used']);
    const { synthesizer } = synthesizerFor(provider);

    const result = await synthesizer.synthesize('q', [chat]);

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(SynthesisUnavailableError);
    expect(provider.prompts).toHaveLength(2);
  });

  it('does not retry a client error', async () => {
    const provider = new FakeLlmProvider([new HttpStatusError(400, 'bad request'), 'never used']);
    const { synthesizer } = synthesizerFor(provider);

    const result = await synthesizer.synthesize('q', [chat]);

    expect(result._unsafeUnwrapErr().message).toContain('bad request');
    expect(provider.prompts).toHaveLength(1);
  });

  it('treats an empty reply as a failure', async () => {
    const provider = new FakeLlmProvider(['   ', 'never used']);
    const { synthesizer } = synthesizerFor(provider);

    const result = await synthesizer.synthesize('q', [chat]);

    expect(result._unsafeUnwrapErr().message).toContain('model returned an empty reply');
    expect(provider.prompts).toHaveLength(1);
  });

  it('skips the retry when the request budget cannot cover its backoff', async () => {
    const provider = new FakeLlmProvider([new HttpStatusError(503), 'never used']);
    const { synthesizer, delays } = synthesizerFor(provider);

    const result = await synthesizer.synthesize('q', [chat], { deadline: new Deadline(100, () => 0) });

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(SynthesisUnavailableError);
    expect(provider.prompts).toHaveLength(1);
    expect(delays).toEqual([]);
  });
});
