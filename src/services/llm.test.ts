import { describe, it, expect } from 'vitest';
import { ANSWER_INSTRUCTIONS, DEFAULT_SYSTEM_PROMPT } from '../constants/prompts';
import { GenerationUnavailable, ValidationError } from '../utils/errors';
import type { ModelBackend, ModelRequest } from './backends/types';
import { ProcessModelBackend, classifyProcessError } from './backends/process';
import { buildPrompt, cleanAnswer, generateAnswer } from './llm';

function replying(text: string, seen: ModelRequest[] = []): ModelBackend {
  return {
    name: 'fake',
    async generate(request) {
      seen.push(request);
      return text;
    },
  };
}

/** Never answers; rejects only when aborted, like a well-behaved backend */
const hanging: ModelBackend = {
  name: 'hanging',
  generate: (_request, signal) =>
    new Promise((_, reject) => {
      signal.addEventListener('abort', () => reject(new Error('aborted')));
    }),
};

/** Never answers and ignores the signal */
const deaf: ModelBackend = {
  name: 'deaf',
  generate: () => new Promise(() => {}),
};

const input = {
  question: 'What was Q1 revenue?',
  context: '[q1.pdf, page 1]\nRevenue increased to $5M in Q1',
  usedChunkIds: [0],
  model: 'llama2',
};

async function failureOf(promise: Promise<unknown>): Promise<GenerationUnavailable> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof GenerationUnavailable) return err;
    throw err;
  }
  throw new Error('expected GenerationUnavailable');
}

describe('buildPrompt', () => {
  it('places context before the question', () => {
    expect(buildPrompt('Q?', 'C')).toBe(`CONTEXT:\nC\n\nQUESTION:\nQ?\n\n${ANSWER_INSTRUCTIONS}`);
  });
});

describe('cleanAnswer', () => {
  it('removes think blocks and answer labels', () => {
    expect(cleanAnswer('<think>hmm</think>\nAnswer: $5M')).toBe('$5M');
  });
});

describe('generateAnswer', () => {
  it('returns the cleaned answer with the chunk ids used', async () => {
    const seen: ModelRequest[] = [];
    const answer = await generateAnswer(replying('  Revenue was $5M.  ', seen), input, {
      timeoutMs: 1000,
    });

    expect(answer).toEqual({ text: 'Revenue was $5M.', model: 'llama2', usedChunkIds: [0] });
    expect(seen).toEqual([
      {
        model: 'llama2',
        system: DEFAULT_SYSTEM_PROMPT,
        prompt: buildPrompt(input.question, input.context),
      },
    ]);
  });

  it('fails with empty_output when the model says nothing', async () => {
    const failure = await failureOf(generateAnswer(replying('<think>x</think>  '), input));
    expect(failure.reason).toBe('empty_output');
  });

  it('times out a backend that never answers', async () => {
    const started = Date.now();
    const failure = await failureOf(generateAnswer(hanging, input, { timeoutMs: 50 }));

    expect(failure.reason).toBe('timeout');
    expect(failure.message).toBe('Model "llama2" did not answer within 50ms');
    expect(Date.now() - started).toBeLessThan(2000);
  });

  it('times out even when the backend ignores the abort signal', async () => {
    const failure = await failureOf(generateAnswer(deaf, input, { timeoutMs: 30 }));
    expect(failure.reason).toBe('timeout');
  });

  it('can be cancelled by the caller', async () => {
    const controller = new AbortController();
    const pending = generateAnswer(hanging, input, { timeoutMs: 10_000, signal: controller.signal });
    controller.abort();

    const failure = await failureOf(pending);
    expect(failure.reason).toBe('cancelled');
  });

  it('wraps backend errors with the cause attached', async () => {
    const cause = new Error('connect ECONNREFUSED 127.0.0.1:11434');
    const broken: ModelBackend = {
      name: 'http',
      generate: async () => {
        throw cause;
      },
    };

    const failure = await failureOf(generateAnswer(broken, input));
    expect(failure.reason).toBe('request_failed');
    expect(failure.message).toBe('Model backend "http" failed: connect ECONNREFUSED 127.0.0.1:11434');
    expect(failure.errorCause).toBe(cause);
  });

  it('reports a model the local runtime does not have', async () => {
    const backend = new ProcessModelBackend({
      run: async command => {
        throw classifyProcessError(
          command,
          Object.assign(new Error('Command failed'), { code: 1 }),
          'Error: pull model manifest: file does not exist'
        );
      },
    });

    const started = Date.now();
    const failure = await failureOf(
      generateAnswer(backend, { ...input, model: 'no-such-model' }, { timeoutMs: 500 })
    );

    expect(failure).toBeInstanceOf(GenerationUnavailable);
    expect(failure.reason).toBe('exit_code');
    expect(Date.now() - started).toBeLessThan(500);
  });

  it('rejects a non-positive timeout', async () => {
    await expect(generateAnswer(replying('x'), input, { timeoutMs: 0 })).rejects.toBeInstanceOf(
      ValidationError
    );
  });
});
