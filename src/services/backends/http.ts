import { generateText } from 'ai';
import type { LanguageModel } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import { AI_API_KEY, AI_BASE_URL } from '../../constants/providers';
import { GENERATION_TEMPERATURE } from '../../constants/rag';
import type { ModelBackend, ModelRequest } from './types';

export interface HttpBackendOptions {
  baseURL?: string;
  apiKey?: string;
  resolveModel?: (modelName: string) => LanguageModel;
}

/**
 * OpenAI-compatible chat endpoint on a local server (Ollama /v1, LM Studio)
 */
export class HttpModelBackend implements ModelBackend {
  readonly name = 'http';
  private readonly resolveModel: (modelName: string) => LanguageModel;

  constructor(options: HttpBackendOptions = {}) {
    if (options.resolveModel) {
      this.resolveModel = options.resolveModel;
    } else {
      const provider = createOpenAI({
        baseURL: options.baseURL ?? AI_BASE_URL,
        apiKey: options.apiKey ?? AI_API_KEY,
      });
      this.resolveModel = modelName => provider.chat(modelName);
    }
  }

  async generate(request: ModelRequest, signal: AbortSignal): Promise<string> {
    const { text } = await generateText({
      model: this.resolveModel(request.model),
      messages: [
        { role: 'system', content: request.system },
        { role: 'user', content: request.prompt },
      ],
      temperature: GENERATION_TEMPERATURE,
      maxRetries: 0,
      abortSignal: signal,
    });
    return text;
  }
}
