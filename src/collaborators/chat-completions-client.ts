import axios, { AxiosInstance } from 'axios';
import type { GenerationClient, GenerationResult } from './types';
import type { WorkflowLogger } from '../orchestrator/logger';

export interface ChatCompletionsClientOptions {
  baseUrl: string;
  /** Local servers accept any placeholder key */
  apiKey: string;
  model: string;
  timeoutMs?: number;
  /** Attempts per generate() call, the first included */
  maxRetries?: number;
  /** Back-off unit; attempt n waits n × retryDelayMs */
  retryDelayMs?: number;
  logger?: WorkflowLogger;
}

interface ChatCompletionResponse {
  model?: string;
  choices?: { message?: { content?: string | null } }[];
  usage?: { prompt_tokens?: number; completion_tokens?: number; total_tokens?: number } | null;
}

/**
 * GenerationClient over an OpenAI-compatible `/chat/completions` endpoint.
 * Failures come back as `{ success: false }`, never as a rejection.
 */
export class ChatCompletionsClient implements GenerationClient {
  private axiosInstance: AxiosInstance;
  private model: string;
  private maxRetries: number;
  private retryDelayMs: number;
  private logger?: WorkflowLogger;

  constructor(options: ChatCompletionsClientOptions) {
    this.model = options.model;
    this.maxRetries = Math.max(1, options.maxRetries ?? 3);
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.logger = options.logger;
    this.axiosInstance = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs ?? 120000,
      headers: {
        Authorization: `Bearer ${options.apiKey}`,
        'Content-Type': 'application/json',
      },
    });
  }

  async generate(prompt: string, maxTokens: number, temperature: number): Promise<GenerationResult> {
    let result: GenerationResult = { success: false, error: 'No attempt made' };

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      result = await this.complete(prompt, maxTokens, temperature);
      if (result.success) return result;

      this.logger?.warn(`Generation attempt ${attempt}/${this.maxRetries} failed`, { error: result.error });
      if (attempt < this.maxRetries) {
        await sleep(this.retryDelayMs * attempt);
      }
    }

    return result;
  }

  private async complete(prompt: string, maxTokens: number, temperature: number): Promise<GenerationResult> {
    try {
      const { data } = await this.axiosInstance.post<ChatCompletionResponse>('/chat/completions', {
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        max_tokens: maxTokens,
        temperature,
      });

      const text = data.choices?.[0]?.message?.content;
      if (typeof text !== 'string') {
        return { success: false, error: 'Failed to generate completion: response carried no message content' };
      }

      this.logger?.debug('Generation completed', { model: data.model ?? this.model, totalTokens: data.usage?.total_tokens ?? 0 });
      return { success: true, text, model: data.model ?? this.model };
    } catch (error) {
      return { success: false, error: `Failed to generate completion: ${describeHttpError(error)}` };
    }
  }
}

function describeHttpError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (!error.response) return `Network Error (${error.message})`;
    return `HTTP ${error.response.status} ${error.response.statusText}`.trim();
  }
  return error instanceof Error ? error.message : String(error);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
