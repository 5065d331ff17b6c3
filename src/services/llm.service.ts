import axios, { AxiosInstance } from 'axios';
import { config } from '../core/config';
import { logger } from '../core/logger';
import { CompletionServiceError } from '../core/errors';
import { withTimeout } from '../utils/timeout';
import type { CompletionRequest, CompletionService } from '../types';

export interface LLMServiceOptions {
  client?: Pick<AxiosInstance, 'post'>;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

interface ChatCompletionResponse {
  model?: string;
  choices?: Array<{ message?: { content?: string | null } }>;
  usage?: { total_tokens?: number };
}

/**
 * Completion collaborator backed by an OpenAI-compatible
 * `/chat/completions` endpoint.
 */
export class LLMService implements CompletionService {
  private client: Pick<AxiosInstance, 'post'>;
  private temperature: number;
  private maxTokens: number;
  private timeoutMs: number;

  constructor(options: LLMServiceOptions = {}) {
    this.client = options.client ?? axios.create({
      baseURL: config.llm.baseUrl,
      headers: {
        'Authorization': `Bearer ${config.llm.apiKey}`,
        'Content-Type': 'application/json',
      },
      timeout: 120000,
    });
    this.temperature = options.temperature ?? config.llm.temperature;
    this.maxTokens = options.maxTokens ?? config.llm.maxTokens;
    this.timeoutMs = options.timeoutMs ?? config.execution.llmTimeout;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const { model, messages, jsonMode, params } = request;
    // Goal params may override the sampling defaults, never the model or messages
    const payload = {
      temperature: this.temperature,
      max_tokens: this.maxTokens,
      ...params,
      model,
      messages,
      ...(jsonMode ? { response_format: { type: 'json_object' } } : {}),
    };

    logger.debug('LLM Request', { model, jsonMode, messageCount: messages.length });

    let data: ChatCompletionResponse;
    try {
      const response = await withTimeout(
        this.client.post<ChatCompletionResponse>('/chat/completions', payload),
        this.timeoutMs,
        `LLM request timeout for ${model}`
      );
      data = response.data;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const responseData = axios.isAxiosError(error) ? error.response?.data : undefined;
      logger.error('LLM Error', { model, error: message, response: responseData });

      throw new CompletionServiceError(`LLM request failed: ${message}`, {
        model,
        originalError: responseData ?? message,
      });
    }

    const content = data.choices?.[0]?.message?.content;
    if (typeof content !== 'string') {
      throw new CompletionServiceError('LLM response has no message content', { model });
    }

    logger.debug('LLM Response', {
      model: data.model ?? model,
      contentLength: content.length,
      tokens: data.usage?.total_tokens,
    });

    return content;
  }
}
