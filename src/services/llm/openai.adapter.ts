import OpenAI from 'openai';
import { logger } from '../../utils/logger';
import { ServiceError, errorMessage, errorStatus, toError } from '../../utils/errors';
import {
  CompletionConfig,
  DEFAULT_MAX_RETRIES,
  DEFAULT_MAX_TOKENS,
  DEFAULT_RETRY_BASE_DELAY_MS,
  TextCompletionProvider,
  sleep,
} from './completion.adapter';

const DEFAULT_MODEL = 'gpt-4o-mini';

export class OpenAICompletionAdapter implements TextCompletionProvider {
  readonly name = 'openai';
  private client: OpenAI;
  private model: string;
  private temperature: number;
  private maxTokens: number;
  private maxRetries: number;
  private retryBaseDelayMs: number;

  constructor(config: CompletionConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey });
    this.model = config.model || DEFAULT_MODEL;
    this.temperature = config.temperature ?? 0.3;
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.maxRetries = config.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryBaseDelayMs = config.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
  }

  async complete(prompt: string): Promise<string> {
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        const response = await this.client.chat.completions.create({
          model: this.model,
          messages: [{ role: 'user', content: prompt }],
          temperature: this.temperature,
          max_tokens: this.maxTokens,
        });

        const content = (response.choices[0]?.message?.content || '').trim();

        logger.debug('OpenAI completion generated', {
          attempt,
          tokens: { prompt: response.usage?.prompt_tokens || 0, completion: response.usage?.completion_tokens || 0 },
        });
        return content;
      } catch (error: unknown) {
        lastError = toError(error);
        const status = errorStatus(error);

        if (status === 429) {
          const delay = Math.pow(2, attempt) * this.retryBaseDelayMs;
          logger.warn('OpenAI rate limited, backing off', { attempt, delay });
          await sleep(delay);
          continue;
        }

        if (status === 400 || status === 401) {
          throw new ServiceError('OpenAI', 'complete', lastError, false);
        }

        logger.error('OpenAI error', { attempt, error: errorMessage(error) });
      }
    }

    throw new ServiceError('OpenAI', 'complete', lastError ?? new Error('no attempts made'), true);
  }
}
