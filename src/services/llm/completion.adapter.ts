export interface TextCompletionProvider {
  readonly name: string;
  complete(prompt: string): Promise<string>;
}

export interface CompletionConfig {
  provider: 'anthropic' | 'openai';
  apiKey: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
}

export const DEFAULT_MAX_TOKENS = 256;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_BASE_DELAY_MS = 1000;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
