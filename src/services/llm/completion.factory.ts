import { CompletionConfig, TextCompletionProvider } from './completion.adapter';
import { AnthropicCompletionAdapter } from './anthropic.adapter';
import { OpenAICompletionAdapter } from './openai.adapter';

export class CompletionProviderFactory {
  static create(config: CompletionConfig): TextCompletionProvider {
    switch (config.provider) {
      case 'anthropic':
        return new AnthropicCompletionAdapter(config);
      case 'openai':
        return new OpenAICompletionAdapter(config);
      default:
        throw new Error(`Unsupported completion provider: ${String(config.provider)}`);
    }
  }
}
