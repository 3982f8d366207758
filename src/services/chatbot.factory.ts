import { env } from '../config/env';
import { getRedis } from '../config/redis';
import { FieldCipher } from '../utils/crypto';
import { logger } from '../utils/logger';
import { EligibilityChatbot } from './chatbot.service';
import { ConversationRepository, InMemoryConversationRepository } from './conversation.repository';
import { FieldExtractionService } from './extraction.service';
import { CompletionConfig, TextCompletionProvider } from './llm/completion.adapter';
import { CompletionProviderFactory } from './llm/completion.factory';
import { InProcessTurnLock, RedisTurnLock, TurnLock } from './lock.service';
import { PostgresConversationRepository } from './postgres.repository';
import { ResponseService } from './response.service';
import { SafetyFilterService } from './safety.service';
import { ConversationStateMachine } from './state-machine.service';

export interface ChatbotOptions {
  repository: ConversationRepository;
  completion: TextCompletionProvider;
  useLLMResponses?: boolean;
  lock?: TurnLock;
  now?: () => Date;
}

export class ChatbotFactory {
  static create(options: ChatbotOptions): EligibilityChatbot {
    const safety = new SafetyFilterService(options.completion);
    const extraction = new FieldExtractionService(options.completion, safety);
    const now = options.now ?? (() => new Date());

    return new EligibilityChatbot({
      repository: options.repository,
      machine: new ConversationStateMachine(extraction, () => now().getFullYear()),
      renderer: new ResponseService({ completion: options.completion, useLLMResponses: options.useLLMResponses }),
      lock: options.lock,
      now,
    });
  }

  static createFromEnv(): EligibilityChatbot {
    const chatbot = ChatbotFactory.create({
      repository: ChatbotFactory.repositoryFromEnv(),
      completion: CompletionProviderFactory.create(ChatbotFactory.completionConfigFromEnv()),
      useLLMResponses: env.USE_LLM_RESPONSES,
      lock: ChatbotFactory.lockFromEnv(),
    });

    logger.info('Chatbot initialised', {
      storage: env.STORAGE_DRIVER,
      llmProvider: env.LLM_PROVIDER,
      llmResponses: env.USE_LLM_RESPONSES,
      lock: env.REDIS_URL ? 'redis' : 'in-process',
    });
    return chatbot;
  }

  private static completionConfigFromEnv(): CompletionConfig {
    if (env.LLM_PROVIDER === 'openai') {
      return {
        provider: 'openai',
        apiKey: env.OPENAI_API_KEY ?? '',
        model: env.OPENAI_MODEL,
        temperature: env.LLM_TEMPERATURE,
      };
    }
    return {
      provider: 'anthropic',
      apiKey: env.ANTHROPIC_API_KEY ?? '',
      model: env.ANTHROPIC_MODEL,
      temperature: env.LLM_TEMPERATURE,
    };
  }

  private static repositoryFromEnv(): ConversationRepository {
    if (env.STORAGE_DRIVER === 'postgres') {
      return new PostgresConversationRepository(FieldCipher.fromString(env.PII_ENCRYPTION_KEY ?? ''));
    }
    return new InMemoryConversationRepository();
  }

  private static lockFromEnv(): TurnLock {
    const redis = getRedis();
    if (!redis) return new InProcessTurnLock();

    return new RedisTurnLock({
      set: (key, value, options) => redis.set(key, value, options),
      eval: (script, options) => redis.eval(script, options),
    });
  }
}
