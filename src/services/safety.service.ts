import { TextCompletionProvider } from './llm/completion.adapter';
import { SAFE_VERDICT, UNSAFE_VERDICT, buildSafetyPrompt } from '../utils/prompts';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface SafetyVerdict {
  isSafe: boolean;
  reason: string | null;
}

const DEFAULT_UNSAFE_REASON = 'contenido inapropiado detectado';

/**
 * Screens free text before it reaches a capability-based extractor.
 * Fails open: an unclear verdict or a provider error counts as safe, so
 * car model names that look like ordinary words are not rejected.
 */
export class SafetyFilterService {
  constructor(private completion: TextCompletionProvider) {}

  async classify(text: string): Promise<SafetyVerdict> {
    let verdict: string;
    try {
      verdict = (await this.completion.complete(buildSafetyPrompt(text))).trim().toUpperCase();
    } catch (error: unknown) {
      logger.warn('Safety classification failed, treating input as safe', { error: errorMessage(error) });
      return { isSafe: true, reason: null };
    }

    // INSEGURO does not start with SEGURO, so the order of checks is free.
    if (verdict.startsWith(SAFE_VERDICT)) {
      return { isSafe: true, reason: null };
    }

    if (verdict.startsWith(UNSAFE_VERDICT)) {
      const separator = verdict.indexOf('|');
      const reason = (separator >= 0 ? verdict.slice(separator + 1).trim() : '') || DEFAULT_UNSAFE_REASON;
      logger.info('Unsafe input rejected', { reason });
      return { isSafe: false, reason };
    }

    logger.debug('Unrecognised safety verdict, treating input as safe', { verdict });
    return { isSafe: true, reason: null };
  }
}
