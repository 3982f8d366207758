import { TextCompletionProvider } from './llm/completion.adapter';
import { SafetyFilterService } from './safety.service';
import {
  NOT_FOUND_SENTINEL,
  buildCarBrandPrompt,
  buildCarModelPrompt,
  buildFullNamePrompt,
} from '../utils/prompts';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface ExtractionResult<T> {
  value: T | null;
  safetyError: string | null;
}

export interface NumericRange {
  min: number;
  max: number;
}

export const BIRTH_YEAR_RANGE: NumericRange = { min: 1900, max: 2010 };
export const CAR_YEAR_RANGE: NumericRange = { min: 2000, max: 2025 };
export const MILEAGE_RANGE: NumericRange = { min: 0, max: 500000 };

const YEAR_PATTERN = /\b(?:19|20)\d{2}\b/;
const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/;
const MILEAGE_PATTERN = /\b\d{1,6}\b/;

function inRange(value: number, range: NumericRange): boolean {
  return value >= range.min && value <= range.max;
}

function found<T>(value: T | null): ExtractionResult<T> {
  return { value, safetyError: null };
}

export function extractYear(text: string, range?: NumericRange): number | null {
  const match = text.match(YEAR_PATTERN);
  if (!match) return null;

  const year = parseInt(match[0], 10);
  return range && !inRange(year, range) ? null : year;
}

export function extractEmail(text: string): string | null {
  const match = text.match(EMAIL_PATTERN);
  return match ? match[0] : null;
}

/** "45.000 km" and "45,000" both read as 45000. */
export function extractMileage(text: string, range: NumericRange = MILEAGE_RANGE): number | null {
  const cleaned = text.replace(/[.,]/g, '');
  const match = cleaned.match(MILEAGE_PATTERN);
  if (!match) return null;

  const mileage = parseInt(match[0], 10);
  return inRange(mileage, range) ? mileage : null;
}

export function normalizeWhitespace(text: string): string {
  return text.trim().split(/\s+/).filter((part) => part.length > 0).join(' ');
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

export class FieldExtractionService {
  constructor(
    private completion: TextCompletionProvider,
    private safety: SafetyFilterService = new SafetyFilterService(completion)
  ) {}

  extractBirthYear(text: string): ExtractionResult<number> {
    return found(extractYear(text, BIRTH_YEAR_RANGE));
  }

  extractEmail(text: string): ExtractionResult<string> {
    return found(extractEmail(text));
  }

  extractCarYear(text: string): ExtractionResult<number> {
    return found(extractYear(text, CAR_YEAR_RANGE));
  }

  extractMileage(text: string): ExtractionResult<number> {
    return found(extractMileage(text, MILEAGE_RANGE));
  }

  async extractFullName(text: string): Promise<ExtractionResult<string>> {
    const rejected = await this.screen(text, 'tu nombre completo');
    if (rejected) return rejected;

    const name = await this.completeField('fullName', buildFullNamePrompt(text));
    if (name && name.split(' ').length >= 2) {
      return found(name);
    }
    return found<string>(null);
  }

  async extractCarBrand(text: string): Promise<ExtractionResult<string>> {
    const rejected = await this.screen(text, 'la marca de tu auto');
    if (rejected) return rejected;

    const brand = await this.completeField('brand', buildCarBrandPrompt(text));
    return found(brand ? capitalize(brand) : null);
  }

  async extractCarModel(text: string, brand?: string | null): Promise<ExtractionResult<string>> {
    const rejected = await this.screen(text, 'el modelo de tu auto');
    if (rejected) return rejected;

    return found(await this.completeField('model', buildCarModelPrompt(text, brand)));
  }

  private async screen(text: string, expected: string): Promise<ExtractionResult<string> | null> {
    const verdict = await this.safety.classify(text);
    if (verdict.isSafe) return null;

    return {
      value: null,
      safetyError: `Tu mensaje contiene contenido inapropiado (${verdict.reason}). Por favor, proporciona solo ${expected}.`,
    };
  }

  private async completeField(field: string, prompt: string): Promise<string | null> {
    let raw: string;
    try {
      raw = await this.completion.complete(prompt);
    } catch (error: unknown) {
      logger.warn('Field extraction failed, treating field as missing', { field, error: errorMessage(error) });
      return null;
    }

    // Models sometimes echo the quotes of the prompt examples or end with a period.
    const value = normalizeWhitespace(normalizeWhitespace(raw).replace(/^["']+|["'.,;:!?]+$/g, ''));
    if (!value || value.toUpperCase() === NOT_FOUND_SENTINEL) {
      logger.debug('Field not found in input', { field });
      return null;
    }
    return value;
  }
}
