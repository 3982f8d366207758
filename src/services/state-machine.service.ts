import {
  CONVERSATION_STEPS,
  CarData,
  ConversationRecord,
  ConversationStep,
  PersonalData,
  firstNameOf,
} from '../types/conversation';
import { EvaluationInput, ResponseEvent } from '../types/events';
import { FieldExtractionService } from './extraction.service';
import { evaluateEligibility } from './eligibility.service';
import { logger } from '../utils/logger';

export interface StepOutcome {
  record: ConversationRecord;
  /** null hands control straight to the handler of the new step. */
  event: ResponseEvent | null;
}

type StepHandler = (record: ConversationRecord, userInput: string) => Promise<StepOutcome>;

export type ConfirmationAnswer = 'affirmative' | 'negative' | 'unclear';

const AFFIRMATIVE_TOKENS = ['sí', 'si', 'correcto', 'yes', 'ok'];
const NEGATIVE_TOKENS = ['no'];

/**
 * Substring containment, affirmative first: "sí, no hay problema" confirms.
 */
export function classifyConfirmation(userInput: string): ConfirmationAnswer {
  const text = userInput.toLowerCase().trim();
  if (AFFIRMATIVE_TOKENS.some((token) => text.includes(token))) return 'affirmative';
  if (NEGATIVE_TOKENS.some((token) => text.includes(token))) return 'negative';
  return 'unclear';
}

export class ConversationStateMachine {
  private handlers: Record<ConversationStep, StepHandler> = {
    [ConversationStep.GREETING]: (record) => this.greet(record),
    [ConversationStep.COLLECTING_PERSONAL]: (record, input) => this.collectPersonalData(record, input),
    [ConversationStep.CONFIRMING_PERSONAL]: (record, input) => this.confirmPersonalData(record, input),
    [ConversationStep.COLLECTING_CAR]: (record, input) => this.collectCarData(record, input),
    [ConversationStep.CONFIRMING_CAR]: (record, input) => this.confirmCarData(record, input),
    [ConversationStep.EVALUATING]: (record) => this.evaluate(record),
    [ConversationStep.COMPLETED]: (record) => this.complete(record),
  };

  constructor(
    private extraction: FieldExtractionService,
    private currentYear: () => number = () => new Date().getFullYear()
  ) {}

  /**
   * Runs one user turn. Steps that produce no event (car confirmation,
   * evaluation) fall through to the next handler in the same call.
   */
  async process(record: ConversationRecord, userInput: string): Promise<StepOutcome> {
    let current = record;

    for (let hops = 0; hops < CONVERSATION_STEPS.length; hops++) {
      const before = current.step;
      const outcome = await this.handlers[before](current, userInput);

      if (outcome.event !== null || outcome.record.step === before) {
        logger.debug('Conversation step processed', {
          conversationId: record.id,
          from: record.step,
          to: outcome.record.step,
          event: outcome.event?.type ?? null,
        });
        return outcome;
      }

      current = outcome.record;
    }

    return { record: current, event: null };
  }

  private async greet(record: ConversationRecord): Promise<StepOutcome> {
    return {
      record: { ...record, step: ConversationStep.COLLECTING_PERSONAL },
      event: { type: 'greeting' },
    };
  }

  private async collectPersonalData(record: ConversationRecord, userInput: string): Promise<StepOutcome> {
    const data = record.personalData;

    if (data.fullName === undefined) {
      const { value, safetyError } = await this.extraction.extractFullName(userInput);
      if (safetyError) {
        return { record, event: { type: 'unsafe_input', field: 'fullName', message: safetyError } };
      }
      if (value === null) {
        return { record, event: { type: 'invalid_name' } };
      }
      const personalData: PersonalData = { ...data, fullName: value };
      return {
        record: { ...record, personalData },
        event: { type: 'asked_birth_year', firstName: firstNameOf(personalData) },
      };
    }

    if (data.birthYear === undefined) {
      const { value } = this.extraction.extractBirthYear(userInput);
      if (value === null) {
        return { record, event: { type: 'invalid_birth_year' } };
      }
      return {
        record: { ...record, personalData: { ...data, birthYear: value } },
        event: { type: 'asked_email' },
      };
    }

    if (data.email === undefined) {
      const { value } = this.extraction.extractEmail(userInput);
      if (value === null) {
        return { record, event: { type: 'invalid_email' } };
      }
      const personalData: PersonalData = { ...data, email: value };
      return {
        record: { ...record, personalData, step: ConversationStep.CONFIRMING_PERSONAL },
        event: { type: 'confirm_personal_data', snapshot: { ...personalData } },
      };
    }

    // Complete data while still collecting: go to confirmation.
    return {
      record: { ...record, step: ConversationStep.CONFIRMING_PERSONAL },
      event: { type: 'confirm_personal_data', snapshot: { ...data } },
    };
  }

  private async confirmPersonalData(record: ConversationRecord, userInput: string): Promise<StepOutcome> {
    switch (classifyConfirmation(userInput)) {
      case 'affirmative':
        return {
          record: { ...record, personalConfirmed: true, step: ConversationStep.COLLECTING_CAR },
          event: { type: 'personal_confirmed', firstName: firstNameOf(record.personalData) },
        };
      case 'negative':
        return {
          record: {
            ...record,
            personalData: {},
            personalConfirmed: false,
            step: ConversationStep.COLLECTING_PERSONAL,
          },
          event: { type: 'personal_data_reset' },
        };
      case 'unclear':
        return { record, event: { type: 'invalid_confirmation' } };
    }
  }

  private async collectCarData(record: ConversationRecord, userInput: string): Promise<StepOutcome> {
    const data = record.carData;

    if (data.brand === undefined) {
      const { value, safetyError } = await this.extraction.extractCarBrand(userInput);
      if (safetyError) {
        return { record, event: { type: 'unsafe_input', field: 'brand', message: safetyError } };
      }
      if (value === null) {
        return { record, event: { type: 'invalid_car_brand' } };
      }
      return {
        record: { ...record, carData: { ...data, brand: value } },
        event: { type: 'asked_car_model', brand: value },
      };
    }

    if (data.model === undefined) {
      const { value, safetyError } = await this.extraction.extractCarModel(userInput, data.brand);
      if (safetyError) {
        return { record, event: { type: 'unsafe_input', field: 'model', message: safetyError } };
      }
      if (value === null) {
        return { record, event: { type: 'invalid_car_model', brand: data.brand } };
      }
      return {
        record: { ...record, carData: { ...data, model: value } },
        event: { type: 'asked_car_year', brand: data.brand, model: value },
      };
    }

    if (data.year === undefined) {
      const { value } = this.extraction.extractCarYear(userInput);
      if (value === null) {
        return { record, event: { type: 'invalid_car_year' } };
      }
      return {
        record: { ...record, carData: { ...data, year: value } },
        event: { type: 'asked_mileage' },
      };
    }

    if (data.mileage === undefined) {
      const { value } = this.extraction.extractMileage(userInput);
      if (value === null) {
        return { record, event: { type: 'invalid_mileage' } };
      }
      const carData: CarData = { ...data, mileage: value };
      return {
        record: { ...record, carData, step: ConversationStep.CONFIRMING_CAR },
        event: { type: 'confirm_car_data', snapshot: { ...carData } },
      };
    }

    return {
      record: { ...record, step: ConversationStep.CONFIRMING_CAR },
      event: { type: 'confirm_car_data', snapshot: { ...data } },
    };
  }

  private async confirmCarData(record: ConversationRecord, userInput: string): Promise<StepOutcome> {
    switch (classifyConfirmation(userInput)) {
      case 'affirmative':
        return {
          record: { ...record, carConfirmed: true, step: ConversationStep.EVALUATING },
          event: null,
        };
      case 'negative':
        return {
          record: { ...record, carData: {}, carConfirmed: false, step: ConversationStep.COLLECTING_CAR },
          event: { type: 'car_data_reset', firstName: firstNameOf(record.personalData) },
        };
      case 'unclear':
        return { record, event: { type: 'invalid_car_confirmation' } };
    }
  }

  private async evaluate(record: ConversationRecord): Promise<StepOutcome> {
    const { birthYear } = record.personalData;
    const { year: carYear, mileage } = record.carData;

    if (birthYear === undefined || carYear === undefined || mileage === undefined) {
      const missing: EvaluationInput[] = [];
      if (birthYear === undefined) missing.push('birthYear');
      if (carYear === undefined) missing.push('carYear');
      if (mileage === undefined) missing.push('mileage');

      logger.error('Eligibility evaluation reached with missing data', { conversationId: record.id, missing });
      return { record, event: { type: 'missing_evaluation_data', missing } };
    }

    const result = evaluateEligibility(birthYear, carYear, mileage, this.currentYear());
    logger.info('Eligibility evaluated', {
      conversationId: record.id,
      isEligible: result.isEligible,
      ageOk: result.ageOk,
      carAgeOk: result.carAgeOk,
      mileageOk: result.mileageOk,
    });

    return {
      record: { ...record, eligibilityResult: result, step: ConversationStep.COMPLETED },
      event: null,
    };
  }

  private async complete(record: ConversationRecord): Promise<StepOutcome> {
    if (!record.eligibilityResult) {
      return { record, event: { type: 'eligibility_unavailable' } };
    }
    return {
      record,
      event: {
        type: 'eligibility_announced',
        result: record.eligibilityResult,
        firstName: firstNameOf(record.personalData),
      },
    };
  }
}
