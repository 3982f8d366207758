import { CarData, EligibilityResult, PersonalData } from './conversation';

export type CapabilityField = 'fullName' | 'brand' | 'model';

export type EvaluationInput = 'birthYear' | 'carYear' | 'mileage';

/**
 * Semantic outcome of one processed turn. Rendering to user-facing text
 * happens in ResponseRenderer.
 */
export type ResponseEvent =
  | { type: 'greeting' }
  | { type: 'asked_birth_year'; firstName: string }
  | { type: 'asked_email' }
  | { type: 'confirm_personal_data'; snapshot: PersonalData }
  | { type: 'personal_confirmed'; firstName: string }
  | { type: 'personal_data_reset' }
  | { type: 'invalid_confirmation' }
  | { type: 'invalid_name' }
  | { type: 'invalid_birth_year' }
  | { type: 'invalid_email' }
  | { type: 'unsafe_input'; field: CapabilityField; message: string }
  | { type: 'asked_car_model'; brand: string }
  | { type: 'asked_car_year'; brand: string; model: string }
  | { type: 'asked_mileage' }
  | { type: 'confirm_car_data'; snapshot: CarData }
  | { type: 'car_data_reset'; firstName: string }
  | { type: 'invalid_car_confirmation' }
  | { type: 'invalid_car_brand' }
  | { type: 'invalid_car_model'; brand: string | null }
  | { type: 'invalid_car_year' }
  | { type: 'invalid_mileage' }
  | { type: 'missing_evaluation_data'; missing: EvaluationInput[] }
  | { type: 'eligibility_announced'; result: EligibilityResult; firstName: string }
  | { type: 'eligibility_unavailable' };
