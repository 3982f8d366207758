export const CONVERSATION_STEPS = [
  'greeting',
  'collecting_personal_data',
  'confirming_personal_data',
  'collecting_car_data',
  'confirming_car_data',
  'evaluating_eligibility',
  'completed',
] as const;

export type ConversationStep = (typeof CONVERSATION_STEPS)[number];

export const ConversationStep = {
  GREETING: 'greeting',
  COLLECTING_PERSONAL: 'collecting_personal_data',
  CONFIRMING_PERSONAL: 'confirming_personal_data',
  COLLECTING_CAR: 'collecting_car_data',
  CONFIRMING_CAR: 'confirming_car_data',
  EVALUATING: 'evaluating_eligibility',
  COMPLETED: 'completed',
} as const satisfies Record<string, ConversationStep>;

export function isConversationStep(value: unknown): value is ConversationStep {
  return typeof value === 'string' && (CONVERSATION_STEPS as readonly string[]).includes(value);
}

export interface PersonalData {
  fullName?: string;
  birthYear?: number;
  email?: string;
}

export interface CarData {
  brand?: string;
  model?: string;
  year?: number;
  mileage?: number;
}

export interface EligibilityResult {
  isEligible: boolean;
  reasons: string[];
  age: number;
  ageOk: boolean;
  carAgeOk: boolean;
  mileageOk: boolean;
}

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ConversationRecord {
  readonly id: string;
  step: ConversationStep;
  personalData: PersonalData;
  personalConfirmed: boolean;
  carData: CarData;
  carConfirmed: boolean;
  eligibilityResult: EligibilityResult | null;
  messages: ChatMessage[];
  createdAt: string;
  updatedAt: string;
}

export function createConversationRecord(id: string, now: Date = new Date()): ConversationRecord {
  const timestamp = now.toISOString();
  return {
    id,
    step: ConversationStep.GREETING,
    personalData: {},
    personalConfirmed: false,
    carData: {},
    carConfirmed: false,
    eligibilityResult: null,
    messages: [],
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

export function firstNameOf(personalData: PersonalData): string {
  const [first] = (personalData.fullName ?? '').split(/\s+/).filter((part) => part.length > 0);
  return first ?? 'Usuario';
}
