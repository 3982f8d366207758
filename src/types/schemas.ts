import { z } from 'zod';

export const personalDataSchema = z.object({
  fullName: z.string().optional(),
  birthYear: z.number().int().optional(),
  email: z.string().optional(),
});

export const carDataSchema = z.object({
  brand: z.string().optional(),
  model: z.string().optional(),
  year: z.number().int().optional(),
  mileage: z.number().int().optional(),
});

export const eligibilityResultSchema = z.object({
  isEligible: z.boolean(),
  reasons: z.array(z.string()),
  age: z.number().int(),
  ageOk: z.boolean(),
  carAgeOk: z.boolean(),
  mileageOk: z.boolean(),
});

export const chatMessageSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});
