import { EligibilityResult } from '../types/conversation';

export const MIN_AGE = 18;
export const MIN_CAR_YEAR = 2015;
export const MAX_MILEAGE_EXCLUSIVE = 100000;

// Consumers split passing from failing reasons on this prefix.
export const PASS_PREFIX = '✓';

export function evaluateEligibility(
  birthYear: number,
  carYear: number,
  mileage: number,
  currentYear: number = new Date().getFullYear()
): EligibilityResult {
  const age = currentYear - birthYear;

  const ageOk = age >= MIN_AGE;
  const carAgeOk = carYear >= MIN_CAR_YEAR;
  const mileageOk = mileage < MAX_MILEAGE_EXCLUSIVE;

  const reasons: string[] = [
    ageOk
      ? `${PASS_PREFIX} Edad: ${age} años (mayor de ${MIN_AGE})`
      : `El cliente tiene ${age} años, debe ser mayor de ${MIN_AGE}`,
    carAgeOk
      ? `${PASS_PREFIX} Año del auto: ${carYear} (${MIN_CAR_YEAR} o posterior)`
      : `El auto es del año ${carYear}, debe ser del ${MIN_CAR_YEAR} o posterior`,
    mileageOk
      ? `${PASS_PREFIX} Kilometraje: ${mileage} km (menor a 100,000 km)`
      : `El kilometraje es ${mileage} km, debe ser menor a 100,000 km`,
  ];

  return {
    isEligible: ageOk && carAgeOk && mileageOk,
    reasons,
    age,
    ageOk,
    carAgeOk,
    mileageOk,
  };
}

export function failingReasons(result: EligibilityResult): string[] {
  return result.reasons.filter((reason) => !reason.startsWith(PASS_PREFIX));
}
