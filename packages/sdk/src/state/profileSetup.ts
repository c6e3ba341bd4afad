export interface ProfileSetupInput {
  fullName: string;
  birthDate: Date | string | null;
  selectedLocation: string | null;
}

function isValidBirthDate(value: Date | string | null): boolean {
  if (value === null) return false;
  const time = value instanceof Date ? value.getTime() : Date.parse(value);
  return Number.isFinite(time);
}

/** Gates the "Complete Setup" action. */
export function isProfileSetupValid(input: ProfileSetupInput): boolean {
  return (
    input.fullName.trim().length > 0 &&
    isValidBirthDate(input.birthDate) &&
    (input.selectedLocation ?? '').trim().length > 0
  );
}
