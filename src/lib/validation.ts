/**
 * Ghostline — src/lib/validation.ts
 * WHAT: Text checks for user-supplied note names, note bodies and prefixes.
 * Stores call these and translate ValidationError into their own error codes.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field: string
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * @returns the trimmed value
 * @throws ValidationError when the trimmed value is empty or longer than `max`
 */
export function requireLength(value: string, field: string, max: number): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ValidationError(`${field} cannot be empty`, field);
  }
  if (trimmed.length > max) {
    throw new ValidationError(`${field} cannot be longer than ${max} characters`, field);
  }
  return trimmed;
}

export function requireSingleToken(value: string, field: string): string {
  if (/\s/.test(value)) {
    throw new ValidationError(`${field} cannot contain spaces`, field);
  }
  return value;
}
