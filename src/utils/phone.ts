import { ValidationError } from './errors';

/**
 * Normalizes to an E.164-like key. Ten-digit numbers are taken as US numbers.
 */
export function normalizePhoneNumber(raw: string | null | undefined): string {
  const trimmed = (raw ?? '').trim();
  if (trimmed.length === 0) {
    throw new ValidationError('phone_number is required');
  }

  const digits = trimmed.replace(/\D/g, '');
  if (digits.length < 7 || digits.length > 15) {
    throw new ValidationError(`Invalid phone number: ${trimmed}`);
  }

  if (!trimmed.startsWith('+') && digits.length === 10) return `+1${digits}`;
  return `+${digits}`;
}
