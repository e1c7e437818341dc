// ============================================================================
// Phone Normalization: one canonical digit string shared by tracker and CRM
// ============================================================================

export interface NormalizeOptions {
  /** Country calling code assumed for national numbers (default '7') */
  defaultCountryCode?: string;
  /** National trunk prefix replaced by the country code (default '8') */
  trunkPrefix?: string;
}

export type NormalizedPhone =
  | { ok: true; number: string }
  | { ok: false; reason: string };

const MIN_DIGITS = 10;
const MAX_DIGITS = 15;

/**
 * Collapse a phone number to its bare international digit sequence.
 *
 * - Formatting (spaces, dashes, parentheses, a leading '+') is stripped.
 * - A leading '00' international prefix is dropped.
 * - An 11-digit number starting with the trunk prefix ('8') gets the country
 *   code instead ('89991234567' -> '79991234567').
 * - A bare 10-digit national number gets the country code prepended.
 * - Anything shorter than 10 or longer than 15 digits is rejected
 *   (internal extensions, anonymous callers, junk).
 */
export function normalizePhone(raw: string, options: NormalizeOptions = {}): NormalizedPhone {
  const countryCode = options.defaultCountryCode ?? '7';
  const trunkPrefix = options.trunkPrefix ?? '8';

  let digits = raw.replace(/\D/g, '');
  if (digits.startsWith('00')) {
    digits = digits.slice(2);
  }

  if (digits.length === 0) {
    return { ok: false, reason: 'no digits in phone number' };
  }

  if (digits.length === MIN_DIGITS + 1 && digits.startsWith(trunkPrefix)) {
    digits = countryCode + digits.slice(1);
  } else if (digits.length === MIN_DIGITS) {
    digits = countryCode + digits;
  }

  if (digits.length < MIN_DIGITS) {
    return { ok: false, reason: `phone number too short (${digits.length} digits)` };
  }
  if (digits.length > MAX_DIGITS) {
    return { ok: false, reason: `phone number too long (${digits.length} digits)` };
  }

  return { ok: true, number: digits };
}

/** Keep the last four digits for logs: '79991234567' -> '*******4567' */
export function maskPhone(phone: string | null | undefined): string {
  if (!phone) return '(none)';
  if (phone.length <= 4) return '*'.repeat(phone.length);
  return '*'.repeat(phone.length - 4) + phone.slice(-4);
}
