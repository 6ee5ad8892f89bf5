import { InvalidIdentifierError } from './errors.js';

const PLAIN_DIGITS = /^\d{1,8}$/;
const PREFIXED_DIGITS = /^([A-Z]{2})(\d{1,6})$/;
const COMPANY_NUMBER = /^[A-Z0-9]{8}$/;

const compact = (input: string | null | undefined) => String(input ?? '').replace(/\s+/g, '').toUpperCase();

/**
 * Companies House numbers are eight characters: "01234567", "SC123456", "NI012345".
 * Whitespace and case are ignored; anything else must already be in full form.
 */
export function normalizeCompanyNumber(input: string | null | undefined): string | null {
  const value = compact(input);
  return COMPANY_NUMBER.test(value) ? value : null;
}

/**
 * Registration numbers on PSC filings often drop leading zeros ("1234567", "SC99"),
 * so short numeric forms are padded before the usual check.
 */
export function normalizeRegistrationNumber(input: string | null | undefined): string | null {
  const value = compact(input);
  if (PLAIN_DIGITS.test(value)) return value.padStart(8, '0');
  const prefixed = PREFIXED_DIGITS.exec(value);
  if (prefixed) return `${prefixed[1]}${prefixed[2].padStart(6, '0')}`;
  return normalizeCompanyNumber(value);
}

export function assertCompanyNumber(input: string): string {
  const normalized = normalizeCompanyNumber(input);
  if (!normalized) throw new InvalidIdentifierError(input);
  return normalized;
}
