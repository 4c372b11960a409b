import { OtpError } from '../shared/otp-error';
import { Result, err, ok } from '../shared/result';
import { Credential, CredentialKind, isHashAlgorithm } from './interfaces/credential.interface';

export const MIN_DIGITS = 4;
export const MAX_DIGITS = 10;
export const DEFAULT_ISSUER = 'Unknown';
export const DEFAULT_ALGORITHM = 'SHA1';
export const DEFAULT_DIGITS = '6';
export const DEFAULT_PERIOD = '30';
export const DEFAULT_COUNTER = '0';

const BASE32_PATTERN = /^[A-Z2-7]+=*$/;
const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

/**
 * Credential fields in their textual form, as they arrive from a URI query string or
 * an older profile file. Absent optional values are already replaced by their defaults.
 */
export interface CredentialFields {
  kind: CredentialKind;
  label: string;
  secret: string | undefined;
  issuer: string;
  algorithm: string;
  digits: string;
  period: string;
  counter: string;
}

export function isValidBase32(value: string): boolean {
  return BASE32_PATTERN.test(value.toUpperCase());
}

/**
 * Parses a decimal integer the way the URI format writes one: optional sign,
 * digits, surrounding whitespace ignored. Values beyond the safe integer range are rejected.
 */
export function parseInteger(value: string): number | undefined {
  if (!INTEGER_PATTERN.test(value)) {
    return undefined;
  }

  const parsed = Number(value.trim());
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

/**
 * Validates credential fields in a fixed order and builds the tagged credential.
 *
 * Order: secret present, label present, Base32 secret, algorithm, digits, period, counter.
 * Period and counter are both checked whatever the kind; only the matching one is kept.
 */
export function validateCredentialFields(fields: CredentialFields): Result<Credential, OtpError> {
  const { secret, label } = fields;

  if (!secret) {
    return err(new OtpError('MissingField', "Missing required 'secret' parameter", { field: 'secret' }));
  }

  if (!label) {
    return err(new OtpError('MissingField', 'Missing label (account identifier)', { field: 'label' }));
  }

  if (!isValidBase32(secret)) {
    return err(new OtpError('InvalidSecret', 'Invalid secret format (must be Base32-encoded)'));
  }

  const algorithm = fields.algorithm.toUpperCase();
  if (!isHashAlgorithm(algorithm)) {
    return err(
      new OtpError('InvalidAlgorithm', `Invalid algorithm: ${algorithm}. Must be one of: SHA1, SHA256, SHA512, MD5`),
    );
  }

  const digits = parseInteger(fields.digits);
  if (digits === undefined || digits < MIN_DIGITS || digits > MAX_DIGITS) {
    return err(new OtpError('InvalidDigits', `Invalid digits value: ${fields.digits}`));
  }

  const period = parseInteger(fields.period);
  if (period === undefined || period < 1) {
    return err(new OtpError('InvalidPeriod', `Invalid period value: ${fields.period}`));
  }

  const counter = parseInteger(fields.counter);
  if (counter === undefined || counter < 0) {
    return err(new OtpError('InvalidCounter', `Invalid counter value: ${fields.counter}`));
  }

  const base = {
    label,
    secret: secret.toUpperCase(),
    issuer: fields.issuer,
    algorithm,
    digits,
  };

  const credential: Credential =
    fields.kind === 'totp' ? { ...base, kind: 'totp', period } : { ...base, kind: 'hotp', counter };
  return ok(credential);
}
