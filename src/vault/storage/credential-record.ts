/**
 * JSON form of a credential inside a vault file.
 *
 * @module vault/storage/credential-record
 */

import { OtpError } from '../../shared/otp-error';
import { Result, err } from '../../shared/result';
import { Credential, CredentialKind } from '../../otp/interfaces/credential.interface';
import {
  DEFAULT_ALGORITHM,
  DEFAULT_COUNTER,
  DEFAULT_DIGITS,
  DEFAULT_ISSUER,
  DEFAULT_PERIOD,
  validateCredentialFields,
} from '../../otp/credential.validators';

/**
 * Record as written. Readers also accept the decimal-string form of the numeric fields
 * and `null` for the field of the other kind.
 */
export type CredentialRecord =
  | {
      type: 'totp';
      label: string;
      secret: string;
      issuer: string;
      algorithm: string;
      digits: number;
      period: number;
    }
  | {
      type: 'hotp';
      label: string;
      secret: string;
      issuer: string;
      algorithm: string;
      digits: number;
      counter: number;
    };

export function toCredentialRecord(credential: Credential): CredentialRecord {
  const { label, secret, issuer, algorithm, digits } = credential;

  return credential.kind === 'totp'
    ? { type: 'totp', label, secret, issuer, algorithm, digits, period: credential.period }
    : { type: 'hotp', label, secret, issuer, algorithm, digits, counter: credential.counter };
}

export function serializeCredential(credential: Credential): string {
  return JSON.stringify(toCredentialRecord(credential));
}

function isRecordObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Text form of an optional scalar field. Absent, null and empty values give `undefined`.
 */
function textField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  if (typeof value === 'string') {
    return value.length > 0 ? value : undefined;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return undefined;
}

/**
 * Parse and validate the decrypted JSON of a vault file.
 */
export function parseCredentialRecord(json: string): Result<Credential, OtpError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return err(new OtpError('MalformedRecord', 'Credential record is not valid JSON'));
  }

  if (!isRecordObject(parsed)) {
    return err(new OtpError('MalformedRecord', 'Credential record must be a JSON object'));
  }

  const type = textField(parsed, 'type')?.toLowerCase();
  if (type !== 'totp' && type !== 'hotp') {
    return err(new OtpError('MalformedRecord', `Unknown credential type: ${String(parsed.type)}`));
  }

  return validateCredentialFields({
    kind: type satisfies CredentialKind,
    label: textField(parsed, 'label') ?? '',
    secret: textField(parsed, 'secret'),
    issuer: textField(parsed, 'issuer') ?? DEFAULT_ISSUER,
    algorithm: textField(parsed, 'algorithm') ?? DEFAULT_ALGORITHM,
    digits: textField(parsed, 'digits') ?? DEFAULT_DIGITS,
    period: textField(parsed, 'period') ?? DEFAULT_PERIOD,
    counter: textField(parsed, 'counter') ?? DEFAULT_COUNTER,
  });
}
