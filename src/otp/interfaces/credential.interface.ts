export const HASH_ALGORITHMS = ['SHA1', 'SHA256', 'SHA512', 'MD5'] as const;

export type HashAlgorithm = (typeof HASH_ALGORITHMS)[number];

export type CredentialKind = 'totp' | 'hotp';

interface CredentialBase {
  label: string;
  /** Uppercase Base32, padding kept as given */
  secret: string;
  issuer: string;
  algorithm: HashAlgorithm;
  digits: number;
}

export interface TotpCredential extends CredentialBase {
  kind: 'totp';
  period: number;
}

export interface HotpCredential extends CredentialBase {
  kind: 'hotp';
  counter: number;
}

export type Credential = TotpCredential | HotpCredential;

/**
 * A generated code for display. `remainingSeconds` is only meaningful for TOTP.
 */
export interface GeneratedCode {
  code: string;
  remainingSeconds?: number;
}

export function isHashAlgorithm(value: string): value is HashAlgorithm {
  return (HASH_ALGORITHMS as readonly string[]).includes(value);
}
