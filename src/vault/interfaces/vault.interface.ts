import type { CredentialKind, HashAlgorithm } from '../../otp/interfaces/credential.interface';

/**
 * A credential as shown to the display layer: everything but the secret, plus its current code.
 */
export interface CredentialSummary {
  name: string;
  kind: CredentialKind;
  label: string;
  issuer: string;
  algorithm: HashAlgorithm;
  digits: number;
  period?: number;
  counter?: number;
  code: string;
  remainingSeconds?: number;
}

/**
 * Codes for every credential, recomputed by the refresh task.
 */
export interface CodeSnapshot {
  generatedAt: string;
  entries: CredentialSummary[];
}

export interface QrExport {
  name: string;
  /** Base64 text of the encrypted PNG envelope, the form written to disk */
  data: string;
}

export interface ImportScanStatus {
  enabled: boolean;
  lastCheckedAt?: string;
  lastImported?: string;
  lastError?: string;
}
