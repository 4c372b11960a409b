/**
 * Error kinds raised across the vault.
 *
 * The first group comes from parsing and validating credentials, the second from
 * cryptography and storage, the last from session and API level operations.
 */
export type OtpErrorCode =
  | 'InvalidUri'
  | 'MissingField'
  | 'InvalidSecret'
  | 'InvalidAlgorithm'
  | 'InvalidDigits'
  | 'InvalidPeriod'
  | 'InvalidCounter'
  | 'DecryptionFailure'
  | 'MalformedRecord'
  | 'IoFailure'
  | 'WeakPassword'
  | 'PasswordMismatch'
  | 'PartialReencryptionFailure'
  | 'CodeGenerationError'
  | 'SessionLocked'
  | 'NotInitialized'
  | 'AlreadyInitialized'
  | 'CredentialExists'
  | 'CredentialNotFound'
  | 'QrUnavailable';

/**
 * Error carrying one of the {@link OtpErrorCode} kinds, so callers can branch on `code`
 * (skip a file, reject an import, end the session) instead of on message text.
 */
export class OtpError extends Error {
  public readonly code: OtpErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: OtpErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'OtpError';
    this.code = code;
    this.details = details;
  }
}

/**
 * Single message for every authenticated-decryption failure. Wrong password, tampered
 * data and truncated envelopes are reported identically.
 */
export const DECRYPTION_FAILURE_MESSAGE = 'Unable to decrypt data with the supplied password';

export function isOtpError(error: unknown, code?: OtpErrorCode): error is OtpError {
  return error instanceof OtpError && (code === undefined || error.code === code);
}
