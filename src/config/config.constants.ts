export const BOOLEAN_TRUE_VALUES = ['true', '1', 'yes', 'on'];

/**
 * Which secret keys the per-credential envelopes.
 * The master password is what existing vaults use; the master secret is the
 * random value stored in the master-key file.
 */
export enum VaultKeySource {
  PASSWORD = 'password',
  MASTER_SECRET = 'master-secret',
}

/**
 * Named PBKDF2 derivations. Both exist so that files written with either stay readable.
 */
export enum KeyDerivation {
  PBKDF2_SHA256 = 'sha256',
  PBKDF2_SHA512 = 'sha512',
}

// Configuration defaults
export const DEFAULT_SERVER_HOST = '127.0.0.1';
export const DEFAULT_SERVER_PORT = 8787;
export const DEFAULT_VAULT_PATH = './profiles';
export const DEFAULT_VAULT_KEY_SOURCE = VaultKeySource.PASSWORD;
export const DEFAULT_PBKDF2_ITERATIONS = 100_000;
export const DEFAULT_MASTER_KEY_KDF = KeyDerivation.PBKDF2_SHA256;
export const DEFAULT_IDLE_TIMEOUT_SECS = 180;
export const DEFAULT_IDLE_CHECK_INTERVAL_MS = 10_000;
export const DEFAULT_CODE_REFRESH_INTERVAL_MS = 1000;
export const DEFAULT_IMPORT_SCAN_INTERVAL_MS = 2000;
export const DEFAULT_PASSWORD_MIN_LENGTH = 8;
export const DEFAULT_PASSWORD_MIN_SCORE = 60;
export const DEFAULT_THROTTLE_TTL = 60000;
export const DEFAULT_THROTTLE_LIMIT = 300;

// Vault layout
export const VAULT_FILE_EXTENSION = '.enc';
export const MASTER_KEY_FILE_NAME = '.master';
export const MAX_FILE_NAME_BYTES = 255;
