import { registerAs } from '@nestjs/config';
import * as process from 'process';
import { resolve } from 'path';
import {
  DEFAULT_SERVER_HOST,
  DEFAULT_SERVER_PORT,
  DEFAULT_VAULT_PATH,
  DEFAULT_VAULT_KEY_SOURCE,
  DEFAULT_PBKDF2_ITERATIONS,
  DEFAULT_MASTER_KEY_KDF,
  DEFAULT_IDLE_TIMEOUT_SECS,
  DEFAULT_IDLE_CHECK_INTERVAL_MS,
  DEFAULT_CODE_REFRESH_INTERVAL_MS,
  DEFAULT_IMPORT_SCAN_INTERVAL_MS,
  DEFAULT_PASSWORD_MIN_LENGTH,
  DEFAULT_PASSWORD_MIN_SCORE,
  DEFAULT_THROTTLE_TTL,
  DEFAULT_THROTTLE_LIMIT,
  KeyDerivation,
  VaultKeySource,
} from './config/config.constants';
import {
  parseOptionalBoolean,
  parseNumberWithDefault,
  parseStringWithDefault,
  parseEnumWithDefault,
  parsePositiveNumberWithDefault,
} from './config/config.parsers';
import type { OtpvConfiguration } from './config/config.types';

/**
 * Builds the vault location and key-source configuration.
 *
 * Optional environment variables:
 * - OTPV_VAULT_PATH: Directory holding credential files and the master-key file (default: ./profiles)
 * - OTPV_VAULT_KEY_SOURCE: `password` or `master-secret` (default: password)
 *
 * The directory is only resolved here; it is created by the vault storage `open()` step.
 */
function buildVaultConfig(): OtpvConfiguration['vault'] {
  return {
    path: resolve(parseStringWithDefault(process.env.OTPV_VAULT_PATH, DEFAULT_VAULT_PATH)),
    keySource: parseEnumWithDefault(
      'OTPV_VAULT_KEY_SOURCE',
      process.env.OTPV_VAULT_KEY_SOURCE,
      Object.values(VaultKeySource),
      DEFAULT_VAULT_KEY_SOURCE,
    ),
  };
}

/**
 * Builds key-derivation configuration.
 *
 * Optional environment variables:
 * - OTPV_PBKDF2_ITERATIONS: PBKDF2 iteration count (default: 100000)
 * - OTPV_MASTER_KEY_KDF: `sha256` or `sha512` derivation for the master-key file (default: sha256)
 *
 * Envelopes do not record their iteration count or derivation, so changing either
 * makes previously written files unreadable.
 */
function buildCryptoConfig(): OtpvConfiguration['crypto'] {
  return {
    pbkdf2Iterations: parsePositiveNumberWithDefault(
      'OTPV_PBKDF2_ITERATIONS',
      process.env.OTPV_PBKDF2_ITERATIONS,
      DEFAULT_PBKDF2_ITERATIONS,
    ),
    masterKeyKdf: parseEnumWithDefault(
      'OTPV_MASTER_KEY_KDF',
      process.env.OTPV_MASTER_KEY_KDF,
      Object.values(KeyDerivation),
      DEFAULT_MASTER_KEY_KDF,
    ),
  };
}

function buildSessionConfig(): OtpvConfiguration['session'] {
  return {
    idleTimeoutSecs: parsePositiveNumberWithDefault(
      'OTPV_IDLE_TIMEOUT_SECS',
      process.env.OTPV_IDLE_TIMEOUT_SECS,
      DEFAULT_IDLE_TIMEOUT_SECS,
    ),
    idleCheckIntervalMs: parsePositiveNumberWithDefault(
      'OTPV_IDLE_CHECK_INTERVAL_MS',
      process.env.OTPV_IDLE_CHECK_INTERVAL_MS,
      DEFAULT_IDLE_CHECK_INTERVAL_MS,
    ),
    terminateOnAuthFailure: parseOptionalBoolean(process.env.OTPV_TERMINATE_ON_AUTH_FAILURE, true),
  };
}

function buildSchedulerConfig(): OtpvConfiguration['scheduler'] {
  return {
    codeRefreshIntervalMs: parsePositiveNumberWithDefault(
      'OTPV_CODE_REFRESH_INTERVAL_MS',
      process.env.OTPV_CODE_REFRESH_INTERVAL_MS,
      DEFAULT_CODE_REFRESH_INTERVAL_MS,
    ),
    importScanIntervalMs: parsePositiveNumberWithDefault(
      'OTPV_IMPORT_SCAN_INTERVAL_MS',
      process.env.OTPV_IMPORT_SCAN_INTERVAL_MS,
      DEFAULT_IMPORT_SCAN_INTERVAL_MS,
    ),
  };
}

/**
 * Builds the master-password acceptance gate.
 *
 * Optional environment variables:
 * - OTPV_PASSWORD_MIN_LENGTH: Minimum master password length (default: 8)
 * - OTPV_PASSWORD_MIN_SCORE: Minimum strength score, 0-100 (default: 60)
 *
 * @throws {Error} If the minimum score is above 100
 */
function buildPasswordConfig(): OtpvConfiguration['password'] {
  const minScore = parseNumberWithDefault(process.env.OTPV_PASSWORD_MIN_SCORE, DEFAULT_PASSWORD_MIN_SCORE);
  if (minScore > 100) {
    throw new Error(`OTPV_PASSWORD_MIN_SCORE must be between 0 and 100 (received: ${minScore}).`);
  }

  return {
    minLength: parseNumberWithDefault(process.env.OTPV_PASSWORD_MIN_LENGTH, DEFAULT_PASSWORD_MIN_LENGTH),
    minScore,
  };
}

/**
 * Builds API request throttling.
 *
 * Optional environment variables:
 * - OTPV_THROTTLE_TTL: Window in milliseconds (default: 60000)
 * - OTPV_THROTTLE_LIMIT: Requests per window and client (default: 300)
 */
function buildThrottleConfig(): OtpvConfiguration['throttle'] {
  return {
    ttl: parseNumberWithDefault(process.env.OTPV_THROTTLE_TTL, DEFAULT_THROTTLE_TTL),
    limit: parseNumberWithDefault(process.env.OTPV_THROTTLE_LIMIT, DEFAULT_THROTTLE_LIMIT),
  };
}

/**
 * Register Config OTPV
 */
export default registerAs('otpv', (): OtpvConfiguration => {
  return {
    environment: parseStringWithDefault(process.env.NODE_ENV, 'production'),
    server: {
      host: parseStringWithDefault(process.env.OTPV_HOST, DEFAULT_SERVER_HOST),
      port: parseNumberWithDefault(process.env.OTPV_PORT, DEFAULT_SERVER_PORT),
    },
    vault: buildVaultConfig(),
    crypto: buildCryptoConfig(),
    session: buildSessionConfig(),
    scheduler: buildSchedulerConfig(),
    password: buildPasswordConfig(),
    throttle: buildThrottleConfig(),
  };
});
