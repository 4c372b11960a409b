import { Injectable, Logger } from '@nestjs/common';
import { createHmac } from 'crypto';
import { Secret } from 'otpauth';
import { OtpError } from '../shared/otp-error';
import { getErrorMessage } from '../shared/error.utils';
import { Credential, GeneratedCode, HashAlgorithm, isHashAlgorithm } from './interfaces/credential.interface';

/** Rendered in place of a code the generator could not produce. */
export const CODE_UNAVAILABLE = 'code unavailable';

/** Default for {@link CodeGeneratorService.computeTimeCode}; credential codes use the credential's own algorithm. */
export const RAW_TIME_CODE_DEFAULT_ALGORITHM: HashAlgorithm = 'SHA512';

export const DEFAULT_SECRET_BYTES = 20;

const HMAC_DIGESTS: Record<HashAlgorithm, string> = {
  SHA1: 'sha1',
  SHA256: 'sha256',
  SHA512: 'sha512',
  MD5: 'md5',
};

export interface TimeCodeOptions {
  algorithm?: HashAlgorithm;
  digits?: number;
  period?: number;
}

@Injectable()
export class CodeGeneratorService {
  private readonly logger = new Logger(CodeGeneratorService.name);

  /**
   * Generate the current code for a credential.
   *
   * HOTP codes are computed over the stored counter, which is never advanced here.
   *
   * @param credential - Parsed credential
   * @param nowMs - Wall-clock time in milliseconds, defaults to `Date.now()`
   * @throws {OtpError} `CodeGenerationError` for an unsupported algorithm or undecodable secret
   */
  generate(credential: Credential, nowMs: number = Date.now()): GeneratedCode {
    if (credential.kind === 'hotp') {
      return { code: this.generateHotp(credential.secret, credential.counter, credential.algorithm, credential.digits) };
    }

    return this.generateTotp(credential.secret, nowMs, credential.algorithm, credential.digits, credential.period);
  }

  /**
   * Like {@link generate}, but renders {@link CODE_UNAVAILABLE} instead of throwing.
   * Used by the refresh loop, which must keep running.
   */
  generateForDisplay(credential: Credential, nowMs: number = Date.now()): GeneratedCode {
    try {
      return this.generate(credential, nowMs);
    } catch (error) {
      this.logger.warn(`Code generation failed for "${credential.label}": ${getErrorMessage(error)}`);
      return { code: CODE_UNAVAILABLE };
    }
  }

  /**
   * RFC 4226 HOTP value.
   */
  generateHotp(secret: string, counter: number, algorithm: string, digits: number): string {
    return this.truncate(this.hmac(secret, counter, algorithm), digits);
  }

  /**
   * RFC 6238 TOTP value with the seconds left in the current window.
   */
  generateTotp(secret: string, nowMs: number, algorithm: string, digits: number, period: number): GeneratedCode {
    if (!Number.isInteger(period) || period < 1) {
      throw new OtpError('CodeGenerationError', `Invalid period: ${period}`);
    }

    const unixSeconds = Math.floor(nowMs / 1000);
    const counter = Math.floor(unixSeconds / period);

    return {
      code: this.generateHotp(secret, counter, algorithm, digits),
      remainingSeconds: period - (unixSeconds % period),
    };
  }

  /**
   * Time-based code straight from a Base32 secret, without a credential record.
   * Defaults: SHA512, 6 digits, 30 second period.
   */
  computeTimeCode(secret: string, nowMs: number = Date.now(), options: TimeCodeOptions = {}): string {
    const { algorithm = RAW_TIME_CODE_DEFAULT_ALGORITHM, digits = 6, period = 30 } = options;
    return this.generateTotp(secret, nowMs, algorithm, digits, period).code;
  }

  /**
   * Random Base32 secret, unpadded.
   */
  generateSecret(bytes: number = DEFAULT_SECRET_BYTES): string {
    return new Secret({ size: bytes }).base32;
  }

  private hmac(secret: string, counter: number, algorithm: string): Buffer {
    const normalized = algorithm.toUpperCase();
    if (!isHashAlgorithm(normalized)) {
      throw new OtpError('CodeGenerationError', `Unsupported algorithm: ${algorithm}`);
    }

    if (!Number.isSafeInteger(counter) || counter < 0) {
      throw new OtpError('CodeGenerationError', `Invalid counter: ${counter}`);
    }

    const key = this.decodeSecret(secret);
    const message = Buffer.alloc(8);
    message.writeBigUInt64BE(BigInt(counter));

    return createHmac(HMAC_DIGESTS[normalized], key).update(message).digest();
  }

  /**
   * RFC 4226 dynamic truncation.
   */
  private truncate(digest: Buffer, digits: number): string {
    if (!Number.isInteger(digits) || digits < 1) {
      throw new OtpError('CodeGenerationError', `Invalid digits: ${digits}`);
    }

    const offset = digest[digest.length - 1] & 0x0f;
    const binary = digest.readUInt32BE(offset) & 0x7fffffff;
    const code = BigInt(binary) % 10n ** BigInt(digits);

    return code.toString().padStart(digits, '0');
  }

  private decodeSecret(secret: string): Uint8Array {
    let bytes: Uint8Array;
    try {
      bytes = Secret.fromBase32(secret.toUpperCase()).bytes;
    } catch (error) {
      throw new OtpError('CodeGenerationError', `Secret is not valid Base32: ${getErrorMessage(error)}`);
    }

    if (bytes.length === 0) {
      throw new OtpError('CodeGenerationError', 'Secret decodes to zero bytes');
    }
    return bytes;
  }
}
