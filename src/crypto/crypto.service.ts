import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createCipheriv, createDecipheriv, pbkdf2Sync, randomBytes } from 'crypto';
import { DEFAULT_PBKDF2_ITERATIONS, KeyDerivation } from '../config/config.constants';
import { DECRYPTION_FAILURE_MESSAGE, OtpError } from '../shared/otp-error';
import { Result, err, ok } from '../shared/result';
import { KEY_LENGTH, NONCE_LENGTH, SALT_LENGTH, TAG_LENGTH } from './interfaces';
import { decodeEnvelopeText, encodeEnvelopeText, envelopeFromBytes, envelopeToBytes } from './serialization';

const CIPHER = 'aes-256-gcm';

@Injectable()
export class CryptoService {
  private readonly logger = new Logger(CryptoService.name);
  private readonly iterations: number;

  /**
   * Constructor
   */
  /* v8 ignore next - false positive on constructor parameter property */
  constructor(private readonly configService: ConfigService) {
    this.iterations = this.configService.get<number>('otpv.crypto.pbkdf2Iterations', DEFAULT_PBKDF2_ITERATIONS);
    this.logger.debug(`PBKDF2 iterations: ${this.iterations}`);
  }

  /**
   * PBKDF2-HMAC-SHA256 key derivation.
   * @param password Master password
   * @param salt 16-byte salt taken from the envelope
   * @param iterations Defaults to the configured count
   * @returns 32-byte AES-256 key
   */
  deriveKey(password: string, salt: Uint8Array, iterations: number = this.iterations): Buffer {
    return pbkdf2Sync(password, salt, iterations, KEY_LENGTH, 'sha256');
  }

  /**
   * PBKDF2-HMAC-SHA512 key derivation. Kept apart from {@link deriveKey} so that
   * master-key files written with it stay readable.
   */
  deriveKeySha512(password: string, salt: Uint8Array, iterations: number = this.iterations): Buffer {
    return pbkdf2Sync(password, salt, iterations, KEY_LENGTH, 'sha512');
  }

  /**
   * Encrypt a payload under a password.
   *
   * A fresh salt and nonce are drawn on every call, so two encryptions of the same
   * plaintext never produce the same envelope.
   *
   * @param plaintext Bytes to protect
   * @param password Password the key is derived from
   * @param kdf Named derivation
   * @returns Raw envelope bytes, `salt ‖ nonce ‖ ciphertext ‖ tag`
   */
  encrypt(plaintext: Uint8Array, password: string, kdf: KeyDerivation = KeyDerivation.PBKDF2_SHA256): Buffer {
    const salt = randomBytes(SALT_LENGTH);
    const nonce = randomBytes(NONCE_LENGTH);
    const key = this.deriveFor(kdf, password, salt);

    const cipher = createCipheriv(CIPHER, key, nonce, { authTagLength: TAG_LENGTH });
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final(), cipher.getAuthTag()]);

    return envelopeToBytes({ salt, nonce, ciphertext });
  }

  /**
   * Decrypt raw envelope bytes.
   *
   * A truncated envelope, a wrong password and tampered data all produce the same
   * `DecryptionFailure` with the same message.
   */
  decrypt(
    envelope: Uint8Array,
    password: string,
    kdf: KeyDerivation = KeyDerivation.PBKDF2_SHA256,
  ): Result<Buffer, OtpError> {
    const parts = envelopeFromBytes(envelope);
    if (!parts) {
      return err(new OtpError('DecryptionFailure', DECRYPTION_FAILURE_MESSAGE));
    }

    const body = parts.ciphertext.subarray(0, parts.ciphertext.length - TAG_LENGTH);
    const tag = parts.ciphertext.subarray(parts.ciphertext.length - TAG_LENGTH);
    const key = this.deriveFor(kdf, password, parts.salt);

    try {
      const decipher = createDecipheriv(CIPHER, key, parts.nonce, { authTagLength: TAG_LENGTH });
      decipher.setAuthTag(tag);
      return ok(Buffer.concat([decipher.update(body), decipher.final()]));
    } catch {
      return err(new OtpError('DecryptionFailure', DECRYPTION_FAILURE_MESSAGE));
    }
  }

  /**
   * Encrypt UTF-8 text and return the envelope as base64 text.
   */
  encryptText(text: string, password: string, kdf: KeyDerivation = KeyDerivation.PBKDF2_SHA256): string {
    return encodeEnvelopeText(this.encrypt(Buffer.from(text, 'utf8'), password, kdf));
  }

  /**
   * Inverse of {@link encryptText}. Text that is not base64 is a `DecryptionFailure`.
   */
  decryptText(
    encoded: string,
    password: string,
    kdf: KeyDerivation = KeyDerivation.PBKDF2_SHA256,
  ): Result<string, OtpError> {
    const bytes = decodeEnvelopeText(encoded);
    if (!bytes) {
      return err(new OtpError('DecryptionFailure', DECRYPTION_FAILURE_MESSAGE));
    }

    const result = this.decrypt(bytes, password, kdf);
    return result.ok ? ok(result.value.toString('utf8')) : result;
  }

  private deriveFor(kdf: KeyDerivation, password: string, salt: Uint8Array): Buffer {
    return kdf === KeyDerivation.PBKDF2_SHA512 ? this.deriveKeySha512(password, salt) : this.deriveKey(password, salt);
  }
}
