/**
 * Conversion between {@link EncryptedEnvelope} fields, raw envelope bytes and the base64
 * text form. Every envelope the vault writes (credential files, the master-key file,
 * exported QR images) is stored as base64 text of the raw bytes.
 *
 * @module crypto/serialization
 */

import { EncryptedEnvelope, MIN_ENVELOPE_LENGTH, NONCE_LENGTH, SALT_LENGTH } from './interfaces';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Concatenate envelope fields into `salt ‖ nonce ‖ ciphertext`.
 */
export function envelopeToBytes(envelope: EncryptedEnvelope): Buffer {
  return Buffer.concat([envelope.salt, envelope.nonce, envelope.ciphertext]);
}

/**
 * Split raw envelope bytes into their fields.
 *
 * @returns The envelope, or undefined when the buffer is too short to hold one
 */
export function envelopeFromBytes(bytes: Uint8Array): EncryptedEnvelope | undefined {
  if (bytes.length < MIN_ENVELOPE_LENGTH) {
    return undefined;
  }

  return {
    salt: bytes.subarray(0, SALT_LENGTH),
    nonce: bytes.subarray(SALT_LENGTH, SALT_LENGTH + NONCE_LENGTH),
    ciphertext: bytes.subarray(SALT_LENGTH + NONCE_LENGTH),
  };
}

export function encodeEnvelopeText(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}

/**
 * Decode the base64 text form. Surrounding and embedded whitespace (line wrapping) is ignored.
 *
 * @returns The raw bytes, or undefined when the text is not base64
 */
export function decodeEnvelopeText(text: string): Buffer | undefined {
  const compact = text.replace(/\s+/g, '');
  if (compact.length === 0 || compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    return undefined;
  }

  return Buffer.from(compact, 'base64');
}

/**
 * Accept an envelope read from an external file: base64 text when it decodes as such,
 * otherwise the raw binary form.
 */
export function readEnvelopeData(data: Uint8Array): Buffer {
  const decoded = decodeEnvelopeText(Buffer.from(data).toString('latin1'));
  return decoded ?? Buffer.from(data);
}
