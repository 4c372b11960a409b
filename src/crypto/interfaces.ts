export const SALT_LENGTH = 16;
export const NONCE_LENGTH = 12;
export const TAG_LENGTH = 16;
export const KEY_LENGTH = 32;

/** Shortest buffer that can hold a salt, a nonce and an empty ciphertext with its tag. */
export const MIN_ENVELOPE_LENGTH = SALT_LENGTH + NONCE_LENGTH + TAG_LENGTH;

/**
 * Password-based AES-256-GCM container, held as separate binary fields in memory.
 * On disk and over the wire it is the concatenation `salt ‖ nonce ‖ ciphertext`.
 */
export interface EncryptedEnvelope {
  salt: Uint8Array; // 16 bytes, PBKDF2 salt
  nonce: Uint8Array; // 12 bytes, AES-GCM IV
  ciphertext: Uint8Array; // AES-GCM ciphertext followed by the 16-byte tag
}
