import { MAX_FILE_NAME_BYTES, VAULT_FILE_EXTENSION } from '../../config/config.constants';

const UNSAFE_NAME_CHARACTERS = /[^A-Za-z0-9._@-]/g;

/** Longest sanitized name whose file name, extension included, fits the limit. */
export const MAX_NAME_LENGTH = MAX_FILE_NAME_BYTES - Buffer.byteLength(VAULT_FILE_EXTENSION);

/**
 * File-system safe name for a credential label.
 *
 * Every character outside `[A-Za-z0-9._@-]` becomes `_`, one per UTF-16 code unit, so
 * the result is ASCII and its length equals its byte length.
 */
export function sanitizeName(label: string): string {
  return label.replace(UNSAFE_NAME_CHARACTERS, '_').slice(0, MAX_NAME_LENGTH);
}

export function toFileName(name: string): string {
  return `${sanitizeName(name)}${VAULT_FILE_EXTENSION}`;
}

export function isVaultFileName(fileName: string): boolean {
  return fileName.endsWith(VAULT_FILE_EXTENSION) && fileName.length > VAULT_FILE_EXTENSION.length;
}

export function fromFileName(fileName: string): string {
  return fileName.slice(0, -VAULT_FILE_EXTENSION.length);
}
