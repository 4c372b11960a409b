import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as path from 'path';
import { CryptoService } from '../../crypto/crypto.service';
import { decodeEnvelopeText } from '../../crypto/serialization';
import { DEFAULT_VAULT_PATH, MASTER_KEY_FILE_NAME } from '../../config/config.constants';
import { Credential } from '../../otp/interfaces/credential.interface';
import { OtpError, isOtpError } from '../../shared/otp-error';
import { getErrorMessage } from '../../shared/error.utils';
import { VaultLock } from './vault-lock';
import { fromFileName, isVaultFileName, toFileName } from './vault-names';
import { parseCredentialRecord, serializeCredential } from './credential-record';

export interface LoadAllResult {
  credentials: Map<string, Credential>;
  /** Names of files that could not be read, decrypted or parsed */
  failed: string[];
}

export interface ReencryptionResult {
  succeeded: string[];
  failed: string[];
  /** True once every file was rewritten and the commit step ran */
  committed: boolean;
}

interface StagedFile {
  name: string;
  targetPath: string;
  tempPath: string;
  previous: Buffer;
}

/**
 * Owns the vault directory: one base64 envelope file per credential plus the master-key file.
 *
 * Credential-file operations are serialized through {@link VaultLock}. The master-key file
 * helpers are synchronous and unlocked; callers hold the lock around them.
 */
@Injectable()
export class VaultStorageService {
  private readonly logger = new Logger(VaultStorageService.name);
  private directory: string | undefined;

  constructor(
    private readonly configService: ConfigService,
    private readonly cryptoService: CryptoService,
    private readonly vaultLock: VaultLock,
  ) {}

  /**
   * Create the vault directory (mode 0700) and bind the service to it.
   * Must run before any other method.
   *
   * @param directory - Defaults to the configured `otpv.vault.path`
   */
  open(directory?: string): string {
    const target = path.resolve(
      directory ?? this.configService.get<string>('otpv.vault.path', path.resolve(DEFAULT_VAULT_PATH)),
    );

    try {
      fs.mkdirSync(target, { recursive: true, mode: 0o700 });
    } catch (error) {
      throw this.ioFailure(`Cannot create vault directory ${target}`, error);
    }

    this.directory = target;
    this.logger.log(`Vault directory: ${target}`);
    return target;
  }

  isOpen(): boolean {
    return this.directory !== undefined;
  }

  get vaultPath(): string {
    return this.requireDirectory();
  }

  /**
   * Encrypt a credential and write it atomically under its sanitized name.
   */
  async save(name: string, credential: Credential, key: string): Promise<string> {
    const fileName = toFileName(name);
    const filePath = this.pathFor(fileName);
    const envelope = this.cryptoService.encryptText(serializeCredential(credential), key);

    return this.vaultLock.runExclusive(() => {
      try {
        this.atomicWriteFile(filePath, envelope);
      } catch (error) {
        throw this.ioFailure(`Failed to write ${fileName}`, error);
      }
      this.logger.debug(`Saved ${fileName}`);
      return fromFileName(fileName);
    });
  }

  /**
   * Best-effort read: a missing file, a decryption failure or a malformed record all give `null`.
   */
  async load(name: string, key: string): Promise<Credential | null> {
    const filePath = this.pathFor(toFileName(name));
    return this.vaultLock.runExclusive(() => this.readCredential(filePath, key));
  }

  /**
   * Load every credential file. Files that do not load are reported, not fatal.
   */
  async loadAll(key: string): Promise<LoadAllResult> {
    return this.vaultLock.runExclusive(() => {
      const credentials = new Map<string, Credential>();
      const failed: string[] = [];

      for (const name of this.readNames()) {
        const credential = this.readCredential(this.pathFor(toFileName(name)), key);
        if (credential) {
          credentials.set(name, credential);
        } else {
          failed.push(name);
        }
      }

      if (failed.length > 0) {
        this.logger.warn(`${failed.length} vault file(s) could not be loaded: ${failed.join(', ')}`);
      }

      return { credentials, failed };
    });
  }

  async exists(name: string): Promise<boolean> {
    const filePath = this.pathFor(toFileName(name));
    return this.vaultLock.runExclusive(() => fs.existsSync(filePath));
  }

  /**
   * @returns Whether a file was removed
   */
  async delete(name: string): Promise<boolean> {
    const fileName = toFileName(name);
    const filePath = this.pathFor(fileName);

    return this.vaultLock.runExclusive(() => {
      if (!fs.existsSync(filePath)) {
        return false;
      }

      try {
        fs.unlinkSync(filePath);
      } catch (error) {
        throw this.ioFailure(`Failed to delete ${fileName}`, error);
      }
      this.logger.log(`Deleted ${fileName}`);
      return true;
    });
  }

  async listNames(): Promise<string[]> {
    this.requireDirectory();
    return this.vaultLock.runExclusive(() => this.readNames());
  }

  /**
   * Delete every credential file. The master-key file is left alone.
   *
   * @returns Number of files removed
   */
  async resetAll(): Promise<number> {
    this.requireDirectory();

    return this.vaultLock.runExclusive(() => {
      const names = this.readNames();
      for (const name of names) {
        try {
          fs.unlinkSync(this.pathFor(toFileName(name)));
        } catch (error) {
          throw this.ioFailure(`Failed to delete ${toFileName(name)}`, error);
        }
      }

      this.logger.log(`Removed ${names.length} credential file(s)`);
      return names.length;
    });
  }

  /**
   * Re-key every credential file from `oldKey` to `newKey` as one staged commit.
   *
   * 1. Every file is decrypted under `oldKey`. If any fails, nothing is written and
   *    the result lists the failures with `committed: false`.
   * 2. New envelopes go to temp files, which are then renamed over the originals.
   * 3. `commit` runs (the master-key rewrite).
   *
   * If step 2 or 3 throws, files already replaced are restored from their previous
   * contents, temp files are removed and the error propagates.
   */
  async reencryptAll(oldKey: string, newKey: string, commit?: () => void): Promise<ReencryptionResult> {
    this.requireDirectory();

    return this.vaultLock.runExclusive(() => {
      const names = this.readNames();
      const plaintexts = new Map<string, { previous: Buffer; json: string }>();
      const failed: string[] = [];

      for (const name of names) {
        const filePath = this.pathFor(toFileName(name));
        let previous: Buffer;
        try {
          previous = fs.readFileSync(filePath);
        } catch (error) {
          this.logger.warn(`Cannot read ${toFileName(name)}: ${getErrorMessage(error)}`);
          failed.push(name);
          continue;
        }

        const decrypted = this.cryptoService.decryptText(previous.toString('utf8'), oldKey);
        if (decrypted.ok) {
          plaintexts.set(name, { previous, json: decrypted.value });
        } else {
          failed.push(name);
        }
      }

      const succeeded = [...plaintexts.keys()];
      if (failed.length > 0) {
        this.logger.warn(`Re-encryption aborted, ${failed.length} file(s) did not decrypt: ${failed.join(', ')}`);
        return { succeeded, failed, committed: false };
      }

      const staged: StagedFile[] = [];
      const replaced: StagedFile[] = [];

      try {
        for (const [name, { previous, json }] of plaintexts) {
          const targetPath = this.pathFor(toFileName(name));
          const tempPath = this.tempPathFor(targetPath);
          fs.writeFileSync(tempPath, this.cryptoService.encryptText(json, newKey), { mode: 0o600 });
          staged.push({ name, targetPath, tempPath, previous });
        }

        for (const file of staged) {
          fs.renameSync(file.tempPath, file.targetPath);
          replaced.push(file);
        }

        commit?.();
      } catch (error) {
        this.rollback(staged, replaced);
        if (isOtpError(error)) {
          throw error;
        }
        throw this.ioFailure('Re-encryption failed and was rolled back', error);
      }

      this.logger.log(`Re-encrypted ${succeeded.length} credential file(s)`);
      return { succeeded, failed, committed: true };
    });
  }

  hasMasterKeyFile(): boolean {
    return fs.existsSync(this.masterKeyPath());
  }

  /**
   * @returns The master-key envelope text, or `null` when the file does not exist
   * @throws {OtpError} `IoFailure` when the file exists but cannot be read
   */
  readMasterKeyFile(): string | null {
    const filePath = this.masterKeyPath();
    if (!fs.existsSync(filePath)) {
      return null;
    }

    try {
      return fs.readFileSync(filePath, 'utf8').trim();
    } catch (error) {
      throw this.ioFailure('Failed to read the master-key file', error);
    }
  }

  writeMasterKeyFile(envelopeText: string): void {
    try {
      this.atomicWriteFile(this.masterKeyPath(), envelopeText);
    } catch (error) {
      throw this.ioFailure('Failed to write the master-key file', error);
    }
  }

  deleteMasterKeyFile(): void {
    const filePath = this.masterKeyPath();
    if (!fs.existsSync(filePath)) {
      return;
    }

    try {
      fs.unlinkSync(filePath);
    } catch (error) {
      throw this.ioFailure('Failed to delete the master-key file', error);
    }
  }

  private readCredential(filePath: string, key: string): Credential | null {
    const fileName = path.basename(filePath);
    if (!fs.existsSync(filePath)) {
      return null;
    }

    let text: string;
    try {
      text = fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      this.logger.warn(`Cannot read ${fileName}: ${getErrorMessage(error)}`);
      return null;
    }

    const bytes = decodeEnvelopeText(text);
    if (!bytes) {
      this.logger.warn(`${fileName} is not a base64 envelope`);
      return null;
    }

    const decrypted = this.cryptoService.decrypt(bytes, key);
    if (!decrypted.ok) {
      this.logger.warn(`${fileName} did not decrypt with the current key`);
      return null;
    }

    const parsed = parseCredentialRecord(decrypted.value.toString('utf8'));
    if (!parsed.ok) {
      this.logger.warn(`${fileName} holds an invalid credential: ${parsed.error.message}`);
      return null;
    }

    return parsed.value;
  }

  private readNames(): string[] {
    const directory = this.requireDirectory();
    let fileNames: string[];
    try {
      fileNames = fs
        .readdirSync(directory, { withFileTypes: true })
        .filter((entry) => entry.isFile() && isVaultFileName(entry.name))
        .map((entry) => entry.name);
    } catch (error) {
      throw this.ioFailure(`Cannot list vault directory ${directory}`, error);
    }

    return fileNames.map(fromFileName).sort();
  }

  private rollback(staged: StagedFile[], replaced: StagedFile[]): void {
    for (const file of replaced) {
      try {
        fs.writeFileSync(file.targetPath, file.previous, { mode: 0o600 });
      } catch (error) {
        this.logger.error(`Failed to restore ${path.basename(file.targetPath)}: ${getErrorMessage(error)}`);
      }
    }

    for (const file of staged) {
      if (fs.existsSync(file.tempPath)) {
        try {
          fs.unlinkSync(file.tempPath);
        } catch {
          this.logger.warn('Failed to clean up temporary vault file', { tempPath: file.tempPath });
        }
      }
    }

    this.logger.warn(`Rolled back ${replaced.length} replaced file(s)`);
  }

  private requireDirectory(): string {
    if (this.directory === undefined) {
      throw new OtpError('IoFailure', 'Vault storage is not open');
    }
    return this.directory;
  }

  private pathFor(fileName: string): string {
    return path.join(this.requireDirectory(), fileName);
  }

  private masterKeyPath(): string {
    return this.pathFor(MASTER_KEY_FILE_NAME);
  }

  private tempPathFor(targetPath: string): string {
    return `${targetPath}.tmp-${process.pid}-${Date.now()}-${Math.random().toString(16).slice(2)}`;
  }

  private ioFailure(message: string, error: unknown): OtpError {
    this.logger.error(`${message}: ${getErrorMessage(error)}`, error instanceof Error ? error.stack : undefined);
    return new OtpError('IoFailure', message, { cause: getErrorMessage(error) });
  }

  /**
   * Writes data to a temporary file and atomically renames it into place.
   */
  private atomicWriteFile(targetPath: string, data: string | NodeJS.ArrayBufferView): void {
    const tempPath = this.tempPathFor(targetPath);

    try {
      fs.writeFileSync(tempPath, data, { mode: 0o600 });
      fs.renameSync(tempPath, targetPath);
    } catch (error) {
      if (fs.existsSync(tempPath)) {
        try {
          fs.unlinkSync(tempPath);
        } catch {
          this.logger.warn('Failed to clean up temporary vault file', { tempPath });
        }
      }
      throw error;
    }
  }
}
