import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomBytes } from 'crypto';
import { CryptoService } from '../crypto/crypto.service';
import {
  DEFAULT_MASTER_KEY_KDF,
  DEFAULT_VAULT_KEY_SOURCE,
  KeyDerivation,
  VaultKeySource,
} from '../config/config.constants';
import { PasswordStrengthService } from '../password/password-strength.service';
import { OtpError } from '../shared/otp-error';
import { VaultLock } from './storage/vault-lock';
import { ReencryptionResult, VaultStorageService } from './storage/vault-storage.service';

const MASTER_SECRET_BYTES = 32;

/**
 * The secrets held while a session is unlocked.
 */
export interface VaultSecrets {
  password: string;
  masterSecret: string;
}

/**
 * Bootstraps, verifies and rotates the master-key file.
 *
 * The master secret is 256 random bits stored as base64url text inside one envelope keyed
 * by the master password. Whether credential files are keyed by the password or by this
 * secret is decided by `otpv.vault.keySource`; see {@link vaultKeyFor}.
 */
@Injectable()
export class MasterKeyService {
  private readonly logger = new Logger(MasterKeyService.name);
  private readonly kdf: KeyDerivation;
  private readonly keySource: VaultKeySource;

  constructor(
    private readonly configService: ConfigService,
    private readonly cryptoService: CryptoService,
    private readonly storage: VaultStorageService,
    private readonly passwordStrength: PasswordStrengthService,
    private readonly vaultLock: VaultLock,
  ) {
    this.kdf = this.configService.get<KeyDerivation>('otpv.crypto.masterKeyKdf', DEFAULT_MASTER_KEY_KDF);
    this.keySource = this.configService.get<VaultKeySource>('otpv.vault.keySource', DEFAULT_VAULT_KEY_SOURCE);
  }

  isInitialized(): boolean {
    return this.storage.hasMasterKeyFile();
  }

  get vaultKeySource(): VaultKeySource {
    return this.keySource;
  }

  /**
   * First-run setup: gate the password, generate the master secret and write it.
   *
   * @returns The new master secret
   * @throws {OtpError} `AlreadyInitialized`, `WeakPassword`, `PasswordMismatch` or `IoFailure`
   */
  async initialize(password: string, confirmation?: string): Promise<string> {
    return this.vaultLock.runExclusive(() => {
      if (this.storage.hasMasterKeyFile()) {
        throw new OtpError('AlreadyInitialized', 'A master password is already set');
      }

      this.passwordStrength.assertAcceptable(password, confirmation);

      const masterSecret = randomBytes(MASTER_SECRET_BYTES).toString('base64url');
      this.storage.writeMasterKeyFile(this.cryptoService.encryptText(masterSecret, password, this.kdf));

      this.logger.log('Master key created');
      return masterSecret;
    });
  }

  /**
   * Decrypt the master-key file with a candidate password.
   *
   * @returns The master secret
   * @throws {OtpError} `NotInitialized`, `DecryptionFailure` or `IoFailure`
   */
  async unlock(password: string): Promise<string> {
    return this.vaultLock.runExclusive(() => this.readMasterSecret(password));
  }

  /**
   * The key credential files are encrypted under.
   */
  vaultKeyFor(secrets: VaultSecrets): string {
    return this.keySource === VaultKeySource.MASTER_SECRET ? secrets.masterSecret : secrets.password;
  }

  /**
   * Rotate the master password.
   *
   * The old password is verified first, then the new one is gated. With password-keyed
   * files every file is re-encrypted in one staged commit whose final step rewrites the
   * master-key file. With secret-keyed files only the master-key file changes.
   *
   * @throws {OtpError} `DecryptionFailure` for a wrong old password, `WeakPassword`,
   *   `PasswordMismatch`, or `PartialReencryptionFailure` when any file did not decrypt
   *   (in which case nothing was written)
   */
  async changePassword(oldPassword: string, newPassword: string, confirmation?: string): Promise<ReencryptionResult> {
    const masterSecret = await this.unlock(oldPassword);
    this.passwordStrength.assertAcceptable(newPassword, confirmation);

    const masterKeyText = this.cryptoService.encryptText(masterSecret, newPassword, this.kdf);

    if (this.keySource === VaultKeySource.MASTER_SECRET) {
      await this.vaultLock.runExclusive(() => this.storage.writeMasterKeyFile(masterKeyText));
      this.logger.log('Master password changed');
      return { succeeded: [], failed: [], committed: true };
    }

    const result = await this.storage.reencryptAll(oldPassword, newPassword, () =>
      this.storage.writeMasterKeyFile(masterKeyText),
    );

    if (!result.committed) {
      throw new OtpError(
        'PartialReencryptionFailure',
        `Password not changed: ${result.failed.length} credential file(s) could not be decrypted (${result.failed.join(', ')})`,
        { succeeded: result.succeeded, failed: result.failed },
      );
    }

    this.logger.log(`Master password changed, ${result.succeeded.length} credential file(s) re-encrypted`);
    return result;
  }

  /**
   * Delete every credential file and the master-key file.
   *
   * @returns Number of credential files removed
   */
  async reset(): Promise<number> {
    const removed = await this.storage.resetAll();
    await this.vaultLock.runExclusive(() => this.storage.deleteMasterKeyFile());

    this.logger.warn(`Vault reset, ${removed} credential file(s) and the master key removed`);
    return removed;
  }

  private readMasterSecret(password: string): string {
    const envelope = this.storage.readMasterKeyFile();
    if (envelope === null) {
      throw new OtpError('NotInitialized', 'No master password has been set');
    }

    const result = this.cryptoService.decryptText(envelope, password, this.kdf);
    if (!result.ok) {
      throw result.error;
    }
    return result.value;
  }
}
