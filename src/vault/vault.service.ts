import { Inject, Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { CryptoService } from '../crypto/crypto.service';
import { encodeEnvelopeText, readEnvelopeData } from '../crypto/serialization';
import { CodeGeneratorService } from '../otp/code-generator.service';
import { Credential, GeneratedCode, HashAlgorithm } from '../otp/interfaces/credential.interface';
import { buildOtpauthUri, parseOtpauthUri } from '../otp/uri-codec';
import { SESSION_EVENTS } from '../session/interfaces';
import { SessionService } from '../session/session.service';
import { OtpError } from '../shared/otp-error';
import { QR_CODEC, QrCodec } from './interfaces/host-adapters.interface';
import { CodeSnapshot, CredentialSummary, QrExport } from './interfaces/vault.interface';
import { VaultLock } from './storage/vault-lock';
import { sanitizeName } from './storage/vault-names';
import { VaultStorageService } from './storage/vault-storage.service';

/** Default for the secret generator; matches what authenticator apps assume. */
export const GENERATOR_DEFAULT_ALGORITHM: HashAlgorithm = 'SHA1';

const MIN_SECRET_BYTES = 10;
const MAX_SECRET_BYTES = 64;

export interface ComputeCodeOptions {
  algorithm?: HashAlgorithm;
  digits?: number;
  period?: number;
}

@Injectable()
export class VaultService {
  private readonly logger = new Logger(VaultService.name);
  private snapshot: CodeSnapshot | undefined;

  constructor(
    private readonly sessionService: SessionService,
    private readonly storage: VaultStorageService,
    private readonly vaultLock: VaultLock,
    private readonly cryptoService: CryptoService,
    private readonly codeGenerator: CodeGeneratorService,
    @Inject(QR_CODEC) private readonly qrCodec: QrCodec | null,
  ) {}

  /**
   * Every credential of the unlocked session with its current code, sorted by name.
   */
  listCredentials(nowMs: number = Date.now()): CredentialSummary[] {
    const credentials = this.sessionService.getCredentials();

    return [...credentials.keys()]
      .sort()
      .flatMap((name) => {
        const credential = credentials.get(name);
        return credential ? [this.summarize(name, credential, nowMs)] : [];
      });
  }

  /**
   * @throws {OtpError} `CredentialNotFound`
   */
  getCredential(name: string, nowMs: number = Date.now()): CredentialSummary {
    return this.summarize(name, this.requireCredential(name), nowMs);
  }

  getUri(name: string): string {
    return buildOtpauthUri(this.requireCredential(name));
  }

  /**
   * Parse, validate and store an otpauth URI under the sanitized label.
   *
   * @param overwrite - Replace an existing credential of the same name
   * @throws {OtpError} The parse error, or `CredentialExists` when the name is taken
   */
  async importUri(uri: string, overwrite = false): Promise<CredentialSummary> {
    const key = this.sessionService.vaultKey();

    const parsed = parseOtpauthUri(uri.trim());
    if (!parsed.ok) {
      throw parsed.error;
    }

    const credential = parsed.value;
    const name = sanitizeName(credential.label);

    if (!overwrite && (this.sessionService.getCredential(name) || (await this.storage.exists(name)))) {
      throw new OtpError('CredentialExists', `A credential named "${name}" already exists`, { name });
    }

    const savedName = await this.storage.save(name, credential, key);
    this.sessionService.cacheCredential(savedName, credential);
    this.snapshot = undefined;
    this.logger.log(`Imported credential ${savedName}${overwrite ? ' (overwrite allowed)' : ''}`);

    return this.summarize(savedName, credential, Date.now());
  }

  /**
   * @throws {OtpError} `CredentialNotFound`
   */
  async deleteCredential(name: string): Promise<void> {
    this.sessionService.requireUnlocked();

    // Files are named after the sanitized name, so the cache key must be too
    const storedName = sanitizeName(name);
    const removed = await this.storage.delete(storedName);
    if (!removed) {
      throw new OtpError('CredentialNotFound', `Credential "${name}" not found`, { name });
    }

    this.sessionService.uncacheCredential(storedName);
    this.snapshot = undefined;
    this.logger.log(`Deleted credential ${storedName}`);
  }

  /**
   * Render the credential's URI as a QR image and encrypt it under the master password.
   *
   * @throws {OtpError} `QrUnavailable` without a codec, `CredentialNotFound`
   */
  async exportQr(name: string): Promise<QrExport> {
    const codec = this.requireQrCodec();
    const { password } = this.sessionService.requireUnlocked();
    const uri = this.getUri(name);

    const image = await codec.imageFromText(uri);
    const data = encodeEnvelopeText(this.cryptoService.encrypt(image, password));

    this.logger.log(`Exported encrypted QR code for ${name}`);
    return { name, data };
  }

  /**
   * Import from an uploaded file: a plain QR image, or an encrypted one as written by
   * {@link exportQr} (base64 text or raw envelope bytes).
   *
   * @param fileData - The file contents
   * @throws {OtpError} `QrUnavailable`, `InvalidUri` when no otpauth URI is found, or any import error
   */
  async importQr(fileData: Buffer, overwrite = false): Promise<CredentialSummary> {
    const codec = this.requireQrCodec();
    const { password } = this.sessionService.requireUnlocked();

    const decrypted = this.cryptoService.decrypt(readEnvelopeData(fileData), password);
    const image = decrypted.ok ? decrypted.value : fileData;

    const text = await codec.textFromImage(image);
    if (!text) {
      throw new OtpError('InvalidUri', 'No QR code found in the image');
    }

    return this.importUri(text, overwrite);
  }

  /**
   * @throws {OtpError} `CodeGenerationError` for a length outside 10 to 64 bytes
   */
  generateSecret(bytes?: number): string {
    if (bytes !== undefined && (bytes < MIN_SECRET_BYTES || bytes > MAX_SECRET_BYTES)) {
      throw new OtpError(
        'CodeGenerationError',
        `Secret length must be between ${MIN_SECRET_BYTES} and ${MAX_SECRET_BYTES} bytes`,
      );
    }
    return this.codeGenerator.generateSecret(bytes);
  }

  /**
   * Time-based code for a bare secret, as the secret generator previews it.
   */
  computeCode(secret: string, options: ComputeCodeOptions = {}, nowMs: number = Date.now()): GeneratedCode {
    const { algorithm = GENERATOR_DEFAULT_ALGORITHM, digits = 6, period = 30 } = options;
    return this.codeGenerator.generateTotp(secret, nowMs, algorithm, digits, period);
  }

  /**
   * Recompute every code. Runs under the vault lock so it never observes a half-finished write.
   *
   * @returns The new snapshot, or undefined while the session is not unlocked
   */
  async refreshCodes(nowMs: number = Date.now()): Promise<CodeSnapshot | undefined> {
    return this.vaultLock.runExclusive(() => {
      if (!this.sessionService.isUnlocked()) {
        this.snapshot = undefined;
        return undefined;
      }

      this.snapshot = { generatedAt: new Date(nowMs).toISOString(), entries: this.listCredentials(nowMs) };
      return this.snapshot;
    });
  }

  /**
   * The last refreshed snapshot, computed on demand when the refresh task has not run yet.
   */
  getSnapshot(nowMs: number = Date.now()): CodeSnapshot {
    this.sessionService.requireUnlocked();

    return this.snapshot ?? { generatedAt: new Date(nowMs).toISOString(), entries: this.listCredentials(nowMs) };
  }

  /**
   * Delete every credential and the master key. Allowed while locked.
   */
  async reset(): Promise<number> {
    const removed = await this.sessionService.reset();
    this.snapshot = undefined;
    return removed;
  }

  @OnEvent(SESSION_EVENTS.LOCKED)
  handleSessionLocked(): void {
    this.snapshot = undefined;
  }

  private requireCredential(name: string): Credential {
    const credential = this.sessionService.getCredential(name);
    if (!credential) {
      throw new OtpError('CredentialNotFound', `Credential "${name}" not found`, { name });
    }
    return credential;
  }

  private requireQrCodec(): QrCodec {
    if (!this.qrCodec) {
      throw new OtpError('QrUnavailable', 'No QR codec is configured');
    }
    return this.qrCodec;
  }

  private summarize(name: string, credential: Credential, nowMs: number): CredentialSummary {
    const { code, remainingSeconds } = this.codeGenerator.generateForDisplay(credential, nowMs);
    const base = {
      name,
      kind: credential.kind,
      label: credential.label,
      issuer: credential.issuer,
      algorithm: credential.algorithm,
      digits: credential.digits,
      code,
    };

    return credential.kind === 'totp'
      ? { ...base, period: credential.period, remainingSeconds }
      : { ...base, counter: credential.counter };
  }
}
