import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { DEFAULT_IDLE_TIMEOUT_SECS } from '../config/config.constants';
import { Credential } from '../otp/interfaces/credential.interface';
import { OtpError, isOtpError } from '../shared/otp-error';
import { getErrorMessage } from '../shared/error.utils';
import { MasterKeyService, VaultSecrets } from '../vault/master-key.service';
import { ReencryptionResult, VaultStorageService } from '../vault/storage/vault-storage.service';
import {
  LockReason,
  SESSION_EVENTS,
  SessionLockedEvent,
  SessionState,
  SessionStatus,
  SessionTerminatedEvent,
  SessionUnlockedEvent,
} from './interfaces';

/**
 * Holds the unlocked vault: master password, master secret and the decrypted credential cache.
 *
 * Everything held here is dropped on lock. An unlock that fails with `DecryptionFailure`
 * or `IoFailure` ends the session for good when `otpv.session.terminateOnAuthFailure` is set;
 * otherwise the session stays locked.
 */
@Injectable()
export class SessionService implements OnModuleInit {
  private readonly logger = new Logger(SessionService.name);
  private readonly idleTimeoutSecs: number;
  private readonly terminateOnAuthFailure: boolean;

  private state = SessionState.UNINITIALIZED;
  private secrets: VaultSecrets | undefined;
  private credentials = new Map<string, Credential>();
  private failedFiles: string[] = [];
  private lastActivity = Date.now();

  constructor(
    private readonly configService: ConfigService,
    private readonly storage: VaultStorageService,
    private readonly masterKey: MasterKeyService,
    private readonly eventEmitter: EventEmitter2,
  ) {
    this.idleTimeoutSecs = this.configService.get<number>('otpv.session.idleTimeoutSecs', DEFAULT_IDLE_TIMEOUT_SECS);
    this.terminateOnAuthFailure = this.configService.get<boolean>('otpv.session.terminateOnAuthFailure', true);
  }

  onModuleInit(): void {
    if (!this.storage.isOpen()) {
      this.storage.open();
    }

    this.state = this.masterKey.isInitialized() ? SessionState.LOCKED : SessionState.UNINITIALIZED;
    this.logger.log(`Session ready (${this.state})`);
  }

  get currentState(): SessionState {
    return this.state;
  }

  isUnlocked(): boolean {
    return this.state === SessionState.UNLOCKED;
  }

  /**
   * First run: set the master password and open an empty session.
   */
  async setup(password: string, confirmation?: string): Promise<SessionStatus> {
    this.assertNotTerminated();

    const masterSecret = await this.masterKey.initialize(password, confirmation);
    await this.open({ password, masterSecret });
    return this.getStatus();
  }

  /**
   * Authenticate, or re-authenticate after an idle lock.
   *
   * @throws {OtpError} `NotInitialized` before setup, `DecryptionFailure` for a wrong password
   */
  async unlock(password: string): Promise<SessionStatus> {
    this.assertNotTerminated();

    if (this.state === SessionState.UNINITIALIZED) {
      throw new OtpError('NotInitialized', 'No master password has been set');
    }

    let masterSecret: string;
    try {
      masterSecret = await this.masterKey.unlock(password);
    } catch (error) {
      this.handleAuthFailure(error);
      throw error;
    }

    await this.open({ password, masterSecret });
    return this.getStatus();
  }

  /**
   * Drop every secret held in memory.
   *
   * @returns Whether the session was unlocked
   */
  lock(reason: LockReason = 'manual'): boolean {
    if (this.state !== SessionState.UNLOCKED) {
      return false;
    }

    this.clear();
    this.state = SessionState.LOCKED;
    this.logger.log(`Session locked (${reason})`);

    const event: SessionLockedEvent = { reason, lockedAt: new Date() };
    this.eventEmitter.emit(SESSION_EVENTS.LOCKED, event);
    return true;
  }

  /**
   * Record user activity.
   */
  touch(now: number = Date.now()): void {
    this.lastActivity = now;
  }

  /**
   * Lock once the idle timeout has elapsed since the last {@link touch}.
   *
   * @returns Whether the session was locked by this call
   */
  checkIdle(now: number = Date.now()): boolean {
    if (this.state !== SessionState.UNLOCKED) {
      return false;
    }

    if (now - this.lastActivity < this.idleTimeoutSecs * 1000) {
      return false;
    }

    return this.lock('idle');
  }

  /**
   * @returns The secrets of the unlocked session
   * @throws {OtpError} `SessionLocked` or `NotInitialized`
   */
  requireUnlocked(): VaultSecrets {
    if (this.state === SessionState.UNLOCKED && this.secrets) {
      return this.secrets;
    }

    if (this.state === SessionState.UNINITIALIZED) {
      throw new OtpError('NotInitialized', 'No master password has been set');
    }
    if (this.state === SessionState.TERMINATED) {
      throw new OtpError('SessionLocked', 'Session has been terminated');
    }
    throw new OtpError('SessionLocked', 'Session is locked');
  }

  /**
   * Key the credential files of this session are encrypted under.
   */
  vaultKey(): string {
    return this.masterKey.vaultKeyFor(this.requireUnlocked());
  }

  getCredentials(): ReadonlyMap<string, Credential> {
    this.requireUnlocked();
    return this.credentials;
  }

  getCredential(name: string): Credential | undefined {
    return this.getCredentials().get(name);
  }

  cacheCredential(name: string, credential: Credential): void {
    this.requireUnlocked();
    this.credentials.set(name, credential);
  }

  uncacheCredential(name: string): void {
    this.requireUnlocked();
    this.credentials.delete(name);
  }

  /**
   * Rotate the master password. A failure leaves the session unlocked under the old password.
   */
  async changePassword(oldPassword: string, newPassword: string, confirmation?: string): Promise<ReencryptionResult> {
    const secrets = this.requireUnlocked();

    const result = await this.masterKey.changePassword(oldPassword, newPassword, confirmation);
    // A lock while the files were rewritten has already dropped the secrets
    if (this.state === SessionState.UNLOCKED) {
      this.secrets = { ...secrets, password: newPassword };
    }
    return result;
  }

  /**
   * Delete the whole vault and return to the first-run state.
   *
   * @returns Number of credential files removed
   */
  async reset(): Promise<number> {
    this.assertNotTerminated();

    const removed = await this.masterKey.reset();
    const wasUnlocked = this.state === SessionState.UNLOCKED;

    this.clear();
    this.state = SessionState.UNINITIALIZED;

    if (wasUnlocked) {
      const event: SessionLockedEvent = { reason: 'reset', lockedAt: new Date() };
      this.eventEmitter.emit(SESSION_EVENTS.LOCKED, event);
    }
    return removed;
  }

  /**
   * End the session permanently. Listeners of `session.terminated` shut the process down.
   */
  terminate(error: OtpError): void {
    this.clear();
    this.state = SessionState.TERMINATED;
    this.logger.error(`Session terminated: ${error.message}`);

    const event: SessionTerminatedEvent = { code: error.code, reason: error.message, terminatedAt: new Date() };
    this.eventEmitter.emit(SESSION_EVENTS.TERMINATED, event);
  }

  getStatus(): SessionStatus {
    return {
      state: this.state,
      credentialCount: this.credentials.size,
      failedFiles: [...this.failedFiles],
      keySource: this.masterKey.vaultKeySource,
      idleTimeoutSecs: this.idleTimeoutSecs,
    };
  }

  private async open(secrets: VaultSecrets): Promise<void> {
    const { credentials, failed } = await this.storage.loadAll(this.masterKey.vaultKeyFor(secrets));

    this.secrets = secrets;
    this.credentials = credentials;
    this.failedFiles = failed;
    this.state = SessionState.UNLOCKED;
    this.touch();

    this.logger.log(`Session unlocked, ${credentials.size} credential(s) loaded`);

    const event: SessionUnlockedEvent = {
      credentialCount: credentials.size,
      failedFiles: [...failed],
      unlockedAt: new Date(),
    };
    this.eventEmitter.emit(SESSION_EVENTS.UNLOCKED, event);
  }

  private handleAuthFailure(error: unknown): void {
    if (!isOtpError(error, 'DecryptionFailure') && !isOtpError(error, 'IoFailure')) {
      return;
    }

    if (this.terminateOnAuthFailure) {
      this.terminate(error);
      return;
    }

    const wasUnlocked = this.lock('manual');
    this.logger.warn(`Authentication failed${wasUnlocked ? ', session locked' : ''}: ${getErrorMessage(error)}`);
  }

  private assertNotTerminated(): void {
    if (this.state === SessionState.TERMINATED) {
      throw new OtpError('SessionLocked', 'Session has been terminated');
    }
  }

  private clear(): void {
    this.secrets = undefined;
    this.credentials = new Map();
    this.failedFiles = [];
  }
}
