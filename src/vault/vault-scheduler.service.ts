import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import {
  DEFAULT_CODE_REFRESH_INTERVAL_MS,
  DEFAULT_IDLE_CHECK_INTERVAL_MS,
  DEFAULT_IMPORT_SCAN_INTERVAL_MS,
} from '../config/config.constants';
import { OTPAUTH_SCHEME } from '../otp/uri-codec';
import { SessionService } from '../session/session.service';
import { getErrorMessage } from '../shared/error.utils';
import { CLIPBOARD_SOURCE, ClipboardSource } from './interfaces/host-adapters.interface';
import { ImportScanStatus } from './interfaces/vault.interface';
import { VaultService } from './vault.service';

export const CODE_REFRESH_TASK = 'code-refresh';
export const IDLE_CHECK_TASK = 'idle-check';
export const IMPORT_SCAN_TASK = 'import-scan';

/**
 * Registers the three periodic vault tasks with the {@link SchedulerRegistry}.
 * Each tick is independent; a failing tick is logged and the interval keeps running.
 */
@Injectable()
export class VaultSchedulerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(VaultSchedulerService.name);
  private readonly codeRefreshIntervalMs: number;
  private readonly idleCheckIntervalMs: number;
  private readonly importScanIntervalMs: number;

  private lastClipboardText: string | undefined;
  private importStatus: ImportScanStatus;

  constructor(
    private readonly configService: ConfigService,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly vaultService: VaultService,
    private readonly sessionService: SessionService,
    @Inject(CLIPBOARD_SOURCE) private readonly clipboard: ClipboardSource | null,
  ) {
    this.codeRefreshIntervalMs = this.configService.get<number>(
      'otpv.scheduler.codeRefreshIntervalMs',
      DEFAULT_CODE_REFRESH_INTERVAL_MS,
    );
    this.idleCheckIntervalMs = this.configService.get<number>(
      'otpv.session.idleCheckIntervalMs',
      DEFAULT_IDLE_CHECK_INTERVAL_MS,
    );
    this.importScanIntervalMs = this.configService.get<number>(
      'otpv.scheduler.importScanIntervalMs',
      DEFAULT_IMPORT_SCAN_INTERVAL_MS,
    );
    this.importStatus = { enabled: this.clipboard !== null };
  }

  onModuleInit(): void {
    this.register(CODE_REFRESH_TASK, this.codeRefreshIntervalMs, () => this.refreshCodes());
    this.register(IDLE_CHECK_TASK, this.idleCheckIntervalMs, () => this.checkIdle());

    if (this.clipboard) {
      this.register(IMPORT_SCAN_TASK, this.importScanIntervalMs, () => this.scanClipboard());
    } else {
      this.logger.log('No clipboard source configured, import scan disabled');
    }
  }

  onModuleDestroy(): void {
    for (const name of [CODE_REFRESH_TASK, IDLE_CHECK_TASK, IMPORT_SCAN_TASK]) {
      if (this.schedulerRegistry.doesExist('interval', name)) {
        this.schedulerRegistry.deleteInterval(name);
      }
    }
  }

  async refreshCodes(nowMs: number = Date.now()): Promise<void> {
    await this.vaultService.refreshCodes(nowMs);
  }

  checkIdle(nowMs: number = Date.now()): void {
    if (this.sessionService.checkIdle(nowMs)) {
      this.logger.log('Vault locked after inactivity');
    }
  }

  /**
   * Import a new otpauth URI from the clipboard. The same text is only considered once,
   * and an existing credential is never overwritten.
   */
  async scanClipboard(nowMs: number = Date.now()): Promise<void> {
    if (!this.clipboard || !this.sessionService.isUnlocked()) {
      return;
    }

    const text = (await this.clipboard.readText())?.trim();
    this.importStatus = { ...this.importStatus, lastCheckedAt: new Date(nowMs).toISOString() };

    if (!text || text === this.lastClipboardText || !text.startsWith(OTPAUTH_SCHEME)) {
      return;
    }
    this.lastClipboardText = text;

    try {
      const summary = await this.vaultService.importUri(text, false);
      this.importStatus = { ...this.importStatus, lastImported: summary.name, lastError: undefined };
    } catch (error) {
      const message = getErrorMessage(error);
      this.logger.warn(`Clipboard import rejected: ${message}`);
      this.importStatus = { ...this.importStatus, lastError: message };
    }
  }

  getImportStatus(): ImportScanStatus {
    return { ...this.importStatus };
  }

  private register(name: string, intervalMs: number, task: () => void | Promise<void>): void {
    const interval = setInterval(() => {
      void this.runTick(name, task);
    }, intervalMs);
    interval.unref();

    this.schedulerRegistry.addInterval(name, interval);
    this.logger.log(`Scheduled ${name} every ${intervalMs}ms`);
  }

  private async runTick(name: string, task: () => void | Promise<void>): Promise<void> {
    try {
      await task();
    } catch (error) {
      this.logger.error(`Scheduled task ${name} failed: ${getErrorMessage(error)}`);
    }
  }
}
