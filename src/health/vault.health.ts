import { Injectable } from '@nestjs/common';
import { HealthIndicatorService } from '@nestjs/terminus';
import * as fs from 'fs';
import { SessionState } from '../session/interfaces';
import { SessionService } from '../session/session.service';
import { MasterKeyService } from '../vault/master-key.service';
import { VaultStorageService } from '../vault/storage/vault-storage.service';

/**
 * Health indicator for the vault directory and the session.
 */
@Injectable()
export class VaultHealthIndicator {
  constructor(
    private readonly storage: VaultStorageService,
    private readonly masterKey: MasterKeyService,
    private readonly sessionService: SessionService,
    private readonly healthIndicatorService: HealthIndicatorService,
  ) {}

  /**
   * Up while the vault directory is writable and the session has not been terminated.
   * @param key The key to use for the health indicator result.
   */
  isHealthy(key: string) {
    const indicator = this.healthIndicatorService.check(key);
    const session = this.sessionService.currentState;

    if (!this.storage.isOpen()) {
      return Promise.resolve(indicator.down({ open: false, session }));
    }

    const details = {
      open: true,
      writable: this.isWritable(this.storage.vaultPath),
      initialized: this.masterKey.isInitialized(),
      session,
    };

    if (details.writable && session !== SessionState.TERMINATED) {
      return Promise.resolve(indicator.up(details));
    }

    return Promise.resolve(indicator.down(details));
  }

  private isWritable(directory: string): boolean {
    try {
      fs.accessSync(directory, fs.constants.W_OK);
      return true;
    } catch {
      return false;
    }
  }
}
