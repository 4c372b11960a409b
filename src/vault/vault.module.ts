import { DynamicModule, Module } from '@nestjs/common';
import { CryptoModule } from '../crypto/crypto.module';
import { OtpModule } from '../otp/otp.module';
import { SessionModule } from '../session/session.module';
import { CLIPBOARD_SOURCE, QR_CODEC, VaultModuleOptions } from './interfaces/host-adapters.interface';
import { VaultStorageModule } from './storage/vault-storage.module';
import { VaultController } from './vault.controller';
import { VaultSchedulerService } from './vault-scheduler.service';
import { VaultService } from './vault.service';

/**
 * Credential operations, the periodic tasks and the HTTP API.
 *
 * Hosts that can render or read QR images, or watch a clipboard, pass adapters in
 * `forRoot()`; without them QR endpoints answer 501 and the import scan stays off.
 */
@Module({})
export class VaultModule {
  static forRoot(options: VaultModuleOptions = {}): DynamicModule {
    return {
      module: VaultModule,
      imports: [CryptoModule, OtpModule, VaultStorageModule, SessionModule],
      controllers: [VaultController],
      providers: [
        VaultService,
        VaultSchedulerService,
        { provide: QR_CODEC, useValue: options.qrCodec ?? null },
        { provide: CLIPBOARD_SOURCE, useValue: options.clipboardSource ?? null },
      ],
      exports: [VaultService],
    };
  }
}
