import { Module } from '@nestjs/common';
import { CryptoModule } from '../../crypto/crypto.module';
import { PasswordModule } from '../../password/password.module';
import { MasterKeyService } from '../master-key.service';
import { VaultLock } from './vault-lock';
import { VaultStorageService } from './vault-storage.service';

/**
 * Vault directory access and the master-key file, shared by the session and vault modules.
 * One {@link VaultLock} instance serializes every caller.
 */
@Module({
  imports: [CryptoModule, PasswordModule],
  providers: [VaultLock, VaultStorageService, MasterKeyService],
  exports: [VaultLock, VaultStorageService, MasterKeyService],
})
export class VaultStorageModule {}
