import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { VaultHealthIndicator } from './vault.health';
import { SessionModule } from '../session/session.module';
import { VaultStorageModule } from '../vault/storage/vault-storage.module';

/**
 * The HealthModule provides health check endpoints for the application.
 */
@Module({
  imports: [TerminusModule, SessionModule, VaultStorageModule],
  controllers: [HealthController],
  providers: [VaultHealthIndicator],
})
export class HealthModule {}
