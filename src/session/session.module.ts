import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { VaultStorageModule } from '../vault/storage/vault-storage.module';
import { ActivityMiddleware, POLLING_ROUTES } from './activity.middleware';
import { SessionController } from './session.controller';
import { SessionService } from './session.service';
import { SessionTerminationListener } from './session-termination.listener';
import { UnlockedGuard } from './unlocked.guard';

@Module({
  imports: [VaultStorageModule],
  controllers: [SessionController],
  providers: [SessionService, SessionTerminationListener, UnlockedGuard],
  exports: [SessionService, UnlockedGuard],
})
export class SessionModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer
      .apply(ActivityMiddleware)
      .exclude(...POLLING_ROUTES)
      .forRoutes('api/{*path}');
  }
}
