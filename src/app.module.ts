import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { ScheduleModule } from '@nestjs/schedule';
import { APP_FILTER, APP_GUARD } from '@nestjs/core';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import appConfig from './app.config';
import { DEFAULT_THROTTLE_LIMIT, DEFAULT_THROTTLE_TTL } from './config/config.constants';
import { HealthModule } from './health/health.module';
import { PasswordModule } from './password/password.module';
import { SessionModule } from './session/session.module';
import { OtpErrorFilter } from './shared/otp-error.filter';
import { VaultModule } from './vault/vault.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig],
    }),
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        throttlers: [
          {
            ttl: config.get<number>('otpv.throttle.ttl') ?? DEFAULT_THROTTLE_TTL,
            limit: config.get<number>('otpv.throttle.limit') ?? DEFAULT_THROTTLE_LIMIT,
          },
        ],
      }),
    }),
    EventEmitterModule.forRoot(),
    ScheduleModule.forRoot(),
    PasswordModule,
    SessionModule,
    // No QR codec or clipboard on a headless host; a desktop shell passes its adapters here
    VaultModule.forRoot(),
    HealthModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
    {
      provide: APP_FILTER,
      useClass: OtpErrorFilter,
    },
  ],
})
export class AppModule {}
