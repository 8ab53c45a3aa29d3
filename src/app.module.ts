import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import appConfig from './app.config';
import { DEFAULT_THROTTLE_LIMIT, DEFAULT_THROTTLE_TTL } from './config/config.constants';
import { HealthModule } from './health/health.module';
import { MetricsModule } from './metrics/metrics.module';
import { CryptoModule } from './crypto/crypto.module';
import { VaultModule } from './vault/vault.module';
import { ProfileModule } from './profile/profile.module';
import { StatusModule } from './status/status.module';
import { IssuerModule } from './issuer/issuer.module';

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
            ttl: config.get<number>('vcs.throttle.ttl') ?? DEFAULT_THROTTLE_TTL,
            limit: config.get<number>('vcs.throttle.limit') ?? DEFAULT_THROTTLE_LIMIT,
          },
        ],
      }),
    }),
    MetricsModule,
    HealthModule,
    CryptoModule,
    VaultModule,
    ProfileModule,
    StatusModule,
    IssuerModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}
