import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { envSchema, validateEnv } from './env';
import { AppConfigModule } from './app-config.module';
import { AppConfigService } from './app-config.service';
import { DailyContentModule } from '../daily-content/daily-content.module';
import { HealthModule } from '../health/health.module';
import { MetaModule } from '../meta/meta.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv(envSchema),
    }),
    AppConfigModule,
    ThrottlerModule.forRootAsync({
      imports: [AppConfigModule],
      inject: [AppConfigService],
      useFactory: (cfg: AppConfigService) => [
        {
          // Throttler v6 takes milliseconds.
          ttl: cfg.rateLimitTtlSeconds() * 1000,
          limit: cfg.rateLimitLimit(),
        },
      ],
    }),
    HealthModule,
    MetaModule,
    DailyContentModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}
