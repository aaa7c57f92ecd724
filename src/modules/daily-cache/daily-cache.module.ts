import { Module } from '@nestjs/common';
import { AppConfigModule } from '../app/app-config.module';
import { DailyCacheService } from './daily-cache.service';

@Module({
  imports: [AppConfigModule],
  providers: [DailyCacheService],
  exports: [DailyCacheService],
})
export class DailyCacheModule {}
