import { Module } from '@nestjs/common';
import { AppConfigModule } from '../app/app-config.module';
import { AppTokenGuard } from '../auth/app-token.guard';
import { DailyCacheModule } from '../daily-cache/daily-cache.module';
import { HistoryModule } from '../history/history.module';
import { ProvidersModule } from '../providers/providers.module';
import { RemindersModule } from '../reminders/reminders.module';
import { ContentGeneratorService } from './content-generator.service';
import { DailyContentController } from './daily-content.controller';
import { DailyContentService } from './daily-content.service';

@Module({
  imports: [AppConfigModule, DailyCacheModule, HistoryModule, ProvidersModule, RemindersModule],
  controllers: [DailyContentController],
  providers: [DailyContentService, ContentGeneratorService, AppTokenGuard],
  exports: [DailyContentService],
})
export class DailyContentModule {}
