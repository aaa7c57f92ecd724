import { Module } from '@nestjs/common';
import { AppConfigModule } from '../app/app-config.module';
import { HistoryStoreService } from './history-store.service';

@Module({
  imports: [AppConfigModule],
  providers: [HistoryStoreService],
  exports: [HistoryStoreService],
})
export class HistoryModule {}
