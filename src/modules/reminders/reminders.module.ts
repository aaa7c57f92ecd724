import { Module } from '@nestjs/common';
import { AppConfigModule } from '../app/app-config.module';
import { RemindersService } from './reminders.service';

@Module({
  imports: [AppConfigModule],
  providers: [RemindersService],
  exports: [RemindersService],
})
export class RemindersModule {}
