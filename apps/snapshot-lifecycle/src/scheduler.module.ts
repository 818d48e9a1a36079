import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { AppModule } from './app.module';

@Module({
  imports: [ScheduleModule.forRoot(), AppModule],
})
export class SchedulerModule {}
