import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { LoggerModule } from './common/logger';
import { SettingsModule } from './config/settings.module';
import { LifecycleModule } from './lifecycle/lifecycle.module';

/**
 * Everything a single invocation needs. The scheduler process adds
 * ScheduleModule on top of this, see scheduler.module.ts.
 */
@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, envFilePath: '.env' }),
    LoggerModule,
    SettingsModule,
    LifecycleModule,
  ],
})
export class AppModule {}
