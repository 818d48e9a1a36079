import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LIFECYCLE_SETTINGS, loadLifecycleSettings } from './lifecycle.settings';

@Module({
  providers: [
    {
      provide: LIFECYCLE_SETTINGS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => loadLifecycleSettings(configService),
    },
  ],
  exports: [LIFECYCLE_SETTINGS],
})
export class SettingsModule {}
