import { SNSClient } from '@aws-sdk/client-sns';
import { Module } from '@nestjs/common';
import { ClockModule } from '../common/clock/clock.module';
import { LIFECYCLE_SETTINGS, LifecycleSettings } from '../config/lifecycle.settings';
import { SettingsModule } from '../config/settings.module';
import { ReportNotifier, SNS_CLIENT } from './report-notifier.service';

@Module({
  imports: [SettingsModule, ClockModule],
  providers: [
    {
      provide: SNS_CLIENT,
      inject: [LIFECYCLE_SETTINGS],
      useFactory: (settings: LifecycleSettings) => new SNSClient({ region: settings.region }),
    },
    ReportNotifier,
  ],
  exports: [ReportNotifier],
})
export class NotificationsModule {}
