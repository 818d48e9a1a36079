import { Module } from '@nestjs/common';
import { ClockModule } from '../common/clock/clock.module';
import { SettingsModule } from '../config/settings.module';
import { NotificationsModule } from '../notifications/notifications.module';
import { SnapshotsModule } from '../snapshots/snapshots.module';
import { SnapshotLifecycleService } from './snapshot-lifecycle.service';

@Module({
  imports: [SettingsModule, ClockModule, SnapshotsModule, NotificationsModule],
  providers: [SnapshotLifecycleService],
  exports: [SnapshotLifecycleService],
})
export class LifecycleModule {}
