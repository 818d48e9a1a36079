import { EC2Client } from '@aws-sdk/client-ec2';
import { Module } from '@nestjs/common';
import { LIFECYCLE_SETTINGS, LifecycleSettings } from '../config/lifecycle.settings';
import { SettingsModule } from '../config/settings.module';
import { BLOCK_STORAGE_PROVIDER } from './block-storage.provider';
import { EC2_CLIENT, Ec2SnapshotProvider } from './ec2-snapshot.provider';

@Module({
  imports: [SettingsModule],
  providers: [
    {
      provide: EC2_CLIENT,
      inject: [LIFECYCLE_SETTINGS],
      useFactory: (settings: LifecycleSettings) => new EC2Client({ region: settings.region }),
    },
    Ec2SnapshotProvider,
    { provide: BLOCK_STORAGE_PROVIDER, useExisting: Ec2SnapshotProvider },
  ],
  exports: [BLOCK_STORAGE_PROVIDER],
})
export class SnapshotsModule {}
