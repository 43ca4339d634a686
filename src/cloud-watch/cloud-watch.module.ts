import { Module } from '@nestjs/common';
import { CloudWatchService } from './cloud-watch.service';

@Module({
  providers: [CloudWatchService],
  exports: [CloudWatchService],
})
export class CloudWatchModule {}
