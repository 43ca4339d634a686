import { Module } from '@nestjs/common';
import { CloudWatchModule } from '../cloud-watch/cloud-watch.module';
import { EC2Module } from '../ec2/ec2.module';
import { ReportModule } from '../report/report.module';
import { HealthCheckService } from './health-check.service';

@Module({
  imports: [EC2Module, CloudWatchModule, ReportModule],
  providers: [HealthCheckService],
  exports: [HealthCheckService, ReportModule],
})
export class HealthCheckModule {}
