import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CloudWatchService } from '../cloud-watch/cloud-watch.service';
import { describeAwsError, formatAwsError } from '../common/aws-errors';
import { HealthCheckConfig } from '../config/configuration';
import { EC2Service } from '../ec2/ec2.service';
import { ReportService } from '../report/report.service';
import { CheckFailure, CheckName, HealthReport } from '../report/report.types';

interface CheckResult<T> {
  items: T[];
  failure?: CheckFailure;
}

@Injectable()
export class HealthCheckService {
  private readonly logger = new Logger(HealthCheckService.name);

  constructor(
    private readonly configService: ConfigService<HealthCheckConfig, true>,
    private readonly ec2Service: EC2Service,
    private readonly cloudWatchService: CloudWatchService,
    private readonly reportService: ReportService,
  ) {}

  get region(): string {
    return this.configService.get('region', { infer: true });
  }

  async run(generatedAt: Date = new Date()): Promise<HealthReport> {
    this.logger.log(`Checking region ${this.region}`);

    const [instances, alarms] = await Promise.all([
      this.check('ec2', () => this.ec2Service.listInstances()),
      this.check('cloudwatch', () => this.cloudWatchService.listAlarms()),
    ]);

    const errors = [instances.failure, alarms.failure].filter(
      (failure): failure is CheckFailure => failure !== undefined,
    );

    return {
      generatedAt,
      region: this.region,
      instances: instances.items,
      alarms: alarms.items,
      summary: this.reportService.summarize(
        instances.items,
        alarms.items,
        errors,
      ),
      errors,
    };
  }

  // 점검 하나가 실패해도 나머지 보고서는 계속 만든다
  private async check<T>(
    check: CheckName,
    fetch: () => Promise<T[]>,
  ): Promise<CheckResult<T>> {
    try {
      return { items: await fetch() };
    } catch (error) {
      const description = describeAwsError(error);
      this.logger.error(
        `${check} check failed: ${formatAwsError(description)}`,
      );
      return {
        items: [],
        failure: {
          check,
          message: description.message,
          ...(description.hint && { hint: description.hint }),
        },
      };
    }
  }
}
