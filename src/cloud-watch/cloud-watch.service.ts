import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
} from '@nestjs/common';
import {
  CloudWatchClient,
  MetricAlarm,
  paginateDescribeAlarms,
} from '@aws-sdk/client-cloudwatch';
import { CLOUDWATCH_CLIENT } from '../aws/aws.constants';
import { AlarmState, AlarmSummary } from './cloud-watch.types';

export const NO_DESCRIPTION = 'No description';
export const METRIC_MATH = '(metric math)';

@Injectable()
export class CloudWatchService implements OnModuleDestroy {
  private readonly logger = new Logger(CloudWatchService.name);

  constructor(
    @Inject(CLOUDWATCH_CLIENT)
    private readonly cloudwatchClient: CloudWatchClient,
  ) {}

  // 리전의 모든 메트릭 알람 상태 조회
  async listAlarms(): Promise<AlarmSummary[]> {
    const paginator = paginateDescribeAlarms(
      { client: this.cloudwatchClient },
      { AlarmTypes: ['MetricAlarm'] },
    );

    const alarms: AlarmSummary[] = [];
    for await (const page of paginator) {
      for (const alarm of page.MetricAlarms ?? []) {
        alarms.push(this.mapAlarm(alarm));
      }
    }

    this.logger.debug(`Fetched ${alarms.length} metric alarms`);
    return alarms;
  }

  onModuleDestroy(): void {
    this.cloudwatchClient.destroy();
  }

  private mapAlarm(alarm: MetricAlarm): AlarmSummary {
    return {
      name: alarm.AlarmName ?? '',
      state: toAlarmState(alarm.StateValue),
      // Metrics 배열만 있는 알람은 수식 기반 알람
      metric:
        alarm.MetricName ?? (alarm.Metrics?.length ? METRIC_MATH : 'unknown'),
      description: alarm.AlarmDescription || NO_DESCRIPTION,
    };
  }
}

export function toAlarmState(value: string | undefined): AlarmState {
  switch (value) {
    case 'OK':
    case 'ALARM':
    case 'INSUFFICIENT_DATA':
      return value;
    default:
      return 'UNKNOWN';
  }
}
