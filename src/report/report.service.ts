import { Injectable, Logger } from '@nestjs/common';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { AlarmSummary } from '../cloud-watch/cloud-watch.types';
import { countBy } from '../common/count-by';
import { HealthCheckError } from '../common/health-check.error';
import { InstanceSummary } from '../ec2/ec2.types';
import { renderJson, renderText } from './report.renderer';
import {
  CheckFailure,
  HealthReport,
  HealthStatus,
  HealthSummary,
} from './report.types';

type SummaryCounts = Omit<HealthSummary, 'status'>;

@Injectable()
export class ReportService {
  private readonly logger = new Logger(ReportService.name);

  summarize(
    instances: InstanceSummary[],
    alarms: AlarmSummary[],
    failures: CheckFailure[] = [],
  ): HealthSummary {
    const instancesByState = countBy(instances, (instance) => instance.state);
    const alarmsByState = countBy(alarms, (alarm) => alarm.state);

    const runningInstances = instancesByState.running ?? 0;
    const stoppedInstances = instancesByState.stopped ?? 0;

    const counts: SummaryCounts = {
      totalInstances: instances.length,
      runningInstances,
      stoppedInstances,
      otherInstances: instances.length - runningInstances - stoppedInstances,
      totalAlarms: alarms.length,
      okAlarms: alarmsByState.OK ?? 0,
      activeAlarms: alarmsByState.ALARM ?? 0,
      insufficientDataAlarms: alarmsByState.INSUFFICIENT_DATA ?? 0,
      instancesByState,
      alarmsByState,
    };

    return { ...counts, status: this.assess(counts, failures) };
  }

  // 전체 상태 판정: 알람 > 실패한 점검 > 리소스 없음 > 정상 > 일부 중지
  assess(counts: SummaryCounts, failures: CheckFailure[] = []): HealthStatus {
    if (counts.activeAlarms > 0) {
      return 'attention';
    }
    if (failures.length > 0) {
      return 'incomplete';
    }
    if (counts.totalInstances === 0 && counts.totalAlarms === 0) {
      return 'empty';
    }
    if (counts.runningInstances === counts.totalInstances) {
      return 'healthy';
    }
    return 'degraded';
  }

  renderText(report: HealthReport): string {
    return renderText(report);
  }

  renderJson(report: HealthReport): string {
    return renderJson(report);
  }

  async saveReport(filename: string, report: HealthReport): Promise<string> {
    const path = resolve(filename);
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, renderJson(report), 'utf8');
    } catch (error) {
      throw new HealthCheckError(`Unable to write report to ${path}`, {
        cause: error,
      });
    }
    this.logger.log(`Report written to ${path}`);
    return path;
  }
}
