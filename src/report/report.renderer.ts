import { AlarmSummary } from '../cloud-watch/cloud-watch.types';
import { InstanceSummary } from '../ec2/ec2.types';
import {
  CheckFailure,
  CheckName,
  HealthReport,
  HealthReportDocument,
  HealthStatus,
  HealthSummary,
} from './report.types';

export const TOOL_NAME = 'AWS Health Checker';

const RULE = '='.repeat(50);

const INSTANCE_ICONS: Record<string, string> = {
  running: '✅',
  stopped: '🛑',
  pending: '⏳',
  stopping: '⏳',
  terminated: '💀',
};

const ALARM_ICONS: Record<string, string> = {
  OK: '✅',
  ALARM: '🚨',
  INSUFFICIENT_DATA: '⚠️',
};

const VERDICTS: Record<HealthStatus, string> = {
  attention: '⚠️  ATTENTION: There are active alarms that need investigation!',
  incomplete: '❌ INCOMPLETE: Some checks failed, results may be partial',
  empty: 'ℹ️  No resources found to monitor',
  healthy: '✅ ALL SYSTEMS HEALTHY',
  degraded: '⚠️  Some instances are not running',
};

export function instanceIcon(state: string): string {
  return INSTANCE_ICONS[state] ?? '⚠️';
}

export function alarmIcon(state: string): string {
  return ALARM_ICONS[state] ?? '❓';
}

export function verdictFor(status: HealthStatus): string {
  return VERDICTS[status];
}

/**
 * Local wall-clock time as `YYYY-MM-DD HH:MM:SS`.
 */
export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  const day = [
    date.getFullYear(),
    pad(date.getMonth() + 1),
    pad(date.getDate()),
  ].join('-');
  const time = [
    pad(date.getHours()),
    pad(date.getMinutes()),
    pad(date.getSeconds()),
  ].join(':');
  return `${day} ${time}`;
}

function sectionHeader(title: string): string[] {
  return ['', RULE, title, RULE];
}

function failureLines(failure: CheckFailure): string[] {
  const lines = [`❌ Error: ${failure.message}`];
  if (failure.hint) {
    lines.push(`   ${failure.hint}`);
  }
  return lines;
}

function findFailure(
  errors: CheckFailure[],
  check: CheckName,
): CheckFailure | undefined {
  return errors.find((failure) => failure.check === check);
}

function instanceLines(
  instances: InstanceSummary[],
  failure: CheckFailure | undefined,
): string[] {
  if (failure) {
    return failureLines(failure);
  }
  if (instances.length === 0) {
    return ['ℹ️  No EC2 instances found in this region.'];
  }
  return instances.flatMap((instance) => [
    `${instanceIcon(instance.state)} ${instance.name} (${instance.instanceId})`,
    `   Type: ${instance.instanceType}, State: ${instance.state}`,
  ]);
}

function alarmLines(
  alarms: AlarmSummary[],
  failure: CheckFailure | undefined,
): string[] {
  if (failure) {
    return failureLines(failure);
  }
  if (alarms.length === 0) {
    return ['ℹ️  No CloudWatch alarms configured in this region.'];
  }
  return alarms.flatMap((alarm) => [
    `${alarmIcon(alarm.state)} ${alarm.name}`,
    `   State: ${alarm.state}, Metric: ${alarm.metric}`,
  ]);
}

function summaryLines(summary: HealthSummary): string[] {
  const lines = [
    '',
    '📊 EC2 Instances:',
    `   Total: ${summary.totalInstances}`,
    `   Running: ${summary.runningInstances}`,
    `   Stopped: ${summary.stoppedInstances}`,
  ];
  if (summary.otherInstances > 0) {
    lines.push(`   Other: ${summary.otherInstances}`);
  }
  lines.push(
    '',
    '📊 CloudWatch Alarms:',
    `   Total: ${summary.totalAlarms}`,
    `   OK: ${summary.okAlarms}`,
    `   In Alarm: ${summary.activeAlarms}`,
  );
  if (summary.insufficientDataAlarms > 0) {
    lines.push(`   Insufficient Data: ${summary.insufficientDataAlarms}`);
  }
  lines.push('', RULE, verdictFor(summary.status), RULE);
  return lines;
}

export function renderText(report: HealthReport): string {
  const lines = [
    RULE,
    '🔍 AWS HEALTH CHECKER',
    RULE,
    `📅 Report Time: ${formatTimestamp(report.generatedAt)}`,
    `🌍 Region: ${report.region}`,
    ...sectionHeader('EC2 INSTANCE STATUS'),
    ...instanceLines(report.instances, findFailure(report.errors, 'ec2')),
    ...sectionHeader('CLOUDWATCH ALARM STATUS'),
    ...alarmLines(report.alarms, findFailure(report.errors, 'cloudwatch')),
    ...sectionHeader('SUMMARY'),
    ...summaryLines(report.summary),
  ];
  return lines.join('\n');
}

export function toDocument(report: HealthReport): HealthReportDocument {
  const { summary } = report;
  return {
    report_metadata: {
      generated_at: report.generatedAt.toISOString(),
      region: report.region,
      tool: TOOL_NAME,
    },
    instances: report.instances.map((instance) => ({
      instance_id: instance.instanceId,
      instance_type: instance.instanceType,
      state: instance.state,
      name: instance.name,
    })),
    alarms: report.alarms.map((alarm) => ({
      name: alarm.name,
      state: alarm.state,
      metric: alarm.metric,
      description: alarm.description,
    })),
    summary: {
      total_instances: summary.totalInstances,
      running_instances: summary.runningInstances,
      stopped_instances: summary.stoppedInstances,
      total_alarms: summary.totalAlarms,
      active_alarms: summary.activeAlarms,
      health_status: summary.status,
      instances_by_state: summary.instancesByState,
      alarms_by_state: summary.alarmsByState,
    },
    errors: report.errors,
  };
}

export function renderJson(report: HealthReport): string {
  return `${JSON.stringify(toDocument(report), null, 2)}\n`;
}
