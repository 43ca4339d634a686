import { AlarmSummary } from '../cloud-watch/cloud-watch.types';
import { InstanceSummary } from '../ec2/ec2.types';

export type HealthStatus =
  | 'attention'
  | 'incomplete'
  | 'empty'
  | 'healthy'
  | 'degraded';

export type CheckName = 'ec2' | 'cloudwatch';

export interface CheckFailure {
  check: CheckName;
  message: string;
  hint?: string;
}

export interface HealthSummary {
  totalInstances: number;
  runningInstances: number;
  stoppedInstances: number;
  otherInstances: number;
  totalAlarms: number;
  okAlarms: number;
  activeAlarms: number;
  insufficientDataAlarms: number;
  instancesByState: Record<string, number>;
  alarmsByState: Record<string, number>;
  status: HealthStatus;
}

export interface HealthReport {
  generatedAt: Date;
  region: string;
  instances: InstanceSummary[];
  alarms: AlarmSummary[];
  summary: HealthSummary;
  errors: CheckFailure[];
}

// JSON 내보내기 형식 (snake_case)
export interface HealthReportDocument {
  report_metadata: {
    generated_at: string;
    region: string;
    tool: string;
  };
  instances: Array<{
    instance_id: string;
    instance_type: string;
    state: string;
    name: string;
  }>;
  alarms: Array<{
    name: string;
    state: string;
    metric: string;
    description: string;
  }>;
  summary: {
    total_instances: number;
    running_instances: number;
    stopped_instances: number;
    total_alarms: number;
    active_alarms: number;
    health_status: HealthStatus;
    instances_by_state: Record<string, number>;
    alarms_by_state: Record<string, number>;
  };
  errors: CheckFailure[];
}
