export type AlarmState = 'OK' | 'ALARM' | 'INSUFFICIENT_DATA' | 'UNKNOWN';

export interface AlarmSummary {
  name: string;
  state: AlarmState;
  metric: string;
  description: string;
}
