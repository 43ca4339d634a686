export interface InstanceSummary {
  instanceId: string;
  instanceType: string;
  state: string;
  name: string;
}
