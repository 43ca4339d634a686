import { CloudWatchClient } from '@aws-sdk/client-cloudwatch';
import { EC2Client } from '@aws-sdk/client-ec2';
import { Test, TestingModule } from '@nestjs/testing';
import { AppModule } from './app.module';
import { CLOUDWATCH_CLIENT, EC2_CLIENT } from './aws/aws.constants';
import { HealthCheckService } from './health-check/health-check.service';
import { ReportService } from './report/report.service';

describe('AppModule', () => {
  let module: TestingModule;

  beforeEach(async () => {
    module = await Test.createTestingModule({
      imports: [AppModule.register({ region: 'us-west-2' })],
    }).compile();
  });

  afterEach(async () => {
    await module.close();
  });

  it('wires the health check for the requested region', () => {
    expect(module.get(HealthCheckService).region).toBe('us-west-2');
    expect(module.get(ReportService)).toBeInstanceOf(ReportService);
  });

  it('binds both SDK clients to the region', async () => {
    const ec2 = module.get<EC2Client>(EC2_CLIENT);
    const cloudwatch = module.get<CloudWatchClient>(CLOUDWATCH_CLIENT);

    expect(ec2).toBeInstanceOf(EC2Client);
    expect(cloudwatch).toBeInstanceOf(CloudWatchClient);
    await expect(ec2.config.region()).resolves.toBe('us-west-2');
    await expect(cloudwatch.config.region()).resolves.toBe('us-west-2');
  });
});
