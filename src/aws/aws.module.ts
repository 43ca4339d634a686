import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CloudWatchClient } from '@aws-sdk/client-cloudwatch';
import { EC2Client } from '@aws-sdk/client-ec2';
import { HealthCheckConfig } from '../config/configuration';
import { CLOUDWATCH_CLIENT, EC2_CLIENT } from './aws.constants';

type ClientConfig = Pick<HealthCheckConfig, 'region' | 'credentials'>;

function clientConfig(
  config: ConfigService<HealthCheckConfig, true>,
): ClientConfig {
  const credentials = config.get('credentials', { infer: true });
  return {
    region: config.get('region', { infer: true }),
    ...(credentials && { credentials }),
  };
}

@Global()
@Module({
  providers: [
    {
      provide: EC2_CLIENT,
      inject: [ConfigService],
      useFactory: (config: ConfigService<HealthCheckConfig, true>) =>
        new EC2Client(clientConfig(config)),
    },
    {
      provide: CLOUDWATCH_CLIENT,
      inject: [ConfigService],
      useFactory: (config: ConfigService<HealthCheckConfig, true>) =>
        new CloudWatchClient(clientConfig(config)),
    },
  ],
  exports: [EC2_CLIENT, CLOUDWATCH_CLIENT],
})
export class AwsModule {}
