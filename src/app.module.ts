import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AwsModule } from './aws/aws.module';
import configuration, { ConfigOverrides } from './config/configuration';
import { HealthCheckModule } from './health-check/health-check.module';

@Module({})
export class AppModule {
  static register(overrides: ConfigOverrides = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true, // 모든 모듈에서 ConfigService 사용
          load: [() => configuration(overrides)],
        }),
        AwsModule,
        HealthCheckModule,
      ],
    };
  }
}
