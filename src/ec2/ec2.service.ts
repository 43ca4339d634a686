import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
} from '@nestjs/common';
import {
  EC2Client,
  Instance,
  paginateDescribeInstances,
} from '@aws-sdk/client-ec2';
import { EC2_CLIENT } from '../aws/aws.constants';
import { InstanceSummary } from './ec2.types';

export const UNNAMED_INSTANCE = 'Unnamed';

@Injectable()
export class EC2Service implements OnModuleDestroy {
  private readonly logger = new Logger(EC2Service.name);

  constructor(@Inject(EC2_CLIENT) private readonly ec2Client: EC2Client) {}

  // 리전의 모든 EC2 인스턴스를 페이지 단위로 조회
  async listInstances(): Promise<InstanceSummary[]> {
    const paginator = paginateDescribeInstances({ client: this.ec2Client }, {});

    const instances: InstanceSummary[] = [];
    let pages = 0;
    for await (const page of paginator) {
      pages += 1;
      for (const reservation of page.Reservations ?? []) {
        for (const instance of reservation.Instances ?? []) {
          instances.push(this.mapInstance(instance));
        }
      }
    }

    this.logger.debug(
      `Fetched ${instances.length} instances in ${pages} page(s)`,
    );
    return instances;
  }

  onModuleDestroy(): void {
    this.ec2Client.destroy();
  }

  private mapInstance(instance: Instance): InstanceSummary {
    return {
      instanceId: instance.InstanceId ?? '',
      instanceType: instance.InstanceType ?? 'unknown',
      state: instance.State?.Name ?? 'unknown',
      name: this.findNameTag(instance),
    };
  }

  private findNameTag(instance: Instance): string {
    const tag = instance.Tags?.find((tag) => tag.Key === 'Name');
    return tag?.Value ?? UNNAMED_INSTANCE;
  }
}
