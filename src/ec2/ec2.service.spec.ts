import { Test, TestingModule } from '@nestjs/testing';
import {
  DescribeInstancesCommand,
  DescribeInstancesCommandInput,
  DescribeInstancesCommandOutput,
  EC2Client,
  Instance,
} from '@aws-sdk/client-ec2';
import { EC2_CLIENT } from '../aws/aws.constants';
import { EC2Service, UNNAMED_INSTANCE } from './ec2.service';

function instance(overrides: Partial<Instance> = {}): Instance {
  return {
    InstanceId: 'i-0000000000000001',
    InstanceType: 't3.micro',
    State: { Name: 'running' },
    ...overrides,
  };
}

function page(
  instances: Instance[],
  nextToken?: string,
): DescribeInstancesCommandOutput {
  return {
    $metadata: {},
    Reservations: [{ Instances: instances }],
    NextToken: nextToken,
  };
}

describe('EC2Service', () => {
  let service: EC2Service;
  let client: EC2Client;
  let inputs: DescribeInstancesCommandInput[];

  function stubPages(pages: DescribeInstancesCommandOutput[]) {
    return jest.spyOn(client, 'send').mockImplementation(async (command) => {
      if (!(command instanceof DescribeInstancesCommand)) {
        throw new Error('unexpected command');
      }
      inputs.push({ ...command.input });
      const next = pages[inputs.length - 1];
      if (!next) {
        throw new Error('no more pages');
      }
      return next;
    });
  }

  beforeEach(async () => {
    inputs = [];
    client = new EC2Client({
      region: 'eu-west-1',
      credentials: { accessKeyId: 'test', secretAccessKey: 'test-secret' },
    });

    const module: TestingModule = await Test.createTestingModule({
      providers: [EC2Service, { provide: EC2_CLIENT, useValue: client }],
    }).compile();

    service = module.get<EC2Service>(EC2Service);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    client.destroy();
  });

  it('maps instances with their Name tag', async () => {
    stubPages([
      page([
        instance({
          InstanceId: 'i-web',
          Tags: [
            { Key: 'env', Value: 'prod' },
            { Key: 'Name', Value: 'web-1' },
          ],
        }),
      ]),
    ]);

    await expect(service.listInstances()).resolves.toEqual([
      {
        instanceId: 'i-web',
        instanceType: 't3.micro',
        state: 'running',
        name: 'web-1',
      },
    ]);
  });

  it('falls back to Unnamed and unknown for missing fields', async () => {
    stubPages([page([{ InstanceId: 'i-bare' }])]);

    const [result] = await service.listInstances();

    expect(result).toEqual({
      instanceId: 'i-bare',
      instanceType: 'unknown',
      state: 'unknown',
      name: UNNAMED_INSTANCE,
    });
  });

  it('follows NextToken across pages and flattens reservations', async () => {
    stubPages([
      {
        $metadata: {},
        Reservations: [
          { Instances: [instance({ InstanceId: 'i-a' })] },
          {
            Instances: [
              instance({ InstanceId: 'i-b', State: { Name: 'stopped' } }),
            ],
          },
        ],
        NextToken: 'page-2',
      },
      page([instance({ InstanceId: 'i-c', State: { Name: 'pending' } })]),
    ]);

    const result = await service.listInstances();

    expect(result.map((i) => i.instanceId)).toEqual(['i-a', 'i-b', 'i-c']);
    expect(result.map((i) => i.state)).toEqual([
      'running',
      'stopped',
      'pending',
    ]);
    expect(inputs).toHaveLength(2);
    expect(inputs[1].NextToken).toBe('page-2');
  });

  it('returns an empty list when the region has no reservations', async () => {
    stubPages([{ $metadata: {} }]);

    await expect(service.listInstances()).resolves.toEqual([]);
  });

  it('propagates SDK errors', async () => {
    jest.spyOn(client, 'send').mockImplementation(async () => {
      throw Object.assign(new Error('not authorized'), {
        name: 'UnauthorizedOperation',
      });
    });

    await expect(service.listInstances()).rejects.toThrow('not authorized');
  });
});
