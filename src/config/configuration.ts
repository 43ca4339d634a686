import { HealthCheckError } from '../common/health-check.error';

export const DEFAULT_REGION = 'eu-west-1';

// us-east-1, eu-central-2, us-gov-west-1, cn-northwest-1, ...
const REGION_PATTERN = /^[a-z]{2}(-[a-z]+)+-\d+$/;

export interface AwsCredentialsConfig {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}

export interface HealthCheckConfig {
  region: string;
  credentials?: AwsCredentialsConfig;
}

// 명령행 옵션이 환경 변수보다 우선한다
export interface ConfigOverrides {
  region?: string;
}

export function isValidRegion(region: string): boolean {
  return REGION_PATTERN.test(region);
}

export function resolveRegion(
  env: NodeJS.ProcessEnv,
  overrides: ConfigOverrides = {},
): string {
  const region = [
    overrides.region,
    env.HEALTH_CHECK_REGION,
    env.AWS_REGION,
    env.AWS_DEFAULT_REGION,
  ].find((value): value is string => !!value && value.trim().length > 0);

  const resolved = region?.trim() ?? DEFAULT_REGION;
  if (!isValidRegion(resolved)) {
    throw new HealthCheckError(`Invalid AWS region: "${resolved}"`);
  }
  return resolved;
}

// 키가 둘 다 있을 때만 명시적 자격 증명을 사용하고, 없으면 SDK 기본 체인에 맡긴다
export function resolveCredentials(
  env: NodeJS.ProcessEnv,
): AwsCredentialsConfig | undefined {
  const accessKeyId = env.AWS_ACCESS_KEY_ID;
  const secretAccessKey = env.AWS_SECRET_ACCESS_KEY;
  if (!accessKeyId || !secretAccessKey) {
    return undefined;
  }
  return {
    accessKeyId,
    secretAccessKey,
    ...(env.AWS_SESSION_TOKEN && { sessionToken: env.AWS_SESSION_TOKEN }),
  };
}

export default function configuration(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): HealthCheckConfig {
  return {
    region: resolveRegion(env, overrides),
    credentials: resolveCredentials(env),
  };
}
