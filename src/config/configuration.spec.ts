import { HealthCheckError } from '../common/health-check.error';
import configuration, {
  DEFAULT_REGION,
  isValidRegion,
  resolveCredentials,
  resolveRegion,
} from './configuration';

describe('configuration', () => {
  describe('resolveRegion', () => {
    it('defaults to eu-west-1', () => {
      expect(resolveRegion({})).toBe(DEFAULT_REGION);
      expect(DEFAULT_REGION).toBe('eu-west-1');
    });

    it('prefers the override, then each region variable in turn', () => {
      const env = {
        HEALTH_CHECK_REGION: 'us-east-2',
        AWS_REGION: 'us-west-1',
        AWS_DEFAULT_REGION: 'ap-south-1',
      };

      expect(resolveRegion(env, { region: 'eu-central-1' })).toBe(
        'eu-central-1',
      );
      expect(resolveRegion(env)).toBe('us-east-2');
      expect(
        resolveRegion({
          AWS_REGION: 'us-west-1',
          AWS_DEFAULT_REGION: 'ap-south-1',
        }),
      ).toBe('us-west-1');
      expect(resolveRegion({ AWS_DEFAULT_REGION: 'ap-south-1' })).toBe(
        'ap-south-1',
      );
    });

    it('skips blank values', () => {
      expect(resolveRegion({ AWS_REGION: '  ' }, { region: '' })).toBe(
        DEFAULT_REGION,
      );
    });

    it('rejects malformed regions', () => {
      expect(() => resolveRegion({ AWS_REGION: 'Ireland' })).toThrow(
        HealthCheckError,
      );
      expect(() => resolveRegion({}, { region: 'eu_west_1' })).toThrow(
        'Invalid AWS region: "eu_west_1"',
      );
    });
  });

  it.each(['us-east-1', 'eu-central-2', 'us-gov-west-1', 'ap-southeast-4'])(
    'accepts %s as a region',
    (region) => {
      expect(isValidRegion(region)).toBe(true);
    },
  );

  describe('resolveCredentials', () => {
    it('uses the SDK chain unless both keys are set', () => {
      expect(resolveCredentials({})).toBeUndefined();
      expect(resolveCredentials({ AWS_ACCESS_KEY_ID: 'test' })).toBeUndefined();
    });

    it('passes static keys and the session token through', () => {
      expect(
        resolveCredentials({
          AWS_ACCESS_KEY_ID: 'test',
          AWS_SECRET_ACCESS_KEY: 'test-secret',
          AWS_SESSION_TOKEN: 'test-token',
        }),
      ).toEqual({
        accessKeyId: 'test',
        secretAccessKey: 'test-secret',
        sessionToken: 'test-token',
      });
    });
  });

  it('builds the full config object', () => {
    expect(
      configuration(
        { region: 'us-east-1' },
        { AWS_ACCESS_KEY_ID: 'test', AWS_SECRET_ACCESS_KEY: 'test-secret' },
      ),
    ).toEqual({
      region: 'us-east-1',
      credentials: { accessKeyId: 'test', secretAccessKey: 'test-secret' },
    });
  });
});
