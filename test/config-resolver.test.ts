/**
 * Tests for the layered configuration resolver
 */
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { readEnvLayer, resolve, validateStackName, normalizeDeploymentType } from '../src/utils/config-resolver';
import { getBoolean, getNumber, flattenConfig } from '../src/utils/config-helpers';
import { ConfigurationError } from '../src/utils/errors';

let projectDir: string;

function writeYaml(relative: string, content: string): void {
  const filePath = path.join(projectDir, relative);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
}

beforeEach(() => {
  projectDir = fs.mkdtempSync(path.join(os.tmpdir(), 'aistack-config-'));
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  fs.rmSync(projectDir, { recursive: true, force: true });
  jest.restoreAllMocks();
});

describe('resolve', () => {
  test('applies built-in defaults and the spot deployment-type table', () => {
    const config = resolve('spot', 'development', { 'stack.name': 'demo' }, { env: {} });

    expect(config['aws.region']).toBe('us-east-1');
    expect(config['instance.type']).toBe('g4dn.xlarge');
    expect(config['spot.max_price']).toBe(0.5);
    expect(config['deployment.type']).toBe('spot');
    expect(config['environment.name']).toBe('development');
    expect(config['monitoring.log_retention_days']).toBe(7);
  });

  test('empty deployment type means spot', () => {
    const config = resolve('', 'development', {}, { env: {} });
    expect(config['deployment.type']).toBe('spot');
    expect(config['instance.type']).toBe('g4dn.xlarge');
  });

  test('simple deployments use the simple table', () => {
    const config = resolve('simple', 'development', {}, { env: {} });
    expect(config['instance.type']).toBe('t3.medium');
    expect(config['compose.profile']).toBe('cpu');
  });

  test('environment variables override the deployment-type table', () => {
    const config = resolve('spot', 'development', {}, { env: { INSTANCE_TYPE: 'g5.xlarge', AWS_REGION: 'eu-west-1' } });
    expect(config['instance.type']).toBe('g5.xlarge');
    expect(config['aws.region']).toBe('eu-west-1');
  });

  test('CLI flags override environment variables', () => {
    const config = resolve('spot', 'development', { 'instance.type': 'g6.xlarge' }, { env: { INSTANCE_TYPE: 'g5.xlarge' } });
    expect(config['instance.type']).toBe('g6.xlarge');
  });

  test('undefined CLI entries fall through to lower layers', () => {
    const config = resolve('spot', 'development', { 'instance.type': undefined }, { env: {} });
    expect(config['instance.type']).toBe('g4dn.xlarge');
  });

  test('environment file overrides the deployment-type table', () => {
    const config = resolve('spot', 'production', {}, { env: {} });
    expect(config['health.blocking']).toBe(true);
    expect(config['images.use_latest']).toBe(false);
    expect(config['network.ssh_cidr']).toBe('10.0.0.0/8');
  });

  test('a missing environment file is not an error', () => {
    const config = resolve('spot', 'qa', {}, { env: {} });
    expect(config['environment.name']).toBe('qa');
    expect(config['monitoring.log_retention_days']).toBe(30);
  });

  test('ENVIRONMENT selects the environment when none is passed', () => {
    const config = resolve('spot', undefined, {}, { env: { ENVIRONMENT: 'staging' } });
    expect(config['environment.name']).toBe('staging');
    expect(config['monitoring.log_retention_days']).toBe(14);
  });

  test('project config files layer on top of the built-in ones', () => {
    writeYaml('config/defaults.yml', 'aws:\n  region: eu-central-1\n');
    writeYaml('config/environments/qa.yml', 'instance:\n  type: g5.2xlarge\n');

    const config = resolve('spot', 'qa', {}, { env: {}, configDir: path.join(projectDir, 'config') });

    expect(config['aws.region']).toBe('eu-central-1');
    expect(config['instance.type']).toBe('g5.2xlarge');
    expect(config['compose.project_name']).toBe('aistack');
  });

  test('unknown deployment type applies global defaults only', () => {
    const config = resolve('gpu-cluster', 'development', {}, { env: {}, allowIncomplete: true });

    expect(config['deployment.type']).toBe('spot');
    expect(config['instance.type']).toBeUndefined();
    expect(config['aws.region']).toBe('us-east-1');
    expect(console.log).toHaveBeenCalledWith("[!] Unknown deployment type 'gpu-cluster', applying global defaults only");
  });

  test('lists every missing required key', () => {
    let caught: unknown;
    try {
      resolve('gpu-cluster', 'development', {}, { env: {} });
    } catch (e) {
      caught = e;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught instanceof ConfigurationError && caught.keys).toEqual(['instance.type', 'spot.max_price']);
  });

  test('rejects a non-positive spot price', () => {
    expect(() => resolve('spot', 'development', { 'spot.max_price': '0' }, { env: {} })).toThrow(
      'spot.max_price must be greater than 0 (got 0)'
    );
  });

  test('rejects an invalid stack name', () => {
    expect(() => resolve('spot', 'development', { 'stack.name': '1-bad' }, { env: {} })).toThrow(ConfigurationError);
  });

  test('returns a frozen object', () => {
    const config = resolve('spot', 'development', {}, { env: {} });
    expect(Object.isFrozen(config)).toBe(true);
  });
});

describe('readEnvLayer', () => {
  test('maps known variables and ignores the rest', () => {
    expect(readEnvLayer({ SPOT_PRICE: '0.30', SETUP_ALB: 'true', HOME: '/home/test', KEY_NAME: '' })).toEqual({
      'spot.max_price': '0.30',
      'features.alb': 'true',
    });
  });
});

describe('normalizeDeploymentType', () => {
  test('is case-insensitive', () => {
    expect(normalizeDeploymentType(' OnDemand ')).toEqual({ type: 'ondemand', known: true });
  });

  test('flags unknown values', () => {
    expect(normalizeDeploymentType('cluster')).toEqual({ type: 'spot', known: false });
  });
});

describe('validateStackName', () => {
  test('accepts letters, digits and hyphens', () => {
    expect(validateStackName('my-stack-2')).toBeNull();
  });

  test('rejects names starting with a digit', () => {
    expect(validateStackName('2stack')).toContain('Must start with a letter');
  });

  test('rejects names over 128 characters', () => {
    expect(validateStackName('a'.repeat(129))).toContain('too long');
  });
});

describe('typed accessors', () => {
  test('coerce strings from the env and CLI layers', () => {
    const config = { 'a.flag': 'yes', 'a.count': '12', 'b.flag': 'off' };
    expect(getBoolean(config, 'a.flag')).toBe(true);
    expect(getBoolean(config, 'b.flag')).toBe(false);
    expect(getNumber(config, 'a.count')).toBe(12);
  });

  test('reject malformed values', () => {
    expect(() => getNumber({ n: 'twelve' }, 'n')).toThrow("Configuration key n must be a number (got 'twelve')");
    expect(() => getBoolean({ b: 'maybe' }, 'b')).toThrow(ConfigurationError);
  });

  test('fall back when the key is absent', () => {
    expect(getNumber({}, 'missing', 5)).toBe(5);
    expect(() => getNumber({}, 'missing')).toThrow('Missing configuration key: missing');
  });
});

describe('flattenConfig', () => {
  test('flattens nested maps and joins arrays', () => {
    expect(flattenConfig({ services: { n8n: { port: 5678 } }, zones: ['a', 'b'], empty: null })).toEqual({
      'services.n8n.port': 5678,
      zones: 'a,b',
    });
  });
});
