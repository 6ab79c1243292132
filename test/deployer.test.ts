/**
 * Tests for the deploy workflow against in-process providers
 */
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { Deployer, type DeployerOptions } from '../src/cli/deployer';
import type { ConfigValue, DeploymentConfiguration } from '../src/types/index';
import { resolve } from '../src/utils/config-resolver';
import { StackLockedError } from '../src/utils/errors';
import { acquireStackLock } from '../src/utils/stack-lock';
import { createFakeProviders, noSleep, resource, type FakeProviders } from './helpers/fakes';

let providers: FakeProviders;
let lockDir: string;

function testConfig(type: string, overrides: Record<string, ConfigValue> = {}): DeploymentConfiguration {
  return resolve(type, 'development', { 'stack.name': 'demo', ...overrides }, { env: {} });
}

function deployer(config: DeploymentConfiguration, options: DeployerOptions = {}): Deployer {
  return new Deployer(config, providers, { force: true, lockDir, sleep: noSleep, ...options });
}

beforeEach(() => {
  providers = createFakeProviders();
  providers.compute.prices['g4dn.xlarge'] = { 'us-east-1a': 0.15, 'us-east-1b': 0.09, 'us-east-1c': 0.2 };
  lockDir = fs.mkdtempSync(path.join(os.tmpdir(), 'aistack-deployer-test-'));
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
  fs.rmSync(lockDir, { recursive: true, force: true });
});

describe('spot deployment', () => {
  test('prepares resources, launches in the cheapest zone and checks health', async () => {
    const result = await deployer(testConfig('spot')).deploy();

    expect(result.success).toBe(true);
    expect(result.message).toBe('Stack demo deployed');
    expect(result.instance?.instanceId).toBe('i-spot-us-east-1b');
    expect(result.health?.map((r) => r.status)).toEqual(['healthy', 'healthy', 'healthy', 'healthy']);

    expect(providers.infrastructure.calls).toEqual([
      'ensureKeyPair',
      'ensureSecurityGroup',
      'ensureInstanceProfile',
      'listDefaultSubnets',
    ]);
    expect(providers.infrastructure.securityGroupSpecs).toEqual([
      { stackName: 'demo', servicePorts: [5678, 11434, 6333, 11235], sshCidr: '0.0.0.0/0' },
    ]);

    const request = providers.compute.spotRequests[0];
    expect(request?.keyName).toBe('demo-key');
    expect(request?.securityGroupId).toBe('sg-123');
    expect(request?.iamProfile).toBe('demo-instance-profile');
    expect(request?.volumeSizeGb).toBe(100);
    expect(request?.userDataScript?.startsWith('#!/bin/bash\n')).toBe(true);

    expect(providers.monitoring.setups).toEqual([
      {
        stackName: 'demo',
        instanceId: 'i-spot-us-east-1b',
        options: { logGroupPrefix: '/aws/aistack', retentionDays: 7, cpuThreshold: 80, spot: true },
      },
    ]);
  });

  test('releases the stack lock afterwards', async () => {
    await deployer(testConfig('spot')).deploy();
    expect(() => acquireStackLock('demo', 'cleanup', lockDir).release()).not.toThrow();
  });

  test('refuses to run while the stack is locked', async () => {
    const lock = acquireStackLock('demo', 'cleanup', lockDir);

    await expect(deployer(testConfig('spot')).deploy()).rejects.toBeInstanceOf(StackLockedError);
    expect(providers.infrastructure.calls).toEqual([]);

    lock.release();
  });
});

describe('confirmation and dry run', () => {
  test('stops when the launch is not confirmed', async () => {
    const prompts: string[] = [];
    const result = await deployer(testConfig('spot'), {
      force: false,
      confirm: async (message) => {
        prompts.push(message);
        return false;
      },
    }).deploy();

    expect(result).toEqual({ success: false, error: 'Deployment cancelled' });
    expect(prompts).toEqual(['This will launch a spot g4dn.xlarge instance for stack demo in us-east-1.']);
    expect(providers.infrastructure.calls).toEqual([]);
  });

  test('dry run prices and renders without creating anything', async () => {
    const outputDir = path.join(lockDir, 'out');

    const result = await deployer(testConfig('spot'), { dryRun: true, outputDir }).deploy();

    expect(result).toEqual({ success: true, message: 'Dry run complete, nothing was launched' });
    expect(providers.infrastructure.calls).toEqual([]);
    expect(providers.compute.spotRequests).toEqual([]);
    expect(fs.readdirSync(outputDir).sort()).toEqual(['.env.demo', 'docker-compose.demo.yml']);
  });
});

describe('failure handling', () => {
  test('returns the error without cleanup by default', async () => {
    providers.infrastructure.failOn = 'ensureInstanceProfile';
    providers.stackResources.byTag['security-group'] = [resource('security-group', 'sg-123')];

    const result = await deployer(testConfig('spot')).deploy();

    expect(result).toEqual({ success: false, error: 'ensureInstanceProfile failed: UnauthorizedOperation' });
    expect(providers.stackResources.events).toEqual([]);
  });

  test('tears the stack down when cleanup.on_failure is set', async () => {
    providers.infrastructure.failOn = 'ensureInstanceProfile';
    providers.stackResources.byTag['security-group'] = [resource('security-group', 'sg-123')];

    const result = await deployer(testConfig('spot', { 'cleanup.on_failure': true })).deploy();

    expect(result.success).toBe(false);
    expect(result.error).toBe('ensureInstanceProfile failed: UnauthorizedOperation');
    expect(result.cleanup?.totals).toEqual({ deleted: 1, skipped: 0, failed: 0 });
    expect(providers.stackResources.events).toEqual(['delete:security-group:sg-123']);
  });

  test('fails when health is blocking and a service stays down', async () => {
    providers.http.fallback = 503;

    const result = await deployer(
      testConfig('spot', { 'health.blocking': true, 'health.max_attempts': 2 })
    ).deploy();

    expect(result.success).toBe(false);
    expect(result.error).toBe('Services did not become healthy');
    expect(result.health?.every((r) => r.status === 'unhealthy')).toBe(true);
  });

  test('reports unhealthy services without failing when health is not blocking', async () => {
    providers.http.fallback = 503;

    const result = await deployer(testConfig('spot', { 'health.max_attempts': 1 })).deploy();

    expect(result.success).toBe(true);
  });

  test('carries on when monitoring setup fails', async () => {
    providers.monitoring.fail = true;
    const result = await deployer(testConfig('spot'), { skipHealthCheck: true }).deploy();

    expect(result.success).toBe(true);
    expect(result.health).toBeUndefined();
    expect(providers.http.requests).toEqual([]);
  });
});

describe('other deployment types', () => {
  test('ondemand sets up the load balancer and CloudFront', async () => {
    const result = await deployer(
      testConfig('ondemand', { 'features.alb': true, 'features.cloudfront': true })
    ).deploy();

    expect(result.instance?.instanceId).toBe('i-run-1');
    expect(providers.loadBalancing.calls).toEqual([
      'setupLoadBalancer:i-run-1:5678',
      'setupCloudFront:demo-alb.elb.example.com',
    ]);
  });

  test('CloudFront without the load balancer is skipped', async () => {
    await deployer(testConfig('ondemand', { 'features.cloudfront': true })).deploy();
    expect(providers.loadBalancing.calls).toEqual([]);
  });

  test('EFS gets a mount target in every default subnet', async () => {
    await deployer(testConfig('ondemand', { 'storage.efs_enabled': true })).deploy();

    expect(providers.infrastructure.calls).toContain('ensureFileSystem:subnet-a');
    expect(providers.infrastructure.calls).toContain('ensureFileSystem:subnet-b');
    expect(providers.compute.runRequests[0]?.userDataScript).toContain('fs-123.efs.us-east-1.amazonaws.com:/');
  });

  test('simple uses Ubuntu without an IAM profile or load balancer', async () => {
    await deployer(testConfig('simple', { 'features.alb': true })).deploy();

    expect(providers.infrastructure.calls).not.toContain('ensureInstanceProfile');
    const request = providers.compute.runRequests[0];
    expect(request?.instanceType).toBe('t3.medium');
    expect(request?.amiId).toBe('ami-ubuntu');
    expect(request?.iamProfile).toBeUndefined();
    expect(request?.volumeSizeGb).toBe(30);
    expect(providers.loadBalancing.calls).toEqual([]);
  });
});
