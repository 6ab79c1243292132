/**
 * Tests for deploy and cleanup report formatting
 */
import { formatCleanupReport, formatDeploySummary, generateNextSteps, type DeploySummary } from '../src/utils/deployment-report';
import type { CleanupReport, HealthCheckResult } from '../src/types/index';

function healthResult(serviceName: string, status: HealthCheckResult['status'], url: string): HealthCheckResult {
  return { serviceName, endpointPath: '/', url, status, lastCheckedAt: new Date(0), attempts: 1 };
}

const baseSummary: DeploySummary = {
  stackName: 'demo',
  deploymentType: 'spot',
  region: 'us-east-1',
  environment: 'development',
  instance: {
    instanceId: 'i-1',
    state: 'running',
    publicAddress: '203.0.113.10',
    availabilityZone: 'us-east-1b',
    spotRequestId: 'sir-1',
  },
  keyName: 'demo-key',
};

describe('generateNextSteps', () => {
  test('suggests SSH and teardown', () => {
    expect(generateNextSteps(baseSummary)).toEqual([
      'SSH: ssh -i ~/.ssh/demo-key.pem ubuntu@203.0.113.10',
      'Tear down: aistack cleanup demo --region us-east-1',
    ]);
  });

  test('suggests a health re-check when a service is not healthy', () => {
    const steps = generateNextSteps({
      ...baseSummary,
      keyName: undefined,
      dashboardName: 'demo-dashboard',
      health: [healthResult('n8n', 'unhealthy', 'http://203.0.113.10:5678/healthz')],
    });
    expect(steps).toEqual([
      'Re-check services: aistack health 203.0.113.10',
      'CloudWatch dashboard: demo-dashboard (us-east-1)',
      'Tear down: aistack cleanup demo --region us-east-1',
    ]);
  });
});

describe('formatDeploySummary', () => {
  test('includes cost and endpoint sections when present', () => {
    const lines = formatDeploySummary({
      ...baseSummary,
      spotPrice: 0.09,
      savings: { instanceType: 'g4dn.xlarge', hours: 24, spotCost: 2.16, ondemandCost: 12.624, savings: 10.464, savingsPercent: 82.9 },
      loadBalancerDns: 'demo-alb.elb.example.com',
      cloudFrontDomain: 'demo.cloudfront.example.com',
    }).split('\n');

    expect(lines[0]).toBe('DEPLOYMENT SUMMARY - demo');
    expect(lines).toContain('  Spot price:    $0.0900/hour');
    expect(lines).toContain('  24h estimate:  $2.16 vs $12.62 on-demand (82.9% saved)');
    expect(lines).toContain('  ALB:           http://demo-alb.elb.example.com');
    expect(lines).toContain('  CloudFront:    https://demo.cloudfront.example.com');
    expect(lines).toContain('  Spot Request:  sir-1');
    expect(lines).toContain('[OK] DEPLOYED');
  });

  test('counts services that are not healthy yet', () => {
    const lines = formatDeploySummary({
      ...baseSummary,
      health: [
        healthResult('n8n', 'healthy', 'http://203.0.113.10:5678/healthz'),
        healthResult('ollama', 'unhealthy', 'http://203.0.113.10:11434/api/tags'),
      ],
    }).split('\n');

    expect(lines).toContain(`  [OK] ${'n8n'.padEnd(10)} http://203.0.113.10:5678/healthz`);
    expect(lines).toContain(`  [!] ${'ollama'.padEnd(10)} http://203.0.113.10:11434/api/tags`);
    expect(lines).toContain('[!] DEPLOYED (1 service not healthy yet)');
    expect(lines).not.toContain('COST');
  });
});

describe('formatCleanupReport', () => {
  const report: CleanupReport = {
    stackName: 'demo',
    dryRun: false,
    cancelled: false,
    counts: {
      'security-group': { deleted: 2, skipped: 0, failed: 1 },
      instance: { deleted: 1, skipped: 0, failed: 0 },
    },
    totals: { deleted: 3, skipped: 0, failed: 1 },
    failures: [{ resourceType: 'security-group', resourceId: 'sg-2', error: 'delete failed: DependencyViolation' }],
  };

  test('lists counts in deletion order, then failures', () => {
    const separator = '━'.repeat(60);
    expect(formatCleanupReport(report).split('\n')).toEqual([
      'CLEANUP REPORT - demo',
      separator,
      `  ${'instance'.padEnd(24)} 1 deleted, 0 skipped, 0 failed`,
      `  ${'security-group'.padEnd(24)} 2 deleted, 0 skipped, 1 failed`,
      '',
      'FAILURES',
      '  [ERROR] security-group sg-2: delete failed: DependencyViolation',
      separator,
      '[!] 3 deleted, 0 skipped, 1 failed',
    ]);
  });

  test('describes a dry run as a plan', () => {
    const text = formatCleanupReport({
      ...report,
      dryRun: true,
      counts: { volume: { deleted: 0, skipped: 1, failed: 0 } },
      totals: { deleted: 0, skipped: 1, failed: 0 },
      failures: [],
    });
    const lines = text.split('\n');

    expect(lines[0]).toBe('CLEANUP PLAN - demo');
    expect(lines).toContain(`  ${'volume'.padEnd(24)} 1 to delete`);
    expect(lines[lines.length - 1]).toBe('[DRY RUN] 1 resource would be deleted');
  });

  test('reports a cancelled run', () => {
    expect(formatCleanupReport({ ...report, cancelled: true }).split('\n')[2]).toBe(
      '[!] Cancelled, nothing was deleted'
    );
  });
});
