/**
 * Deployment Report Generator
 *
 * Formats the end-of-run reports for deploy and cleanup.
 */

import type { CleanupReport, DeploymentType, HealthCheckResult, InstanceRecord } from '../types/index.js';
import type { SpotSavings } from '../spot/spot-pricing.js';
import { DELETION_ORDER } from '../cleanup/cleanup-engine.js';

export interface DeploySummary {
  stackName: string;
  deploymentType: DeploymentType;
  region: string;
  environment: string;
  instance: InstanceRecord;
  keyName?: string;
  spotPrice?: number;
  savings?: SpotSavings | null;
  loadBalancerDns?: string;
  cloudFrontDomain?: string;
  dashboardName?: string;
  health?: HealthCheckResult[];
}

const SEPARATOR = '━'.repeat(60);

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

/**
 * Format the deploy summary shown after a successful launch
 */
export function formatDeploySummary(summary: DeploySummary): string {
  const { stackName, instance } = summary;
  const lines: string[] = [];

  lines.push(`DEPLOYMENT SUMMARY - ${stackName}`);
  lines.push(SEPARATOR);
  lines.push('');

  lines.push('INSTANCE');
  lines.push(`  Type:          ${summary.deploymentType}`);
  lines.push(`  Region:        ${summary.region}`);
  lines.push(`  Environment:   ${summary.environment}`);
  lines.push(`  Instance ID:   ${instance.instanceId}`);
  lines.push(`  Public IP:     ${instance.publicAddress ?? '(none)'}`);
  if (instance.availabilityZone) {
    lines.push(`  Zone:          ${instance.availabilityZone}`);
  }
  if (instance.spotRequestId) {
    lines.push(`  Spot Request:  ${instance.spotRequestId}`);
  }
  lines.push('');

  if (summary.spotPrice !== undefined) {
    lines.push('COST');
    lines.push(`  Spot price:    $${summary.spotPrice.toFixed(4)}/hour`);
    if (summary.savings) {
      const { savings } = summary;
      lines.push(
        `  ${savings.hours}h estimate:  $${savings.spotCost.toFixed(2)} vs $${savings.ondemandCost.toFixed(2)} on-demand (${savings.savingsPercent}% saved)`
      );
    }
    lines.push('');
  }

  if (summary.loadBalancerDns || summary.cloudFrontDomain) {
    lines.push('ENDPOINTS');
    if (summary.loadBalancerDns) {
      lines.push(`  ALB:           http://${summary.loadBalancerDns}`);
    }
    if (summary.cloudFrontDomain) {
      lines.push(`  CloudFront:    https://${summary.cloudFrontDomain}`);
    }
    lines.push('');
  }

  if (summary.health && summary.health.length > 0) {
    lines.push('SERVICES');
    for (const result of summary.health) {
      const marker = result.status === 'healthy' ? '[OK]' : result.status === 'unknown' ? '[?]' : '[!]';
      lines.push(`  ${marker} ${result.serviceName.padEnd(10)} ${result.url}`);
    }
    lines.push('');
  }

  lines.push(SEPARATOR);
  const unhealthy = (summary.health ?? []).filter((r) => r.status !== 'healthy').length;
  if (unhealthy === 0) {
    lines.push('[OK] DEPLOYED');
  } else {
    lines.push(`[!] DEPLOYED (${plural(unhealthy, 'service')} not healthy yet)`);
  }
  lines.push('');

  const steps = generateNextSteps(summary);
  if (steps.length > 0) {
    lines.push('Next Steps:');
    steps.forEach((step, i) => lines.push(`   ${i + 1}. ${step}`));
    lines.push('');
  }

  return lines.join('\n');
}

export function generateNextSteps(summary: DeploySummary): string[] {
  const steps: string[] = [];
  const host = summary.instance.publicAddress;

  if (host && summary.keyName) {
    steps.push(`SSH: ssh -i ~/.ssh/${summary.keyName}.pem ubuntu@${host}`);
  }
  if ((summary.health ?? []).some((r) => r.status !== 'healthy') && host) {
    steps.push(`Re-check services: aistack health ${host}`);
  }
  if (summary.dashboardName) {
    steps.push(`CloudWatch dashboard: ${summary.dashboardName} (${summary.region})`);
  }
  steps.push(`Tear down: aistack cleanup ${summary.stackName} --region ${summary.region}`);
  return steps;
}

/**
 * Format a cleanup report: per-type counts in deletion order, then failures
 */
export function formatCleanupReport(report: CleanupReport): string {
  const lines: string[] = [];

  lines.push(`${report.dryRun ? 'CLEANUP PLAN' : 'CLEANUP REPORT'} - ${report.stackName}`);
  lines.push(SEPARATOR);

  if (report.cancelled) {
    lines.push('[!] Cancelled, nothing was deleted');
    return lines.join('\n');
  }

  for (const type of DELETION_ORDER) {
    const counts = report.counts[type];
    if (!counts) continue;
    const parts = report.dryRun
      ? [`${counts.skipped} to delete`]
      : [`${counts.deleted} deleted`, `${counts.skipped} skipped`, `${counts.failed} failed`];
    lines.push(`  ${type.padEnd(24)} ${parts.join(', ')}`);
  }

  if (report.failures.length > 0) {
    lines.push('');
    lines.push('FAILURES');
    for (const failure of report.failures) {
      lines.push(`  [ERROR] ${failure.resourceType} ${failure.resourceId}: ${failure.error}`);
    }
  }

  lines.push(SEPARATOR);
  const { totals } = report;
  if (report.dryRun) {
    lines.push(`[DRY RUN] ${plural(totals.skipped, 'resource')} would be deleted`);
  } else if (totals.failed > 0) {
    lines.push(`[!] ${totals.deleted} deleted, ${totals.skipped} skipped, ${totals.failed} failed`);
  } else {
    lines.push(`[OK] ${totals.deleted} deleted, ${totals.skipped} skipped`);
  }

  return lines.join('\n');
}
