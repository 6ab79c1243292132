/**
 * AWS Monitoring Provider
 *
 * CloudWatch log group, alarms and dashboard for one stack instance.
 * Alarm and dashboard names start with "<stack>-" so cleanup can find them.
 */

import { PutDashboardCommand, PutMetricAlarmCommand, type PutMetricAlarmCommandInput } from '@aws-sdk/client-cloudwatch';
import { CreateLogGroupCommand, PutRetentionPolicyCommand } from '@aws-sdk/client-cloudwatch-logs';

import type { MonitoringOptions, MonitoringProvider, MonitoringSetup } from '../interfaces/index.js';
import { STACK_TAG } from '../../constants/tags.js';
import { callOnce, getErrorCode } from '../../utils/retry.js';
import { dashboardName, getCloudWatchClient, getCloudWatchLogsClient, logGroupName } from './aws-helpers.js';

/**
 * Alarm definitions for an instance, in creation order
 */
export function buildAlarmInputs(
  stackName: string,
  instanceId: string,
  options: Pick<MonitoringOptions, 'cpuThreshold' | 'spot'>
): PutMetricAlarmCommandInput[] {
  const dimensions = [{ Name: 'InstanceId', Value: instanceId }];

  const alarms: PutMetricAlarmCommandInput[] = [
    {
      AlarmName: `${stackName}-cpu-high`,
      AlarmDescription: `CPU above ${options.cpuThreshold}% on ${instanceId}`,
      Namespace: 'AWS/EC2',
      MetricName: 'CPUUtilization',
      Statistic: 'Average',
      Period: 300,
      EvaluationPeriods: 2,
      Threshold: options.cpuThreshold,
      ComparisonOperator: 'GreaterThanThreshold',
      Dimensions: dimensions,
    },
    {
      AlarmName: `${stackName}-status-check`,
      AlarmDescription: `Status check failed on ${instanceId}`,
      Namespace: 'AWS/EC2',
      MetricName: 'StatusCheckFailed',
      Statistic: 'Maximum',
      Period: 60,
      EvaluationPeriods: 2,
      Threshold: 1,
      ComparisonOperator: 'GreaterThanOrEqualToThreshold',
      Dimensions: dimensions,
    },
  ];

  if (options.spot) {
    alarms.push({
      AlarmName: `${stackName}-spot-interruption`,
      AlarmDescription: `Spot instance ${instanceId} stopped responding`,
      Namespace: 'AWS/EC2',
      MetricName: 'StatusCheckFailed_Instance',
      Statistic: 'Maximum',
      Period: 60,
      EvaluationPeriods: 1,
      Threshold: 1,
      ComparisonOperator: 'GreaterThanOrEqualToThreshold',
      Dimensions: dimensions,
    });
  }

  return alarms;
}

/**
 * Dashboard body with CPU, network and status widgets
 */
export function buildDashboardBody(instanceId: string, region: string): string {
  const widget = (title: string, metrics: string[][], x: number, y: number) => ({
    type: 'metric',
    x,
    y,
    width: 12,
    height: 6,
    properties: { title, region, metrics, period: 300, stat: 'Average', view: 'timeSeries' },
  });

  return JSON.stringify({
    widgets: [
      widget('CPU Utilization', [['AWS/EC2', 'CPUUtilization', 'InstanceId', instanceId]], 0, 0),
      widget(
        'Network',
        [
          ['AWS/EC2', 'NetworkIn', 'InstanceId', instanceId],
          ['AWS/EC2', 'NetworkOut', 'InstanceId', instanceId],
        ],
        12,
        0
      ),
      widget('Status Checks', [['AWS/EC2', 'StatusCheckFailed', 'InstanceId', instanceId]], 0, 6),
    ],
  });
}

export class AwsMonitoringProvider implements MonitoringProvider {
  constructor(private readonly region: string) {}

  async setupMonitoring(stackName: string, instanceId: string, options: MonitoringOptions): Promise<MonitoringSetup> {
    const logs = getCloudWatchLogsClient(this.region);
    const cloudWatch = getCloudWatchClient(this.region);

    // Log group
    const groupName = logGroupName(options.logGroupPrefix, stackName);
    await callOnce('CreateLogGroup', async () => {
      try {
        await logs.send(new CreateLogGroupCommand({ logGroupName: groupName, tags: { [STACK_TAG]: stackName } }));
        console.log(`   Created log group: ${groupName}`);
      } catch (e) {
        if (getErrorCode(e) === 'ResourceAlreadyExistsException') return;
        throw e;
      }
    });
    await callOnce('PutRetentionPolicy', () =>
      logs.send(new PutRetentionPolicyCommand({ logGroupName: groupName, retentionInDays: options.retentionDays }))
    );

    // Alarms
    const alarmNames: string[] = [];
    for (const alarm of buildAlarmInputs(stackName, instanceId, options)) {
      await callOnce('PutMetricAlarm', () => cloudWatch.send(new PutMetricAlarmCommand(alarm)));
      if (alarm.AlarmName) alarmNames.push(alarm.AlarmName);
    }
    console.log(`   Created alarms: ${alarmNames.join(', ')}`);

    // Dashboard
    const dashboard = dashboardName(stackName);
    await callOnce('PutDashboard', () =>
      cloudWatch.send(
        new PutDashboardCommand({ DashboardName: dashboard, DashboardBody: buildDashboardBody(instanceId, this.region) })
      )
    );
    console.log(`   Created dashboard: ${dashboard}`);

    return { logGroupName: groupName, alarmNames, dashboardName: dashboard };
  }
}
