/**
 * Report Run Metrics
 *
 * CloudWatch metrics and structured run events for the weekly report job.
 */

import {
  CloudWatchClient,
  MetricDatum,
  PutMetricDataCommand,
  StandardUnit,
} from '@aws-sdk/client-cloudwatch';
import type { ReportLogger } from '../logger';
import type { RunResult } from '../../types/report';

export const METRICS_NAMESPACE = 'TrafficReports/Weekly';

export interface RunMetrics {
  runId: string;
  startedAt: Date;
  completedAt: Date;
  outcome: 'success' | 'failure';
  result?: RunResult;
}

export function buildMetricData(metrics: RunMetrics): MetricDatum[] {
  const timestamp = metrics.completedAt;
  const dimensions = [{ Name: 'Outcome', Value: metrics.outcome }];
  const count = (name: string, value: number): MetricDatum => ({
    MetricName: name,
    Dimensions: dimensions,
    Value: value,
    Unit: StandardUnit.Count,
    Timestamp: timestamp,
  });

  const data: MetricDatum[] = [
    {
      MetricName: 'RunDuration',
      Dimensions: dimensions,
      Value: metrics.completedAt.getTime() - metrics.startedAt.getTime(),
      Unit: StandardUnit.Milliseconds,
      Timestamp: timestamp,
    },
    count('RunFailed', metrics.outcome === 'failure' ? 1 : 0),
  ];

  const { result } = metrics;
  if (result) {
    data.push(
      count('ReportsSent', result.reportsSent),
      count('ReportsSkippedNoRecipients', result.reportsSkippedNoRecipients),
      count('TenantNoDataSent', result.tenantNoDataSent),
      count('AggregateNoDataSent', result.aggregateNoDataSent),
      count('OutageSent', result.outageSent),
      count('TenantsTotal', result.tenantsTotal),
      count('TenantsMissingAttachments', result.tenantsMissingAttachments),
      count('TenantsMissingFragments', result.tenantsMissingFragments)
    );
  }

  return data;
}

/**
 * Publish run metrics. Failures are logged and never fail the run.
 */
export async function publishRunMetrics(
  cloudwatch: CloudWatchClient,
  metrics: RunMetrics,
  logger: ReportLogger
): Promise<void> {
  try {
    await cloudwatch.send(
      new PutMetricDataCommand({
        Namespace: METRICS_NAMESPACE,
        MetricData: buildMetricData(metrics),
      })
    );
  } catch (err) {
    logger.warn('Failed to publish CloudWatch metrics', {
      runId: metrics.runId,
      error: err instanceof Error ? err.message : String(err),
    });
  }
}
