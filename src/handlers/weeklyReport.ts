/**
 * Weekly Report Handler
 *
 * Scheduled every Monday (UTC). Resolves the date partition, loads and
 * validates configuration, runs the report pipeline and publishes run
 * metrics. Manual invocations may pass `date_partition`, `mode` or
 * `days_ago` in the event.
 */

import { randomUUID } from 'crypto';
import type { Context, Handler } from 'aws-lambda';
import { CloudWatchClient } from '@aws-sdk/client-cloudwatch';
import { S3Client } from '@aws-sdk/client-s3';
import { loadReportConfig, ReportConfig } from '../config/reportConfig';
import { resolveDatePartition } from '../lib/datePartition';
import {
  createLambdaLogger,
  logLambdaCompletion,
  logLambdaError,
  logLambdaInvocation,
  ReportLogger,
} from '../lib/logger';
import { publishRunMetrics } from '../lib/monitoring/reportMetrics';
import { ObjectStore, S3ObjectStore } from '../lib/storage/objectStore';
import { DeliveryService } from '../services/deliveryService';
import { NotificationDeliverer, runWeeklyReport } from '../services/reportRunner';
import type { RunResult } from '../types/report';

const FUNCTION_NAME = 'weeklyReport';

export interface HandlerDependencies {
  env: Record<string, string | undefined>;
  now: () => Date;
  createStore: (config: ReportConfig) => ObjectStore;
  createDelivery: (config: ReportConfig, logger: ReportLogger) => NotificationDeliverer;
  cloudwatch: CloudWatchClient;
}

const defaultDependencies = (): HandlerDependencies => ({
  env: process.env,
  now: () => new Date(),
  createStore: (config) => new S3ObjectStore(new S3Client({ region: config.region })),
  createDelivery: (config, logger) =>
    new DeliveryService(config.relay, config.content.sender, logger),
  cloudwatch: new CloudWatchClient({ region: process.env['AWS_REGION'] || 'us-east-1' }),
});

export function buildWeeklyReportHandler(
  deps: HandlerDependencies
): (event: unknown, context: Pick<Context, 'awsRequestId'>) => Promise<RunResult> {
  return async (event, context) => {
    const runId = randomUUID();
    const logger = createLambdaLogger(context.awsRequestId).child({ runId });
    logLambdaInvocation(FUNCTION_NAME, event, context.awsRequestId);

    const startedAt = deps.now();

    try {
      const config = loadReportConfig(deps.env);
      const datePartition = resolveDatePartition(event, startedAt, config.testMode ? config.testDatePartition : undefined);
      logger.info('Using date partition', { datePartition, testMode: config.testMode });

      const result = await runWeeklyReport(
        {
          config,
          store: deps.createStore(config),
          delivery: deps.createDelivery(config, logger),
          logger,
        },
        { runId, datePartition }
      );

      const completedAt = deps.now();
      await publishRunMetrics(deps.cloudwatch, { runId, startedAt, completedAt, outcome: 'success', result }, logger);
      logLambdaCompletion(FUNCTION_NAME, completedAt.getTime() - startedAt.getTime(), context.awsRequestId);
      return result;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.error('Weekly report run failed', error);
      logLambdaError(FUNCTION_NAME, error, context.awsRequestId);
      await publishRunMetrics(
        deps.cloudwatch,
        { runId, startedAt, completedAt: deps.now(), outcome: 'failure' },
        logger
      );
      throw error;
    }
  };
}

let lazyHandler: ReturnType<typeof buildWeeklyReportHandler> | undefined;

export const handler: Handler<unknown, RunResult> = async (event, context) => {
  lazyHandler ??= buildWeeklyReportHandler(defaultDependencies());
  return lazyHandler(event, context);
};

export default handler;
