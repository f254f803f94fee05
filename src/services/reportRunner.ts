/**
 * Weekly Report Runner
 *
 * Runs the pipeline strictly in sequence: recipient directory, partition
 * discovery, artifact collection, classification, notification planning,
 * then composition and delivery in plan order. Any fatal error aborts the
 * run; nothing is sent for a traversal that failed part-way.
 */

import { describeConfig, ReportConfig } from '../config/reportConfig';
import type { TemplateContext } from '../lib/email/templates/reportTemplates';
import type { ReportLogger } from '../lib/logger';
import type { ObjectStore } from '../lib/storage/objectStore';
import type { CollectedTenant, DeliveryResult, NotificationRecord, RunResult } from '../types/report';
import { ArtifactCollector } from './artifactCollector';
import { classify, lacksAttachments, lacksFragments } from './completenessClassifier';
import { composeNotification } from './notificationComposer';
import { planNotifications } from './notificationPolicy';
import { PartitionWalker } from './partitionWalker';
import { loadRecipientDirectory, RecipientDirectory } from './recipientDirectory';

export interface NotificationDeliverer {
  deliver(notification: NotificationRecord): Promise<DeliveryResult>;
}

export interface ReportRunnerDeps {
  config: ReportConfig;
  store: ObjectStore;
  delivery: NotificationDeliverer;
  logger: ReportLogger;
  /** Overrides the directory normally loaded per the test/production switch */
  recipientDirectory?: RecipientDirectory;
}

export interface RunOptions {
  runId: string;
  datePartition: string;
}

export async function runWeeklyReport(deps: ReportRunnerDeps, options: RunOptions): Promise<RunResult> {
  const { config, store, delivery, logger } = deps;
  const { runId, datePartition } = options;
  const { storage } = config;

  logger.info('Report configuration', { runId, datePartition, ...describeConfig(config) });

  const directory = deps.recipientDirectory ?? (await loadRecipientDirectory(config, store, logger));

  const walker = new PartitionWalker(store, storage, logger);
  const collector = new ArtifactCollector(store, storage, logger);

  const discovered = await walker.discoverLeafPartitions(storage.attachmentRootPrefix, datePartition);
  if (discovered.length === 0) {
    logger.warn('No tenants discovered; check the attachment root prefix', {
      bucket: storage.bucket,
      attachmentRootPrefix: storage.attachmentRootPrefix,
    });
  }

  const collected: CollectedTenant[] = [];
  for (const { tenant, leafPrefixes } of discovered) {
    collected.push({ tenant, ...(await collector.collect(tenant, leafPrefixes)) });
  }

  const classification = classify(collected);
  const plan = planNotifications(classification, directory, config.fallbackRecipients);

  for (const skip of plan.skipped) {
    logger.warn('Notification skipped', { ...skip });
  }

  const context: TemplateContext = {
    content: config.content,
    datePartition,
    datePartitionKey: storage.datePartitionKey,
    sourceLocation: `s3://${storage.bucket}/${storage.attachmentRootPrefix}`,
  };

  const result: RunResult = {
    status: 'ok',
    runId,
    datePartition,
    testMode: config.testMode,
    systemState: plan.systemState,
    reportsSent: 0,
    reportsSkippedNoRecipients: plan.skipped.filter((skip) => skip.reason === 'NO_RECIPIENTS').length,
    tenantNoDataSent: 0,
    aggregateNoDataSent: 0,
    outageSent: 0,
    tenantsTotal: classification.tenants.length,
    tenantsMissingAttachments: classification.tenants.filter(lacksAttachments).length,
    tenantsMissingFragments: classification.tenants.filter(lacksFragments).length,
  };

  for (const planned of plan.notifications) {
    const notification = composeNotification(planned, context);
    const delivered = await delivery.deliver(notification);

    logger.info('Notification sent', {
      kind: notification.kind,
      tenantId: notification.tenantId,
      recipients: notification.recipients,
      attachments: notification.attachments.length,
      host: delivered.hostUsed,
      datePartition,
    });

    switch (notification.kind) {
      case 'REPORT':
        result.reportsSent += 1;
        break;
      case 'TENANT_NO_DATA':
        result.tenantNoDataSent += 1;
        break;
      case 'FALLBACK_NO_DATA_SUMMARY':
        result.aggregateNoDataSent = 1;
        break;
      case 'SYSTEM_OUTAGE':
        result.outageSent = 1;
        break;
    }
  }

  logger.info('Report run completed', { ...result });
  return result;
}
