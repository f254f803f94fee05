/**
 * Notification Policy
 *
 * Turns a classification into an ordered delivery plan.
 *
 * OUTAGE is absorbing: at most one SYSTEM_OUTAGE notification and nothing
 * else. NORMAL runs plan, in order, REPORT per tenant with attachments,
 * TENANT_NO_DATA per no-attachment tenant with an explicit mapping, and one
 * FALLBACK_NO_DATA_SUMMARY to the fallback list. Counters downstream rely on
 * that order.
 */

import {
  Classification,
  ClassifiedTenant,
  SystemState,
  Tenant,
  TenantState,
} from '../types/report';
import { lacksAttachments, lacksFragments } from './completenessClassifier';
import type { RecipientDirectory } from './recipientDirectory';

export type RecipientSource = 'explicit' | 'fallback';

export type PlannedNotification =
  | {
      kind: 'REPORT';
      tenant: ClassifiedTenant;
      recipients: string[];
      recipientSource: RecipientSource;
    }
  | {
      kind: 'TENANT_NO_DATA';
      tenant: ClassifiedTenant;
      recipients: string[];
    }
  | {
      kind: 'FALLBACK_NO_DATA_SUMMARY';
      missingAttachments: Tenant[];
      missingFragments: Tenant[];
      recipients: string[];
    }
  | {
      kind: 'SYSTEM_OUTAGE';
      tenants: Tenant[];
      recipients: string[];
    };

export type SkipReason = 'NO_RECIPIENTS' | 'NO_EXPLICIT_MAPPING' | 'NO_FALLBACK_RECIPIENTS';

export interface SkippedNotification {
  kind: PlannedNotification['kind'];
  tenantId: string | null;
  reason: SkipReason;
}

export interface NotificationPlan {
  systemState: SystemState;
  notifications: PlannedNotification[];
  skipped: SkippedNotification[];
}

function planOutage(
  tenants: ClassifiedTenant[],
  fallbackRecipients: string[]
): NotificationPlan {
  if (fallbackRecipients.length === 0) {
    return {
      systemState: SystemState.OUTAGE,
      notifications: [],
      skipped: [{ kind: 'SYSTEM_OUTAGE', tenantId: null, reason: 'NO_FALLBACK_RECIPIENTS' }],
    };
  }

  return {
    systemState: SystemState.OUTAGE,
    notifications: [
      {
        kind: 'SYSTEM_OUTAGE',
        tenants: tenants.map(({ tenant }) => tenant),
        recipients: [...fallbackRecipients],
      },
    ],
    skipped: [],
  };
}

function planNormal(
  tenants: ClassifiedTenant[],
  directory: RecipientDirectory,
  fallbackRecipients: string[]
): NotificationPlan {
  const notifications: PlannedNotification[] = [];
  const skipped: SkippedNotification[] = [];

  for (const entry of tenants.filter((tenant) => tenant.state === TenantState.HAS_REPORT)) {
    const explicit = directory.lookupRecipients(entry.tenant.id);
    if (explicit.length > 0) {
      notifications.push({ kind: 'REPORT', tenant: entry, recipients: explicit, recipientSource: 'explicit' });
    } else if (fallbackRecipients.length > 0) {
      notifications.push({
        kind: 'REPORT',
        tenant: entry,
        recipients: [...fallbackRecipients],
        recipientSource: 'fallback',
      });
    } else {
      skipped.push({ kind: 'REPORT', tenantId: entry.tenant.id, reason: 'NO_RECIPIENTS' });
    }
  }

  const missingAttachments = tenants.filter(lacksAttachments);

  for (const entry of missingAttachments) {
    const explicit = directory.lookupRecipients(entry.tenant.id);
    if (explicit.length > 0) {
      notifications.push({ kind: 'TENANT_NO_DATA', tenant: entry, recipients: explicit });
    } else {
      skipped.push({ kind: 'TENANT_NO_DATA', tenantId: entry.tenant.id, reason: 'NO_EXPLICIT_MAPPING' });
    }
  }

  if (missingAttachments.length > 0) {
    if (fallbackRecipients.length > 0) {
      notifications.push({
        kind: 'FALLBACK_NO_DATA_SUMMARY',
        missingAttachments: missingAttachments.map(({ tenant }) => tenant),
        missingFragments: tenants.filter(lacksFragments).map(({ tenant }) => tenant),
        recipients: [...fallbackRecipients],
      });
    } else {
      skipped.push({ kind: 'FALLBACK_NO_DATA_SUMMARY', tenantId: null, reason: 'NO_FALLBACK_RECIPIENTS' });
    }
  }

  return { systemState: SystemState.NORMAL, notifications, skipped };
}

export function planNotifications(
  classification: Classification,
  directory: RecipientDirectory,
  fallbackRecipients: string[]
): NotificationPlan {
  return classification.system === SystemState.OUTAGE
    ? planOutage(classification.tenants, fallbackRecipients)
    : planNormal(classification.tenants, directory, fallbackRecipients);
}
