/**
 * Builds the NotificationRecord for a planned notification.
 * REPORT is the only kind that carries attachments.
 */

import {
  buildFallbackNoDataBody,
  buildOutageBody,
  buildReportBody,
  buildSubject,
  buildTenantNoDataBody,
  TemplateContext,
} from '../lib/email/templates/reportTemplates';
import type { NotificationRecord } from '../types/report';
import type { PlannedNotification } from './notificationPolicy';

export function composeNotification(
  planned: PlannedNotification,
  context: TemplateContext
): NotificationRecord {
  switch (planned.kind) {
    case 'REPORT': {
      const { tenant, attachments, fragments } = planned.tenant;
      return {
        kind: planned.kind,
        tenantId: tenant.id,
        subject: buildSubject({ kind: planned.kind, tenant }, context),
        body: buildReportBody(fragments, attachments, context),
        attachments,
        recipients: planned.recipients,
      };
    }
    case 'TENANT_NO_DATA': {
      const { tenant, fragments } = planned.tenant;
      return {
        kind: planned.kind,
        tenantId: tenant.id,
        subject: buildSubject({ kind: planned.kind, tenant }, context),
        body: buildTenantNoDataBody(fragments, context),
        attachments: [],
        recipients: planned.recipients,
      };
    }
    case 'FALLBACK_NO_DATA_SUMMARY':
      return {
        kind: planned.kind,
        tenantId: null,
        subject: buildSubject({ kind: planned.kind }, context),
        body: buildFallbackNoDataBody(planned.missingAttachments, planned.missingFragments, context),
        attachments: [],
        recipients: planned.recipients,
      };
    case 'SYSTEM_OUTAGE':
      return {
        kind: planned.kind,
        tenantId: null,
        subject: buildSubject({ kind: planned.kind }, context),
        body: buildOutageBody(planned.tenants, context),
        attachments: [],
        recipients: planned.recipients,
      };
  }
}
