/**
 * Report Email Templates
 *
 * Subject and plain-text body for each notification kind. Subjects depend
 * only on the product name, tenant display name and date partition, never on
 * fragment or attachment contents.
 */

import type { ContentConfig } from '../../../config/reportConfig';
import type { Attachment, SummaryFragment, Tenant } from '../../../types/report';
import { reportFooter, withFooter } from './reportFooter';
import { renderSummarySection } from './summarySection';

export interface TemplateContext {
  content: ContentConfig;
  datePartition: string;
  datePartitionKey: string;
  /** Where attachments were searched, e.g. `s3://bucket/root/` */
  sourceLocation: string;
}

export type SubjectInput =
  | { kind: 'REPORT' | 'TENANT_NO_DATA'; tenant: Tenant }
  | { kind: 'FALLBACK_NO_DATA_SUMMARY' | 'SYSTEM_OUTAGE' };

export function buildSubject(input: SubjectInput, context: TemplateContext): string {
  const base = `${context.content.productName} Weekly Report`;
  const partition = `${context.datePartitionKey}=${context.datePartition}`;

  switch (input.kind) {
    case 'REPORT':
      return `${base} ${input.tenant.displayName}`;
    case 'TENANT_NO_DATA':
      return `${base} - NO DATA ${input.tenant.displayName}`;
    case 'SYSTEM_OUTAGE':
      return `${base} - NO DATA (ALL AGENCIES) ${partition}`;
    case 'FALLBACK_NO_DATA_SUMMARY':
      return `${base} - NO DATA (${partition})`;
  }
}

const footerFor = (context: TemplateContext): string =>
  reportFooter(context.content.sender, context.content.disclaimer);

const tenantLines = (tenants: Tenant[]): string =>
  tenants.length > 0 ? tenants.map((tenant) => `Tenant: ${tenant.displayName}`).join('\n') : 'None';

export function buildReportBody(
  fragments: SummaryFragment[],
  attachments: Attachment[],
  context: TemplateContext
): string {
  const { layout, groups, introText } = context.content;
  return withFooter(
    [introText, renderSummarySection(layout, groups, fragments, attachments)],
    footerFor(context)
  );
}

export function buildTenantNoDataBody(fragments: SummaryFragment[], context: TemplateContext): string {
  const { layout, groups, introText, productName } = context.content;
  const lead =
    fragments.length > 0
      ? `There is no ${productName} traffic report data for this week. A summary report is included below.`
      : `There is no ${productName} traffic report data for this week and no summary report.`;

  return withFooter(
    [introText, lead, renderSummarySection(layout, groups, fragments, null)],
    footerFor(context)
  );
}

export function buildOutageBody(tenants: Tenant[], context: TemplateContext): string {
  const partition = `${context.datePartitionKey}=${context.datePartition}`;
  return withFooter(
    [
      [
        'NO DATA DETAILS:',
        `No report files or summary files were found for ANY tenant for ${partition} under ${context.sourceLocation}`,
      ].join('\n'),
      ['Tenants checked:', tenantLines(tenants)].join('\n'),
    ],
    footerFor(context)
  );
}

export function buildFallbackNoDataBody(
  missingAttachments: Tenant[],
  missingFragments: Tenant[],
  context: TemplateContext
): string {
  const partition = `${context.datePartitionKey}=${context.datePartition}`;
  return withFooter(
    [
      [
        'NO DATA DETAILS:',
        `Tenants missing report attachments for ${partition}:`,
        tenantLines(missingAttachments),
      ].join('\n'),
      [
        'SUMMARY NO DATA DETAILS:',
        `Tenants missing summary files for ${partition}:`,
        tenantLines(missingFragments),
      ].join('\n'),
    ],
    footerFor(context)
  );
}
