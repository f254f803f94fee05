/**
 * Report Domain Types - Weekly Traffic Report
 *
 * Core entity and result types shared by the walker, collector, classifier,
 * notification policy, composer and delivery layers.
 */

/**
 * A top-level partition ("agency") discovered under the attachment root
 */
export interface Tenant {
  /** Partition folder name including the namespace, e.g. `tenant=wholesales` */
  id: string;
  /** Identifier with the namespace prefix removed, e.g. `wholesales` */
  displayName: string;
}

export interface Attachment {
  filename: string;
  content: Buffer;
}

export interface SummaryFragment {
  /** Object path relative to the tenant's fragment root */
  label: string;
  content: string;
}

/**
 * Walker output: one entry per tenant, in listing order
 */
export interface DiscoveredTenant {
  tenant: Tenant;
  leafPrefixes: string[];
}

export interface CollectedArtifacts {
  attachments: Attachment[];
  fragments: SummaryFragment[];
}

export interface CollectedTenant extends CollectedArtifacts {
  tenant: Tenant;
}

export enum TenantState {
  HAS_REPORT = 'HAS_REPORT',
  NO_ATTACHMENTS_HAS_SUMMARY = 'NO_ATTACHMENTS_HAS_SUMMARY',
  NO_ATTACHMENTS_NO_SUMMARY = 'NO_ATTACHMENTS_NO_SUMMARY',
}

export enum SystemState {
  NORMAL = 'NORMAL',
  OUTAGE = 'OUTAGE',
}

export interface ClassifiedTenant extends CollectedTenant {
  state: TenantState;
}

export interface Classification {
  tenants: ClassifiedTenant[];
  system: SystemState;
}

export type NotificationKind =
  | 'REPORT'
  | 'TENANT_NO_DATA'
  | 'FALLBACK_NO_DATA_SUMMARY'
  | 'SYSTEM_OUTAGE';

/**
 * Fully composed message, built right before delivery and never persisted
 */
export interface NotificationRecord {
  kind: NotificationKind;
  tenantId: string | null;
  subject: string;
  body: string;
  attachments: Attachment[];
  recipients: string[];
}

export interface DeliveryResult {
  success: boolean;
  hostUsed: string | null;
  errors: string[];
}

export interface RunResult {
  status: 'ok';
  runId: string;
  datePartition: string;
  testMode: boolean;
  systemState: SystemState;
  reportsSent: number;
  reportsSkippedNoRecipients: number;
  tenantNoDataSent: number;
  aggregateNoDataSent: 0 | 1;
  outageSent: 0 | 1;
  tenantsTotal: number;
  tenantsMissingAttachments: number;
  tenantsMissingFragments: number;
}
