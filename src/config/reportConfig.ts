/**
 * Report Configuration
 *
 * Reads the job's environment once, validates it with zod and returns an
 * immutable configuration object that is passed to every component.
 * Nothing else in the codebase reads process.env for job settings.
 */

import { z } from 'zod';
import { ConfigurationError } from '../lib/errors';

export type SmtpMode = 'starttls' | 'ssl' | 'plain';
export type BodyLayout = 'grouped' | 'flat';

export interface StorageLayout {
  bucket: string;
  /** Root holding the attachment (ranked traffic) tree, ends with `/` */
  attachmentRootPrefix: string;
  /** Structurally parallel root holding summary text fragments, ends with `/` */
  fragmentRootPrefix: string;
  cadencePrefix: string;
  datePartitionKey: string;
  tenantNamespace: string;
  attachmentSuffix: string;
  fragmentSuffix: string;
}

export interface RecipientMapLocation {
  bucket: string;
  key: string;
}

export interface RelayConfig {
  /** Relay hosts in failover order; empty entries are kept and skipped at send time */
  hosts: string[];
  port: number;
  mode: SmtpMode;
  user?: string;
  password?: string;
}

export interface FragmentGroup {
  token: string;
  heading: string;
}

export interface ContentConfig {
  productName: string;
  sender: string;
  disclaimer: string;
  introText?: string;
  layout: BodyLayout;
  groups: FragmentGroup[];
}

export interface ReportConfig {
  region: string;
  storage: StorageLayout;
  testMode: boolean;
  testDatePartition?: string;
  recipientMap?: RecipientMapLocation;
  /** Raw TEST_RECIPIENT_MAP JSON, decoded by the recipient directory */
  testRecipientMap: unknown;
  fallbackRecipients: string[];
  relay: RelayConfig;
  content: ContentConfig;
}

export const DEFAULT_DISCLAIMER =
  'This report is generated automatically and is for informational purposes only.';

export const DEFAULT_FRAGMENT_GROUPS: FragmentGroup[] = [
  { token: 'DIPS', heading: 'DNS Traffic by Destination' },
  { token: 'SIPS', heading: 'DNS Traffic by Source' },
];

const TRUTHY = ['1', 'true', 'yes', 'y', 'on'];

const DATE_PARTITION_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * `YYYY-MM-DD` naming a real UTC calendar day (rejects `2024-02-30`)
 */
export function isCalendarDate(value: string): boolean {
  if (!DATE_PARTITION_PATTERN.test(value)) {
    return false;
  }
  const date = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
}

export const datePartitionSchema = z
  .string()
  .refine(isCalendarDate, { message: 'must be a valid YYYY-MM-DD date' });

const trimmed = (fallback = '') =>
  z
    .string()
    .optional()
    .transform((value) => (value ?? fallback).trim() || fallback);

const prefix = (fallback: string) =>
  trimmed(fallback).refine((value) => value.endsWith('/'), {
    message: "must end with '/'",
  });

const optionalText = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

const envSchema = z.object({
  AWS_REGION: trimmed('us-east-1'),
  BUCKET: trimmed('bucketname'),
  ATTACHMENT_ROOT_PREFIX: prefix('dns-bypass-analytic/stat=reports/substat=ranked-traffic/'),
  FRAGMENT_ROOT_PREFIX: prefix('dns-bypass-analytic/stat=reports/substat=summary/'),
  CADENCE_PREFIX: prefix('cadence=week/'),
  DATE_PARTITION_KEY: trimmed('date-partition'),
  TENANT_NAMESPACE: trimmed('tenant='),
  ATTACHMENT_SUFFIX: trimmed('.csv'),
  FRAGMENT_SUFFIX: trimmed('.txt'),
  RECIPIENT_MAP_BUCKET: optionalText,
  RECIPIENT_MAP_KEY: optionalText,
  TEST_MODE: trimmed('false').transform((value) => TRUTHY.includes(value.toLowerCase())),
  TEST_RECIPIENT_MAP: trimmed('{}'),
  TEST_DATE_PARTITION: optionalText.pipe(datePartitionSchema.optional()),
  DEFAULT_EMAIL_TO: trimmed().transform((value) =>
    value
      .split(',')
      .map((address) => address.trim())
      .filter(Boolean)
  ),
  SMTP_HOST_1: trimmed(),
  SMTP_HOST_2: trimmed(),
  SMTP_PORT: trimmed('587').pipe(z.coerce.number().int().positive()),
  SMTP_MODE: trimmed('starttls')
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(['starttls', 'ssl', 'plain'])),
  SMTP_USER: optionalText,
  SMTP_PASS: z.string().optional(),
  MAIL_FROM: trimmed().refine(Boolean, { message: 'is required' }),
  DISCLAIMER_TEXT: trimmed(DEFAULT_DISCLAIMER),
  PRODUCT_NAME: trimmed('DNS Service Bypass'),
  EMAIL_INTRO_TEXT: optionalText,
  BODY_LAYOUT: trimmed('grouped').pipe(z.enum(['grouped', 'flat'])),
});

type ParsedEnv = z.infer<typeof envSchema>;

function parseTestRecipientMap(raw: string, issues: string[]): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    issues.push(`TEST_RECIPIENT_MAP: ${error instanceof Error ? error.message : String(error)}`);
    return {};
  }
}

function buildConfig(env: ParsedEnv, issues: string[]): ReportConfig {
  const hosts = [env.SMTP_HOST_1, env.SMTP_HOST_2];
  if (!hosts.some(Boolean)) {
    issues.push('SMTP_HOST_1/SMTP_HOST_2: set at least one relay host');
  }

  let recipientMap: RecipientMapLocation | undefined;
  if (env.RECIPIENT_MAP_BUCKET && env.RECIPIENT_MAP_KEY) {
    recipientMap = { bucket: env.RECIPIENT_MAP_BUCKET, key: env.RECIPIENT_MAP_KEY };
  } else if (!env.TEST_MODE) {
    issues.push('RECIPIENT_MAP_BUCKET/RECIPIENT_MAP_KEY: required outside test mode');
  }

  return {
    region: env.AWS_REGION,
    storage: {
      bucket: env.BUCKET,
      attachmentRootPrefix: env.ATTACHMENT_ROOT_PREFIX,
      fragmentRootPrefix: env.FRAGMENT_ROOT_PREFIX,
      cadencePrefix: env.CADENCE_PREFIX,
      datePartitionKey: env.DATE_PARTITION_KEY,
      tenantNamespace: env.TENANT_NAMESPACE,
      attachmentSuffix: env.ATTACHMENT_SUFFIX,
      fragmentSuffix: env.FRAGMENT_SUFFIX,
    },
    testMode: env.TEST_MODE,
    testDatePartition: env.TEST_DATE_PARTITION,
    recipientMap,
    testRecipientMap: env.TEST_MODE ? parseTestRecipientMap(env.TEST_RECIPIENT_MAP, issues) : {},
    fallbackRecipients: env.DEFAULT_EMAIL_TO,
    relay: {
      hosts,
      port: env.SMTP_PORT,
      mode: env.SMTP_MODE,
      user: env.SMTP_USER,
      password: env.SMTP_PASS,
    },
    content: {
      productName: env.PRODUCT_NAME,
      sender: env.MAIL_FROM,
      disclaimer: env.DISCLAIMER_TEXT,
      introText: env.EMAIL_INTRO_TEXT,
      layout: env.BODY_LAYOUT,
      groups: DEFAULT_FRAGMENT_GROUPS.map((group) => ({ ...group })),
    },
  };
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Parse and validate the job configuration.
 *
 * @throws ConfigurationError listing every problem found
 *
 * @example
 * const config = loadReportConfig(process.env);
 */
export function loadReportConfig(
  env: Record<string, string | undefined>
): Readonly<ReportConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const issues: string[] = [];
  const config = buildConfig(parsed.data, issues);
  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  return deepFreeze(config);
}

/**
 * Summary of where the run reads from, logged before any storage access
 */
export function describeConfig(config: ReportConfig): Record<string, unknown> {
  return {
    mode: config.testMode ? 'TEST' : 'PROD',
    recipientSource: config.testMode
      ? 'ENV:TEST_RECIPIENT_MAP'
      : `s3://${config.recipientMap?.bucket}/${config.recipientMap?.key}`,
    bucket: config.storage.bucket,
    attachmentRootPrefix: config.storage.attachmentRootPrefix,
    fragmentRootPrefix: config.storage.fragmentRootPrefix,
    cadencePrefix: config.storage.cadencePrefix,
    relayHosts: config.relay.hosts.filter(Boolean),
    fallbackRecipients: config.fallbackRecipients.length,
  };
}
