/**
 * Recipient Directory
 *
 * Resolves a tenant's explicitly mapped addresses. Production maps live in a
 * JSON document in S3; test mode uses the inline TEST_RECIPIENT_MAP instead.
 *
 * Map values are decoded once into a tagged union and resolved to a plain
 * address list, so the policy layer never sees raw JSON shapes.
 */

import { z } from 'zod';
import type { ReportConfig } from '../config/reportConfig';
import { RecipientMapError } from '../lib/errors';
import type { ReportLogger } from '../lib/logger';
import type { ObjectStore } from '../lib/storage/objectStore';

export type RecipientEntry =
  | { kind: 'single'; address: string }
  | { kind: 'many'; addresses: string[] }
  | { kind: 'empty'; reason?: string };

export interface RecipientDirectory {
  /** Explicit addresses for the tenant; empty when unmapped */
  lookupRecipients(tenantId: string): string[];
  readonly size: number;
}

export class StaticRecipientDirectory implements RecipientDirectory {
  constructor(private readonly entries: ReadonlyMap<string, string[]>) {}

  lookupRecipients(tenantId: string): string[] {
    return [...(this.entries.get(tenantId) ?? [])];
  }

  get size(): number {
    return this.entries.size;
  }
}

const recipientMapSchema = z.record(z.unknown());

export function parseRecipientEntry(value: unknown): RecipientEntry {
  if (typeof value === 'string') {
    const address = value.trim();
    return address ? { kind: 'single', address } : { kind: 'empty' };
  }

  if (Array.isArray(value)) {
    const addresses = value
      .filter((item): item is string => typeof item === 'string')
      .map((item) => item.trim())
      .filter(Boolean);
    return addresses.length > 0 ? { kind: 'many', addresses } : { kind: 'empty' };
  }

  return {
    kind: 'empty',
    reason: `unsupported value type ${value === null ? 'null' : typeof value}`,
  };
}

export function resolveRecipientEntry(entry: RecipientEntry): string[] {
  switch (entry.kind) {
    case 'single':
      return [entry.address];
    case 'many':
      return [...entry.addresses];
    case 'empty':
      return [];
  }
}

/**
 * Validate the top-level shape and resolve every value to an address list.
 *
 * @throws RecipientMapError when the document is not a JSON object
 */
export function normalizeRecipientMap(
  raw: unknown,
  location: string,
  logger: ReportLogger
): Map<string, string[]> {
  const parsed = recipientMapSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RecipientMapError(location, 'recipient map JSON must be an object at top level');
  }

  const normalized = new Map<string, string[]>();
  for (const [tenantId, value] of Object.entries(parsed.data)) {
    const entry = parseRecipientEntry(value);
    if (entry.kind === 'empty' && entry.reason) {
      logger.warn('Ignoring recipient map entry', { tenantId, location, reason: entry.reason });
    }
    normalized.set(tenantId, resolveRecipientEntry(entry));
  }
  return normalized;
}

export function parseRecipientMapDocument(
  text: string,
  location: string,
  logger: ReportLogger
): Map<string, string[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new RecipientMapError(
      location,
      `malformed JSON: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }
  return normalizeRecipientMap(raw, location, logger);
}

/**
 * Build the directory for this run according to the test/production switch.
 */
export async function loadRecipientDirectory(
  config: ReportConfig,
  store: ObjectStore,
  logger: ReportLogger
): Promise<RecipientDirectory> {
  if (config.testMode) {
    const entries = normalizeRecipientMap(config.testRecipientMap, 'env:TEST_RECIPIENT_MAP', logger);
    logger.info('Loaded test recipient map', { entries: entries.size });
    return new StaticRecipientDirectory(entries);
  }

  if (!config.recipientMap) {
    throw new RecipientMapError('s3://(unset)', 'recipient map location is not configured');
  }

  const { bucket, key } = config.recipientMap;
  const location = `s3://${bucket}/${key}`;

  let document: Buffer;
  try {
    document = await store.getObject(bucket, key);
  } catch (error) {
    throw new RecipientMapError(
      location,
      error instanceof Error ? error.message : 'unreachable',
      error
    );
  }

  const entries = parseRecipientMapDocument(document.toString('utf-8'), location, logger);
  logger.info('Loaded recipient map', { location, entries: entries.size });
  return new StaticRecipientDirectory(entries);
}
