/**
 * Artifact Collector
 *
 * Pulls a tenant's two artifact classes from its leaf partitions:
 * - attachments: raw files under the attachment root, passed through byte-for-byte
 * - summary fragments: text files under the parallel fragment root, decoded
 *   and normalised for inclusion in message bodies
 */

import type { StorageLayout } from '../config/reportConfig';
import type { ReportLogger } from '../lib/logger';
import type { ObjectStore } from '../lib/storage/objectStore';
import type { Attachment, CollectedArtifacts, SummaryFragment, Tenant } from '../types/report';
import { lastSegment } from './partitionWalker';

const utf8 = new TextDecoder('utf-8', { fatal: false });

/**
 * Decode as UTF-8 (invalid sequences become U+FFFD), convert CRLF/CR to LF
 * and trim surrounding whitespace.
 */
export function decodeFragmentText(bytes: Uint8Array): string {
  return utf8.decode(bytes).replace(/\r\n/g, '\n').replace(/\r/g, '\n').trim();
}

/**
 * Map a prefix under the attachment root to the same path under the fragment
 * root. Prefixes outside the attachment root are returned unchanged.
 */
export function toFragmentPrefix(prefix: string, layout: StorageLayout): string {
  return prefix.startsWith(layout.attachmentRootPrefix)
    ? layout.fragmentRootPrefix + prefix.slice(layout.attachmentRootPrefix.length)
    : prefix;
}

export class ArtifactCollector {
  constructor(
    private readonly store: ObjectStore,
    private readonly layout: StorageLayout,
    private readonly logger: ReportLogger
  ) {}

  async collect(tenant: Tenant, leafPrefixes: string[]): Promise<CollectedArtifacts> {
    const attachments = await this.collectAttachments(leafPrefixes);
    const fragments = await this.collectFragments(tenant, leafPrefixes);

    this.logger.info('Collected tenant artifacts', {
      tenantId: tenant.id,
      attachments: attachments.length,
      fragments: fragments.length,
    });

    return { attachments, fragments };
  }

  private async collectAttachments(leafPrefixes: string[]): Promise<Attachment[]> {
    const { bucket, attachmentSuffix } = this.layout;
    const attachments: Attachment[] = [];

    for (const leafPrefix of leafPrefixes) {
      const keys = await this.store.listObjectsWithSuffix(bucket, leafPrefix, attachmentSuffix);
      for (const key of keys) {
        attachments.push({
          filename: lastSegment(key),
          content: await this.store.getObject(bucket, key),
        });
      }
    }

    return attachments;
  }

  private async collectFragments(tenant: Tenant, leafPrefixes: string[]): Promise<SummaryFragment[]> {
    const { bucket, fragmentRootPrefix, fragmentSuffix } = this.layout;
    const tenantFragmentRoot = `${fragmentRootPrefix}${tenant.id}/`;
    const fragments: SummaryFragment[] = [];

    for (const leafPrefix of leafPrefixes) {
      const fragmentLeaf = toFragmentPrefix(leafPrefix, this.layout);
      const keys = await this.store.listObjectsWithSuffix(bucket, fragmentLeaf, fragmentSuffix);

      for (const key of keys) {
        const content = decodeFragmentText(await this.store.getObject(bucket, key));
        if (!content) {
          this.logger.debug('Skipping empty summary fragment', { tenantId: tenant.id, key });
          continue;
        }

        const relative = key.startsWith(tenantFragmentRoot)
          ? key.slice(tenantFragmentRoot.length)
          : key;
        fragments.push({ label: relative.replace(/^\/+/, ''), content });
      }
    }

    return fragments;
  }
}
