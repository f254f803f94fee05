/**
 * Partition Walker
 *
 * Enumerates tenant → channel → ip-version → ip-field under a root prefix,
 * one listing call per level, and derives the date-scoped leaf prefix for
 * every ip-field partition found.
 */

import type { StorageLayout } from '../config/reportConfig';
import type { ReportLogger } from '../lib/logger';
import type { ObjectStore } from '../lib/storage/objectStore';
import type { DiscoveredTenant, Tenant } from '../types/report';

/**
 * Strip the tenant namespace: `tenant=wholesales` → `wholesales`.
 * Identifiers without the namespace pass through unchanged.
 */
export function toTenantDisplayName(tenantId: string, namespace: string): string {
  return namespace && tenantId.startsWith(namespace) ? tenantId.slice(namespace.length) : tenantId;
}

/**
 * Last path segment of a delimiter-terminated prefix
 */
export function lastSegment(prefix: string): string {
  const parts = prefix.replace(/\/+$/, '').split('/');
  return parts[parts.length - 1] ?? '';
}

export function buildTenant(tenantPrefix: string, namespace: string): Tenant {
  const id = lastSegment(tenantPrefix);
  return { id, displayName: toTenantDisplayName(id, namespace) };
}

export class PartitionWalker {
  constructor(
    private readonly store: ObjectStore,
    private readonly layout: StorageLayout,
    private readonly logger: ReportLogger
  ) {}

  leafPrefixFor(ipFieldPrefix: string, datePartitionValue: string): string {
    return `${ipFieldPrefix}${this.layout.cadencePrefix}${this.layout.datePartitionKey}=${datePartitionValue}/`;
  }

  /**
   * Discover every tenant under `rootPrefix` with its leaf partitions for
   * the given date. Order follows the store's listing order at every level.
   * Listing failures propagate as StorageError.
   */
  async discoverLeafPartitions(
    rootPrefix: string,
    datePartitionValue: string
  ): Promise<DiscoveredTenant[]> {
    const { bucket, tenantNamespace } = this.layout;
    const tenantPrefixes = await this.store.listChildPrefixes(bucket, rootPrefix);
    this.logger.info('Discovered tenants', { rootPrefix, tenants: tenantPrefixes.length });

    const discovered: DiscoveredTenant[] = [];
    for (const tenantPrefix of tenantPrefixes) {
      const tenant = buildTenant(tenantPrefix, tenantNamespace);
      const leafPrefixes: string[] = [];

      for (const channelPrefix of await this.store.listChildPrefixes(bucket, tenantPrefix)) {
        for (const ipVersionPrefix of await this.store.listChildPrefixes(bucket, channelPrefix)) {
          for (const ipFieldPrefix of await this.store.listChildPrefixes(bucket, ipVersionPrefix)) {
            leafPrefixes.push(this.leafPrefixFor(ipFieldPrefix, datePartitionValue));
          }
        }
      }

      this.logger.debug('Resolved leaf partitions', {
        tenantId: tenant.id,
        leafPartitions: leafPrefixes.length,
      });
      discovered.push({ tenant, leafPrefixes });
    }

    return discovered;
  }
}
