/**
 * Completeness Classifier
 *
 * Derives each tenant's data completeness and the run-wide system state.
 * Pure: the same collected data always yields the same classification.
 */

import {
  Classification,
  ClassifiedTenant,
  CollectedArtifacts,
  CollectedTenant,
  SystemState,
  TenantState,
} from '../types/report';

export function classifyTenant({ attachments, fragments }: CollectedArtifacts): TenantState {
  if (attachments.length > 0) {
    return TenantState.HAS_REPORT;
  }
  return fragments.length > 0
    ? TenantState.NO_ATTACHMENTS_HAS_SUMMARY
    : TenantState.NO_ATTACHMENTS_NO_SUMMARY;
}

/**
 * OUTAGE only when at least one tenant was discovered and none of them
 * produced an artifact of either class. An empty tenant set stays NORMAL.
 */
export function deriveSystemState(states: TenantState[]): SystemState {
  if (states.length === 0) {
    return SystemState.NORMAL;
  }
  return states.every((state) => state === TenantState.NO_ATTACHMENTS_NO_SUMMARY)
    ? SystemState.OUTAGE
    : SystemState.NORMAL;
}

export function classify(collected: CollectedTenant[]): Classification {
  const tenants: ClassifiedTenant[] = collected.map((entry) => ({
    ...entry,
    state: classifyTenant(entry),
  }));

  return {
    tenants,
    system: deriveSystemState(tenants.map((tenant) => tenant.state)),
  };
}

export const lacksAttachments = (tenant: ClassifiedTenant): boolean =>
  tenant.state !== TenantState.HAS_REPORT;

export const lacksFragments = (tenant: ClassifiedTenant): boolean => tenant.fragments.length === 0;
