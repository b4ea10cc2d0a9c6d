import type { Platform } from '../domain/platform.js';

export interface InventoryItem {
  id: string;
  platform: Platform;
  resourceType: string;
  resourceId: string;
  resourceName: string;
  resourceUrl: string | null;
  tenantId: string | null;
  tenantSlug: string | null;
  isOrphaned: boolean;
  isDrift: boolean;
  discoveredAt: Date;
  lastVerifiedAt: Date;
  metadata: Record<string, unknown>;
  verificationError: string | null;
}

export interface UpsertInventoryItemInput {
  platform: Platform;
  resourceType: string;
  resourceId: string;
  resourceName: string;
  resourceUrl: string | null;
  tenantId: string | null;
  tenantSlug: string | null;
  isOrphaned: boolean;
  metadata: Record<string, unknown>;
  verifiedAt: Date;
}

export interface MarkDriftInput {
  platform: Platform;
  /** Items observed in the current pass; everything else of the platform is drift. */
  seenItemIds: string[];
  /** Restricts drift marking to one tenant's items. */
  tenantSlug?: string;
}

export interface ListInventoryItemsInput {
  platform?: Platform;
  orphanedOnly?: boolean;
  driftOnly?: boolean;
  tenantSlug?: string;
}

/** Items are unique on (platform, resourceType, resourceId). */
export interface InventoryRepository {
  upsertItem(input: UpsertInventoryItemInput): Promise<InventoryItem>;
  markDrift(input: MarkDriftInput): Promise<InventoryItem[]>;
  listItems(input: ListInventoryItemsInput): Promise<InventoryItem[]>;
}
