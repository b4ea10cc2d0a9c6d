import { randomUUID } from 'node:crypto';

import type {
  InventoryItem,
  InventoryRepository,
  ListInventoryItemsInput,
  MarkDriftInput,
  UpsertInventoryItemInput
} from './inventory-repository.js';

function itemKey(item: Pick<InventoryItem, 'platform' | 'resourceType' | 'resourceId'>): string {
  return `${item.platform}\u0000${item.resourceType}\u0000${item.resourceId}`;
}

export class InMemoryInventoryRepository implements InventoryRepository {
  private readonly itemsByKey = new Map<string, InventoryItem>();

  public async upsertItem(input: UpsertInventoryItemInput): Promise<InventoryItem> {
    const key = itemKey(input);
    const existing = this.itemsByKey.get(key);

    const item: InventoryItem = {
      id: existing?.id ?? randomUUID(),
      platform: input.platform,
      resourceType: input.resourceType,
      resourceId: input.resourceId,
      resourceName: input.resourceName,
      resourceUrl: input.resourceUrl,
      tenantId: input.tenantId,
      tenantSlug: input.tenantSlug,
      isOrphaned: input.isOrphaned,
      isDrift: false,
      discoveredAt: existing?.discoveredAt ?? input.verifiedAt,
      lastVerifiedAt: input.verifiedAt,
      metadata: structuredClone(input.metadata),
      verificationError: null
    };

    this.itemsByKey.set(key, item);
    return structuredClone(item);
  }

  public async markDrift(input: MarkDriftInput): Promise<InventoryItem[]> {
    const seen = new Set(input.seenItemIds);
    const marked: InventoryItem[] = [];

    for (const item of this.itemsByKey.values()) {
      if (item.platform !== input.platform || item.isDrift || seen.has(item.id)) {
        continue;
      }

      if (input.tenantSlug !== undefined && item.tenantSlug !== input.tenantSlug) {
        continue;
      }

      item.isDrift = true;
      marked.push(structuredClone(item));
    }

    return marked;
  }

  public async listItems(input: ListInventoryItemsInput): Promise<InventoryItem[]> {
    return [...this.itemsByKey.values()]
      .filter((item) => input.platform === undefined || item.platform === input.platform)
      .filter((item) => input.orphanedOnly !== true || item.isOrphaned)
      .filter((item) => input.driftOnly !== true || item.isDrift)
      .filter((item) => input.tenantSlug === undefined || item.tenantSlug === input.tenantSlug)
      .sort((left, right) => left.platform.localeCompare(right.platform)
        || left.resourceType.localeCompare(right.resourceType)
        || left.resourceId.localeCompare(right.resourceId))
      .map((item) => structuredClone(item));
  }
}
