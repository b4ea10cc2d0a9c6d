import { randomUUID } from 'node:crypto';

import type {
  CreateHealthCheckInput,
  HealthCheckRecord,
  HealthCheckRepository,
  ListHealthChecksInput
} from './health-check-repository.js';

export class InMemoryHealthCheckRepository implements HealthCheckRepository {
  private readonly records: HealthCheckRecord[] = [];

  public async createRecord(input: CreateHealthCheckInput): Promise<HealthCheckRecord> {
    const record: HealthCheckRecord = {
      id: randomUUID(),
      ...structuredClone(input)
    };

    this.records.push(record);
    return structuredClone(record);
  }

  public async findLatestRecord(tenantId: string): Promise<HealthCheckRecord | null> {
    const [latest] = this.sortedFor(tenantId);
    return latest === undefined ? null : structuredClone(latest);
  }

  public async listRecords(input: ListHealthChecksInput): Promise<HealthCheckRecord[]> {
    const { from, to } = input;

    return this.sortedFor(input.tenantId)
      .filter((record) => from === undefined || record.checkedAt.getTime() >= from.getTime())
      .filter((record) => to === undefined || record.checkedAt.getTime() <= to.getTime())
      .slice(0, input.limit)
      .map((record) => structuredClone(record));
  }

  private sortedFor(tenantId: string): HealthCheckRecord[] {
    // insertion order breaks ties between equal timestamps
    return this.records
      .map((record, index) => ({ record, index }))
      .filter(({ record }) => record.tenantId === tenantId)
      .sort((left, right) => right.record.checkedAt.getTime() - left.record.checkedAt.getTime() || right.index - left.index)
      .map(({ record }) => record);
  }
}
