import { EntityRecord, EntityRecordInput } from '../../types/entity';

/**
 * Persistence for entity records, unique by `website`.
 * Writes resolve to null when the store reports no affected row.
 */
export interface IEntityStore {
  findByWebsite(website: string): Promise<EntityRecord | null>;
  insert(record: EntityRecordInput): Promise<EntityRecord | null>;
  update(id: string, record: EntityRecordInput): Promise<EntityRecord | null>;
}
