import { Pool } from 'pg';
import { StoreError } from '../../middleware/errorHandler';
import {
  buildInsertStatement,
  buildUpdateStatement,
  PgEntityStore,
} from '../../services/entity-store/PgEntityStore';
import { EntityRecordInput } from '../../types/entity';

const input: EntityRecordInput = {
  name: 'Northwind Capital',
  entity_type: 'investor',
  slug: 'northwind-capital',
  website: 'https://northwind.example',
  contact_email: 'Unknown',
  cheque_size_range: '$50k - $250k',
  investment_thesis: 'Climate hardware',
  updated_at: '2026-03-01T10:00:00.000Z',
};

describe('PgEntityStore', () => {
  describe('buildInsertStatement', () => {
    it('should insert only the columns that carry a value, in table order', () => {
      expect(buildInsertStatement('entities', { ...input, created_at: '2026-03-01T10:00:00.000Z' })).toEqual({
        text:
          'INSERT INTO "entities" ("name", "entity_type", "slug", "website", "contact_email", ' +
          '"cheque_size_range", "investment_thesis", "created_at", "updated_at") ' +
          'VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9) RETURNING *',
        values: [
          'Northwind Capital',
          'investor',
          'northwind-capital',
          'https://northwind.example',
          'Unknown',
          '$50k - $250k',
          'Climate hardware',
          '2026-03-01T10:00:00.000Z',
          '2026-03-01T10:00:00.000Z',
        ],
      });
    });
  });

  describe('buildUpdateStatement', () => {
    it('should set the present columns and match on id last', () => {
      const statement = buildUpdateStatement('entities', '42', {
        name: 'Acme',
        entity_type: 'investor',
        slug: 'acme',
        website: 'https://acme.example',
        contact_email: 'team@acme.example',
        updated_at: '2026-03-02T00:00:00.000Z',
      });

      expect(statement).toEqual({
        text:
          'UPDATE "entities" SET "name" = $1, "entity_type" = $2, "slug" = $3, "website" = $4, ' +
          '"contact_email" = $5, "updated_at" = $6 WHERE "id" = $7 RETURNING *',
        values: ['Acme', 'investor', 'acme', 'https://acme.example', 'team@acme.example', '2026-03-02T00:00:00.000Z', '42'],
      });
    });
  });

  describe('queries', () => {
    let pool: Pool;

    beforeEach(() => {
      pool = new Pool();
    });

    afterEach(async () => {
      jest.restoreAllMocks();
      await pool.end();
    });

    it('should reject table names that are not plain identifiers', () => {
      expect(() => new PgEntityStore(pool, 'entities; DROP TABLE x')).toThrow('Invalid table name: entities; DROP TABLE x');
    });

    it('should look records up by website and convert stored values', async () => {
      const query = jest.spyOn(pool, 'query').mockImplementation(async () => ({
        rows: [{
          id: 7,
          name: 'Northwind Capital',
          entity_type: 'investor',
          slug: 'northwind-capital',
          website: 'https://northwind.example',
          description: null,
          created_at: new Date('2026-03-01T10:00:00.000Z'),
          updated_at: new Date('2026-03-02T10:00:00.000Z'),
        }],
      }));
      const store = new PgEntityStore(pool);

      const record = await store.findByWebsite('https://northwind.example');

      expect(query).toHaveBeenCalledWith(
        'SELECT * FROM "entities" WHERE "website" = $1 LIMIT 1',
        ['https://northwind.example']
      );
      expect(record).toEqual({
        id: '7',
        name: 'Northwind Capital',
        entity_type: 'investor',
        slug: 'northwind-capital',
        website: 'https://northwind.example',
        created_at: '2026-03-01T10:00:00.000Z',
        updated_at: '2026-03-02T10:00:00.000Z',
      });
    });

    it('should return null when nothing matches', async () => {
      jest.spyOn(pool, 'query').mockImplementation(async () => ({ rows: [] }));

      expect(await new PgEntityStore(pool).findByWebsite('https://nowhere.example')).toBeNull();
    });

    it('should return the inserted row', async () => {
      jest.spyOn(pool, 'query').mockImplementation(async () => ({
        rows: [{ ...input, id: 'a1b2', created_at: input.updated_at }],
      }));

      const record = await new PgEntityStore(pool, 'organisations').insert(input);

      expect(record?.id).toBe('a1b2');
      expect(record?.cheque_size_range).toBe('$50k - $250k');
    });

    it('should wrap driver errors in a StoreError', async () => {
      jest.spyOn(pool, 'query').mockImplementation(async () => {
        throw new Error('connection terminated');
      });

      await expect(new PgEntityStore(pool).update('1', input))
        .rejects.toThrow(new StoreError('Entity store query failed: connection terminated'));
    });

    it('should reject rows of an unexpected shape', async () => {
      jest.spyOn(pool, 'query').mockImplementation(async () => ({ rows: [{ id: 1 }] }));

      await expect(new PgEntityStore(pool).findByWebsite('https://northwind.example')).rejects.toBeInstanceOf(StoreError);
    });
  });
});
