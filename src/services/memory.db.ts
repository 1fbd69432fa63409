/**
 * MemoryStore Database Adapters
 * Implements MemoryStoreDb using Supabase, or in-process for local runs
 *
 * Table: memory_records (id text primary key, text text, vector float8[],
 *        metadata jsonb, created_at timestamptz)
 *
 * Records are insert-only; there is no update path.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { MemoryRecord, MetadataValue } from '@/types/index.js';

import type { MemoryStoreDb } from './memory.service.js';

/**
 * Database row type
 */
interface MemoryRecordRow {
  id: string;
  text: string;
  vector: number[];
  metadata: Record<string, MetadataValue> | null;
  created_at: string;
}

/**
 * Map database row to MemoryRecord
 */
function mapRowToRecord(row: MemoryRecordRow): MemoryRecord {
  return {
    id: row.id,
    text: row.text,
    vector: row.vector,
    metadata: row.metadata ?? {},
    createdAt: new Date(row.created_at),
  };
}

/**
 * PostgREST caps a response at max-rows (1000 by default)
 */
export const MEMORY_LOAD_PAGE_SIZE = 1000;

/**
 * Create MemoryStoreDb implementation using Supabase
 */
export function createMemoryStoreDb(
  supabase: SupabaseClient,
  pageSize: number = MEMORY_LOAD_PAGE_SIZE
): MemoryStoreDb {
  return {
    /**
     * Load every record, oldest first, one page at a time
     */
    async loadRecords(): Promise<MemoryRecord[]> {
      const records: MemoryRecord[] = [];

      for (let from = 0; ; from += pageSize) {
        const { data, error } = await supabase
          .from('memory_records')
          .select('*')
          .order('created_at', { ascending: true })
          .order('id', { ascending: true })
          .range(from, from + pageSize - 1);

        if (error !== null) {
          throw new Error(`Failed to load memory records: ${error.message}`);
        }

        const rows = (data ?? []) as MemoryRecordRow[];
        records.push(...rows.map(mapRowToRecord));
        if (rows.length < pageSize) {
          return records;
        }
      }
    },

    /**
     * Insert a record
     */
    async insertRecord(record: MemoryRecord): Promise<void> {
      const { error } = await supabase.from('memory_records').insert({
        id: record.id,
        text: record.text,
        vector: [...record.vector],
        metadata: record.metadata,
        created_at: record.createdAt.toISOString(),
      });

      if (error !== null) {
        throw new Error(`Failed to insert memory record: ${error.message}`);
      }
    },

    /**
     * Delete a record, reporting whether a row was removed
     */
    async deleteRecord(id: string): Promise<boolean> {
      const { data, error } = await supabase
        .from('memory_records')
        .delete()
        .eq('id', id)
        .select('id');

      if (error !== null) {
        throw new Error(`Failed to delete memory record: ${error.message}`);
      }

      return (data ?? []).length > 0;
    },
  };
}

/**
 * In-process MemoryStoreDb. Holds nothing beyond the process lifetime.
 */
export function createInMemoryMemoryDb(
  seed: MemoryRecord[] = []
): MemoryStoreDb {
  const rows = new Map<string, MemoryRecord>(
    seed.map((record) => [record.id, record])
  );

  return {
    async loadRecords(): Promise<MemoryRecord[]> {
      return [...rows.values()];
    },

    async insertRecord(record: MemoryRecord): Promise<void> {
      if (rows.has(record.id)) {
        throw new Error(`Memory record already exists: ${record.id}`);
      }
      rows.set(record.id, record);
    },

    async deleteRecord(id: string): Promise<boolean> {
      return rows.delete(id);
    },
  };
}
