/**
 * AuditService Database Adapters
 * Implements AuditServiceDb using Supabase, or in-process for local runs
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { nanoid } from 'nanoid';

import type { AuditLog, AuditQueryParams } from '@/types/index.js';

import type { AuditLogEntry, AuditServiceDb } from './audit.service.js';

/**
 * Database row type
 */
interface AuditLogRow {
  id: string;
  timestamp: string;
  action: string;
  resource_type: string;
  resource_id: string | null;
  details: Record<string, unknown> | null;
}

/**
 * Map database row to AuditLog entity
 */
function mapRowToAuditLog(row: AuditLogRow): AuditLog {
  return {
    id: row.id,
    timestamp: new Date(row.timestamp),
    action: row.action,
    resourceType: row.resource_type,
    resourceId: row.resource_id,
    details: row.details ?? {},
  };
}

function toInsertRow(entry: AuditLogEntry): Omit<AuditLogRow, 'id' | 'timestamp'> {
  return {
    action: entry.action,
    resource_type: entry.resourceType,
    resource_id: entry.resourceId,
    details: entry.details,
  };
}

/**
 * Create AuditServiceDb implementation using Supabase
 */
export function createAuditServiceDb(supabase: SupabaseClient): AuditServiceDb {
  return {
    async insertLog(entry: AuditLogEntry): Promise<{ id: string }> {
      const { data, error } = await supabase
        .from('audit_logs')
        .insert(toInsertRow(entry))
        .select('id')
        .single();

      if (error !== null) {
        throw new Error(`Failed to insert audit log: ${error.message}`);
      }

      return { id: (data as { id: string }).id };
    },

    async queryLogs(
      params: AuditQueryParams & { limit: number }
    ): Promise<AuditLog[]> {
      let query = supabase
        .from('audit_logs')
        .select('*')
        .order('timestamp', { ascending: false });

      if (params.action !== undefined) {
        query = query.eq('action', params.action);
      }
      if (params.resourceType !== undefined) {
        query = query.eq('resource_type', params.resourceType);
      }
      if (params.resourceId !== undefined) {
        query = query.eq('resource_id', params.resourceId);
      }
      if (params.since !== undefined) {
        query = query.gte('timestamp', params.since.toISOString());
      }

      const { data, error } = await query.limit(params.limit);

      if (error !== null) {
        throw new Error(`Failed to query audit logs: ${error.message}`);
      }

      return ((data ?? []) as AuditLogRow[]).map(mapRowToAuditLog);
    },

    async getLogsByResource(
      resourceType: string,
      resourceId: string
    ): Promise<AuditLog[]> {
      const { data, error } = await supabase
        .from('audit_logs')
        .select('*')
        .eq('resource_type', resourceType)
        .eq('resource_id', resourceId)
        .order('timestamp', { ascending: true });

      if (error !== null) {
        throw new Error(`Failed to get logs by resource: ${error.message}`);
      }

      return ((data ?? []) as AuditLogRow[]).map(mapRowToAuditLog);
    },
  };
}

/**
 * In-process AuditServiceDb, bounded to the most recent `capacity` entries
 */
export function createInMemoryAuditDb(capacity = 10000): AuditServiceDb {
  let logs: AuditLog[] = [];

  function append(entry: AuditLogEntry): AuditLog {
    const log: AuditLog = {
      id: nanoid(),
      timestamp: new Date(),
      action: entry.action,
      resourceType: entry.resourceType,
      resourceId: entry.resourceId,
      details: entry.details,
    };
    logs.push(log);
    if (logs.length > capacity) {
      logs = logs.slice(logs.length - capacity);
    }
    return log;
  }

  return {
    async insertLog(entry: AuditLogEntry): Promise<{ id: string }> {
      return { id: append(entry).id };
    },

    async queryLogs(
      params: AuditQueryParams & { limit: number }
    ): Promise<AuditLog[]> {
      const matches = logs.filter(
        (log) =>
          (params.action === undefined || log.action === params.action) &&
          (params.resourceType === undefined ||
            log.resourceType === params.resourceType) &&
          (params.resourceId === undefined ||
            log.resourceId === params.resourceId) &&
          (params.since === undefined ||
            log.timestamp.getTime() >= params.since.getTime())
      );
      return matches.reverse().slice(0, params.limit);
    },

    async getLogsByResource(
      resourceType: string,
      resourceId: string
    ): Promise<AuditLog[]> {
      return logs.filter(
        (log) =>
          log.resourceType === resourceType && log.resourceId === resourceId
      );
    },
  };
}
