/**
 * AuditService Implementation
 *
 * Purpose: Append-only lifecycle trail for agents, tasks, workflows and memory.
 * Owns: audit_logs
 * Dependencies: None (lowest level service)
 */

import type {
  AuditEvent,
  AuditLog,
  AuditQueryParams,
  Result,
} from '@/types/index.js';
import {
  success,
  failure,
  errorMessage,
  DEFAULT_AUDIT_QUERY_LIMIT,
  MAX_AUDIT_QUERY_LIMIT,
} from '@/types/index.js';

/**
 * Row shape handed to the database adapter
 */
export interface AuditLogEntry {
  action: string;
  resourceType: string;
  resourceId: string | null;
  details: Record<string, unknown>;
}

/**
 * Database abstraction interface for AuditService
 * Allows mocking in tests
 */
export interface AuditServiceDb {
  insertLog: (entry: AuditLogEntry) => Promise<{ id: string }>;
  queryLogs: (
    params: AuditQueryParams & { limit: number }
  ) => Promise<AuditLog[]>;
  getLogsByResource: (
    resourceType: string,
    resourceId: string
  ) => Promise<AuditLog[]>;
}

/**
 * AuditService interface
 */
export interface AuditService {
  log(event: AuditEvent): Promise<Result<void>>;
  query(params: AuditQueryParams): Promise<Result<AuditLog[]>>;
  getResourceHistory(
    resourceType: string,
    resourceId: string
  ): Promise<Result<AuditLog[]>>;
}

/**
 * Build log entry from event
 */
function buildLogEntry(event: AuditEvent): AuditLogEntry {
  return {
    action: event.action,
    resourceType: event.resourceType,
    resourceId: event.resourceId ?? null,
    details: event.details ?? {},
  };
}

/**
 * Clamp query limit into [1, MAX_AUDIT_QUERY_LIMIT]
 */
function normalizeLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit) || limit < 1) {
    return DEFAULT_AUDIT_QUERY_LIMIT;
  }
  return Math.min(Math.floor(limit), MAX_AUDIT_QUERY_LIMIT);
}

/**
 * Create AuditService instance
 */
export function createAuditService(deps: { db: AuditServiceDb }): AuditService {
  const { db } = deps;

  return {
    /**
     * Log an audit event
     * This is the ONLY way to write to audit_logs
     */
    async log(event: AuditEvent): Promise<Result<void>> {
      if (!event.action || !event.resourceType) {
        return failure(
          'VALIDATION_ERROR',
          'Audit event requires action and resourceType'
        );
      }

      try {
        await db.insertLog(buildLogEntry(event));
        return success(undefined);
      } catch (error) {
        return failure(
          'INTERNAL_ERROR',
          `Failed to write audit log: ${errorMessage(error)}`
        );
      }
    },

    /**
     * Query audit logs, newest first
     */
    async query(params: AuditQueryParams): Promise<Result<AuditLog[]>> {
      try {
        const logs = await db.queryLogs({
          ...params,
          limit: normalizeLimit(params.limit),
        });
        return success(logs);
      } catch (error) {
        return failure(
          'INTERNAL_ERROR',
          `Failed to query audit logs: ${errorMessage(error)}`
        );
      }
    },

    /**
     * Get the full trail of one resource, oldest first
     */
    async getResourceHistory(
      resourceType: string,
      resourceId: string
    ): Promise<Result<AuditLog[]>> {
      if (!resourceId || resourceId.trim() === '') {
        return failure('VALIDATION_ERROR', 'Resource ID is required');
      }

      try {
        const logs = await db.getLogsByResource(resourceType, resourceId);
        return success(logs);
      } catch (error) {
        return failure(
          'INTERNAL_ERROR',
          `Failed to read resource history: ${errorMessage(error)}`
        );
      }
    },
  };
}

/**
 * Write an event and report (not propagate) a failed write.
 * Callers use this where an audit failure must not change an outcome.
 */
export async function emitAudit(
  auditService: AuditService,
  event: AuditEvent
): Promise<void> {
  const result = await auditService.log(event);
  if (!result.success) {
    console.error(
      `Audit write failed for ${event.action}: ${result.error.message}`
    );
  }
}
