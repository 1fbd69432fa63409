/**
 * Audit Types
 *
 * Lifecycle trail for agents, tasks, workflows and memory.
 */

/**
 * Event to be logged
 * Used as input to AuditService.log()
 */
export interface AuditEvent {
  action: string; // e.g., 'task:succeeded', 'agent:registered'
  resourceType: string; // e.g., 'task', 'agent', 'workflow', 'memory'
  resourceId?: string;
  details?: Record<string, unknown>;
}

/**
 * Stored audit entry
 */
export interface AuditLog {
  id: string;
  timestamp: Date;
  action: string;
  resourceType: string;
  resourceId: string | null;
  details: Record<string, unknown>;
}

/**
 * Parameters for querying audit logs (newest first)
 */
export interface AuditQueryParams {
  action?: string;
  resourceType?: string;
  resourceId?: string;
  since?: Date;
  limit?: number;
}

export const DEFAULT_AUDIT_QUERY_LIMIT = 50;
export const MAX_AUDIT_QUERY_LIMIT = 500;
