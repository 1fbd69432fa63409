/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { AgentRegistry } from '@/registry/agent-registry.js';
import type { Orchestrator } from '@/orchestrator/orchestrator.js';
import type {
  AuditService,
  CommandService,
  MemoryStore,
} from '@/services/index.js';

/**
 * Extended Hono context with request id
 */
declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
  }
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T> {
  data: T;
  meta: {
    requestId: string;
  };
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    requestId: string;
  };
}

export type ErrorStatus = 400 | 404 | 409 | 422 | 500 | 502 | 503 | 504;

/**
 * Error code (service failures and thrown error kinds) to HTTP status
 */
export const ERROR_STATUS_MAP: Record<string, ErrorStatus> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  EMBEDDING_ERROR: 502,
  DIMENSION_MISMATCH: 502,
  PERSISTENCE_ERROR: 503,
  INTERNAL_ERROR: 500,
  InvalidTaskError: 400,
  InvalidAgentError: 400,
  WorkflowDefinitionError: 400,
  DuplicateAgentError: 409,
  NoCapableAgentError: 422,
  ClassificationAmbiguous: 422,
};

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: string): ErrorStatus {
  return ERROR_STATUS_MAP[code] ?? 500;
}

/**
 * Components the routes delegate to
 */
export interface ApiServices {
  orchestrator: Orchestrator;
  registry: AgentRegistry;
  memory: MemoryStore;
  commands: CommandService;
  audit: AuditService;
}
