import { z } from 'zod';
import { ErrorCode } from '../orchestrator/errors.js';

export { ErrorCode };

/**
 * Server configuration schema
 */
export const serverConfigSchema = z.object({
  /** Port to listen on */
  port: z.number().int().min(1).max(65535).default(8000),
  /** Host to bind to */
  host: z.string().default('0.0.0.0'),
  /** CORS origins to allow */
  corsOrigins: z.array(z.string()).default(['*']),
  /** Request timeout in milliseconds */
  requestTimeout: z.number().int().positive().default(30000),
  /** Enable request logging */
  enableLogging: z.boolean().default(true),
});

export type ServerConfig = z.infer<typeof serverConfigSchema>;

export type ApiResponse<T> = {
  success: true;
  data: T;
  requestId?: string;
};

/**
 * API error response
 */
export type ApiError = {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
  requestId?: string;
};

export interface HealthStatus {
  status: 'ok' | 'degraded' | 'unhealthy';
  version: string;
  timestamp: string;
}

export interface ComponentCheck {
  name: string;
  healthy: boolean;
  message?: string;
  latencyMs?: number;
}

export interface ReadinessResponse {
  ready: boolean;
  checks: ComponentCheck[];
  timestamp: string;
}

export interface LivenessResponse {
  alive: true;
  timestamp: string;
}

/**
 * Create a success response
 */
export function createSuccessResponse<T>(data: T, requestId?: string): ApiResponse<T> {
  return {
    success: true,
    data,
    ...(requestId && { requestId }),
  };
}

/**
 * Create an error response
 */
export function createErrorResponse(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ApiError {
  return {
    success: false,
    error: {
      code,
      message,
      ...(details && { details }),
    },
    ...(requestId && { requestId }),
  };
}
