/**
 * Server types
 */

/**
 * API response wrapper
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
  meta?: ResponseMeta;
}

/**
 * API error structure
 */
export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Response metadata
 */
export interface ResponseMeta {
  requestId: string;
  timestamp: string;
}

/**
 * Health check response
 */
export interface HealthStatus {
  status: 'healthy' | 'degraded';
  version: string;
  uptime: number;
  checks: HealthCheck[];
}

/**
 * Individual health check
 */
export interface HealthCheck {
  name: string;
  status: 'pass' | 'warn' | 'fail';
  message?: string;
}

/**
 * Server configuration
 */
export interface ServerConfig {
  port: number;
  host: string;
  corsOrigins?: string[];
  bodySizeLimit?: number;
}
