/**
 * @fileoverview Document Pipeline API Package Entry Point
 *
 * Lambda handlers for uploads and job status, plus the collaborators the
 * stage workers run with:
 * - LLM extraction against a caller-supplied document spec (Azure OpenAI)
 * - PDF generation from a JSON template (pdfkit)
 * - Artifact storage in Supabase Storage
 *
 * Jobs live in PostgreSQL; the extraction and generation queues are SQS.
 * See `runtime.ts` for how the pieces are composed and `worker.ts` for the
 * long-running stage worker process.
 */

/**
 * Current API version following semantic versioning.
 * Used for health checks and API compatibility verification.
 */
export const API_VERSION = '1.0.0';

/**
 * Interface defining the structure of API health information.
 * Used by health check endpoints to report system status.
 */
export interface ApiInfo {
  /** The service name identifier */
  name: string;
  /** Current API version */
  version: string;
  /** Overall system health status */
  status: 'healthy' | 'degraded' | 'down';
}

/**
 * Returns basic API information for health checks and service discovery.
 * This function provides a lightweight way to verify the API is running
 * and report its current version and health status.
 *
 * @returns {ApiInfo} Object containing service name, version, and health status
 *
 * @example
 * ```typescript
 * const info = getApiInfo();
 * console.log(`${info.name} v${info.version} is ${info.status}`);
 * // Output: "docpipe-api v1.0.0 is healthy"
 * ```
 */
export function getApiInfo(): ApiInfo {
  return {
    name: 'docpipe-api',
    version: API_VERSION,
    status: 'healthy'
  };
}