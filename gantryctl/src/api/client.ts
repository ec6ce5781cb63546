/**
 * Dispatcher REST API Client
 *
 * HTTP client for the dispatcher's selection, feedback and capacity API.
 */

import type { z } from 'zod';
import type {
  CapacityActionResult,
  CLIConfiguration,
  JobDeclaration,
  ProbeResult,
  RunnerProfile,
  RunnerRegistration,
  SelectionResponse,
  StatsReport,
} from '@gantry/shared';
import {
  capacityResultSchema,
  errorBodySchema,
  fleetSchema,
  healthSchema,
  lifecycleSchema,
  outcomeResultSchema,
  pipelineSelectionSchema,
  probeSchema,
  profileSchema,
  resetSchema,
  selectionSchema,
  statsSchema,
  type FleetListing,
  type HealthResponse,
  type LifecycleStatus,
  type OutcomeResult,
  type PipelineSelection,
} from './schemas.js';

export interface APIClientOptions {
  baseUrl: string;
  token?: string;
  timeout?: number;
}

export interface APIResponse<T = unknown> {
  ok: boolean;
  status: number;
  data?: T;
  error?: string;
}

export interface OutcomeRequest {
  runnerKey: string;
  success: boolean;
  durationSeconds: number;
  costPerMinute?: number;
  decisionId?: string;
}

/**
 * Create API client from CLI configuration
 */
export function createAPIClient(config: CLIConfiguration): GantryAPIClient {
  return new GantryAPIClient({
    baseUrl: config.apiUrl,
    token: config.apiToken,
    timeout: 30000,
  });
}

/**
 * Dispatcher REST API Client
 */
export class GantryAPIClient {
  private baseUrl: string;
  private token?: string;
  private timeout: number;

  constructor(options: APIClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, ''); // Remove trailing slash
    this.token = options.token;
    this.timeout = options.timeout || 30000;
  }

  /**
   * Make an HTTP request and validate the response body
   */
  private async request<T>(
    method: string,
    path: string,
    schema: z.ZodType<T>,
    body?: unknown
  ): Promise<APIResponse<T>> {
    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };

    if (this.token) {
      headers['Authorization'] = `Bearer ${this.token}`;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(url, {
        method,
        headers,
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: controller.signal,
      });

      const contentType = response.headers.get('content-type');
      const payload: unknown = contentType?.includes('application/json')
        ? await response.json()
        : undefined;

      clearTimeout(timeoutId);

      if (!response.ok) {
        const parsedError = errorBodySchema.safeParse(payload);
        const message = parsedError.success
          ? parsedError.data.message || parsedError.data.error
          : undefined;
        return {
          ok: false,
          status: response.status,
          error: message || response.statusText || `HTTP ${response.status}`,
        };
      }

      const parsed = schema.safeParse(payload);
      if (!parsed.success) {
        return {
          ok: false,
          status: response.status,
          error: `Unexpected response from ${method} ${path}`,
        };
      }

      return {
        ok: true,
        status: response.status,
        data: parsed.data,
      };
    } catch (err) {
      clearTimeout(timeoutId);

      if (err instanceof Error && err.name === 'AbortError') {
        return {
          ok: false,
          status: 0,
          error: `Request timeout after ${this.timeout}ms`,
        };
      }

      return {
        ok: false,
        status: 0,
        error: err instanceof Error && err.message ? err.message : 'Network error',
      };
    }
  }

  // ============ Health ============

  async health(): Promise<APIResponse<HealthResponse>> {
    return this.request('GET', '/health', healthSchema);
  }

  // ============ Selection ============

  async selectRunner(job: JobDeclaration): Promise<APIResponse<SelectionResponse>> {
    return this.request('POST', '/api/select', selectionSchema, job);
  }

  async selectPipeline(content: string): Promise<APIResponse<PipelineSelection>> {
    return this.request('POST', '/api/select/pipeline', pipelineSelectionSchema, { content });
  }

  // ============ Feedback ============

  async reportOutcome(report: OutcomeRequest): Promise<APIResponse<OutcomeResult>> {
    return this.request('POST', '/api/outcomes', outcomeResultSchema, report);
  }

  // ============ Stats ============

  async getStats(): Promise<APIResponse<StatsReport>> {
    return this.request('GET', '/api/stats', statsSchema);
  }

  async resetStats(): Promise<APIResponse<{ reset: boolean }>> {
    return this.request('POST', '/api/stats/reset', resetSchema);
  }

  // ============ Fleet ============

  async listFleet(filter?: { capability?: string }): Promise<APIResponse<FleetListing>> {
    const params = new URLSearchParams();
    if (filter?.capability) params.set('capability', filter.capability);

    const query = params.toString();
    return this.request('GET', `/api/fleet${query ? `?${query}` : ''}`, fleetSchema);
  }

  async getRunner(runnerKey: string): Promise<APIResponse<RunnerProfile>> {
    return this.request('GET', `/api/fleet/${encodeURIComponent(runnerKey)}`, profileSchema);
  }

  async registerRunner(
    runnerKey: string,
    registration: Omit<RunnerRegistration, 'runnerKey'>
  ): Promise<APIResponse<RunnerProfile>> {
    return this.request('PUT', `/api/fleet/${encodeURIComponent(runnerKey)}`, profileSchema, registration);
  }

  // ============ Availability ============

  async getAvailability(): Promise<APIResponse<ProbeResult>> {
    return this.request('GET', '/api/availability', probeSchema);
  }

  // ============ Capacity ============

  async getLifecycle(): Promise<APIResponse<LifecycleStatus>> {
    return this.request('GET', '/api/lifecycle', lifecycleSchema);
  }

  async startCapacity(): Promise<APIResponse<CapacityActionResult>> {
    return this.request('POST', '/api/lifecycle/start', capacityResultSchema);
  }

  async stopCapacity(): Promise<APIResponse<CapacityActionResult>> {
    return this.request('POST', '/api/lifecycle/stop', capacityResultSchema);
  }
}

/**
 * Data of a successful response
 *
 * @throws Error carrying the server's message otherwise
 */
export function unwrap<T>(response: APIResponse<T>): T {
  if (!response.ok || response.data === undefined) {
    throw new Error(response.error || `Request failed with status ${response.status}`);
  }
  return response.data;
}
