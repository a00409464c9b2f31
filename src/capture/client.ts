/**
 * HTTP client for the local knowledge-capture service
 */

import {
  CaptureServiceError,
  isJsonObject,
  toDisplayError,
  type JsonObject,
  type Logger,
  type ObservationRecord,
} from '../core/index.js';

const HEALTH_PATH = '/health';
const OBSERVATIONS_PATH = '/observations';
const SESSIONS_PATH = '/sessions';
const DEFAULT_SESSION_TIMEOUT_MS = 3000;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface CaptureClientOptions {
  baseUrl: string;
  healthTimeoutMs: number;
  saveTimeoutMs: number;
  /** Timeout for session lookups; 3000 ms when omitted. */
  sessionTimeoutMs?: number;
  logger: Logger;
  fetch?: FetchLike;
}

export class CaptureClient {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: CaptureClientOptions) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  get baseUrl(): string {
    return this.options.baseUrl;
  }

  /**
   * Any 2xx from `/health` counts as available. Timeouts and refused
   * connections are reported as unavailable, never thrown.
   */
  async checkHealth(): Promise<boolean> {
    try {
      const response = await this.fetchImpl(`${this.baseUrl}${HEALTH_PATH}`, {
        signal: AbortSignal.timeout(this.options.healthTimeoutMs),
      });
      if (!response.ok) {
        this.options.logger.warn(`Capture service unhealthy at ${this.baseUrl}: HTTP ${response.status}`);
      }
      return response.ok;
    } catch (error) {
      this.options.logger.warn(`Capture service not reachable at ${this.baseUrl}: ${describeFetchError(error)}`);
      return false;
    }
  }

  /**
   * Submit one observation. Resolves to the id the service assigned, or
   * null when the submission failed for any reason. Single attempt.
   */
  async saveObservation(record: ObservationRecord): Promise<string | null> {
    try {
      return await this.postObservation(record);
    } catch (error) {
      this.options.logger.warn(`Failed to save observation: ${describeFetchError(error)}`);
      return null;
    }
  }

  /**
   * The session record stored by the service, or null when it cannot be
   * fetched.
   */
  async getSession(sessionId: string): Promise<JsonObject | null> {
    const url = `${this.baseUrl}${SESSIONS_PATH}/${encodeURIComponent(sessionId)}`;
    try {
      const payload = await this.getJson(url);
      if (!isJsonObject(payload)) {
        throw new CaptureServiceError('session response is not a JSON object');
      }
      return payload;
    } catch (error) {
      this.options.logger.warn(`Failed to fetch session ${sessionId}: ${describeFetchError(error)}`);
      return null;
    }
  }

  /** Observations recorded for a session; 0 when the count is unavailable. */
  async countObservations(sessionId: string): Promise<number> {
    const query = new URLSearchParams({ session_id: sessionId, count: 'true' });
    try {
      const payload = await this.getJson(`${this.baseUrl}${OBSERVATIONS_PATH}?${query.toString()}`);
      const count = isJsonObject(payload) ? payload.count : undefined;
      return typeof count === 'number' && Number.isFinite(count) ? count : 0;
    } catch (error) {
      this.options.logger.debug(`Observation count unavailable: ${describeFetchError(error)}`);
      return 0;
    }
  }

  private async getJson(url: string): Promise<unknown> {
    const response = await this.fetchImpl(url, {
      signal: AbortSignal.timeout(this.options.sessionTimeoutMs ?? DEFAULT_SESSION_TIMEOUT_MS),
    });
    if (!response.ok) {
      throw new CaptureServiceError(`service returned ${response.status}`, response.status);
    }
    return response.json();
  }

  private async postObservation(record: ObservationRecord): Promise<string> {
    const response = await this.fetchImpl(`${this.baseUrl}${OBSERVATIONS_PATH}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(record),
      signal: AbortSignal.timeout(this.options.saveTimeoutMs),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new CaptureServiceError(`service returned ${response.status}: ${body.slice(0, 120)}`, response.status);
    }

    const payload: unknown = await response.json();
    const id = isJsonObject(payload) ? payload.id : undefined;
    if (typeof id === 'string' && id) return id;
    if (typeof id === 'number') return String(id);
    throw new CaptureServiceError('service response carried no observation id', response.status);
  }
}

function describeFetchError(error: unknown): string {
  if (error instanceof Error && error.name === 'TimeoutError') {
    return 'request timed out';
  }
  return toDisplayError(error);
}
